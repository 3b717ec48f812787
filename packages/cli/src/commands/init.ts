import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { REPO_CONFIG_FILE } from '@tagship/core';
import { UsageError, atomicWrite } from '@tagship/shared';
import { CliEnvironment } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';

export function defaultConfig(tool: string): string {
  return `# tagship configuration
configVersion: 1

# Binary name; archives are named <tool>-v<version>-<target>.tar.gz
tool: ${tool}

project:
  # cargo reads the version from \`cargo pkgid\`, npm from package.json
  metadata: cargo

matrix:
  targets:
    - triple: x86_64-unknown-linux-gnu
      runsOn: ubuntu-latest
    - triple: x86_64-unknown-linux-musl
      runsOn: ubuntu-latest
      systemPackages: [musl-tools]
  # Built without --target on its own runner; set to null to skip
  host:
    triple: x86_64-apple-darwin
    runsOn: macos-latest
  failFast: true

release:
  # owner/name of the repository that receives the release
  # repo: owner/${tool}
  # The credential is read from this environment variable
  tokenEnv: GITHUB_TOKEN
  requireTagMatch: true
`;
}

interface InitOptions {
  tool?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command, environment: CliEnvironment) {
  program
    .command('init')
    .description(`Create a default ${REPO_CONFIG_FILE} configuration file`)
    .option('--tool <name>', 'Binary name (default: the directory name)')
    .option('--force', 'Overwrite an existing file')
    .action(async (options: InitOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const configPath = path.join(environment.cwd, REPO_CONFIG_FILE);

      const exists = await fs
        .access(configPath)
        .then(() => true)
        .catch(() => false);
      if (exists && !options.force) {
        throw new UsageError(`${REPO_CONFIG_FILE} already exists; pass --force to overwrite it`);
      }

      const tool = options.tool ?? path.basename(environment.cwd);
      await atomicWrite(configPath, defaultConfig(tool));
      if (globalOpts.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        renderer.log(`Created ${configPath}`);
      }
    });
}
