import { Command } from 'commander';
import { VersionResolver, checkTag, resolveVersion } from '@tagship/core';
import { CliEnvironment, consoleLogger, loadConfig, projectDirOf } from '../context';
import { OutputRenderer, VersionOutput } from '../output/renderer';
import { GlobalOptions } from '../types';

interface VersionOptions {
  tag?: string;
}

export function registerVersionCommand(program: Command, environment: CliEnvironment) {
  program
    .command('version')
    .description('Print the release version read from project metadata')
    .option('--tag <tag>', 'Fail unless the tag matches the version')
    .action(async (options: VersionOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const config = loadConfig(globalOpts, environment);

      const resolved = await resolveVersion(
        new VersionResolver({ source: config.project.metadata }),
        projectDirOf(config, environment),
      );

      const output: VersionOutput = { version: resolved.version, source: resolved.source };
      if (options.tag) {
        output.tag = options.tag;
        output.tagMatches = await checkTag(
          options.tag,
          resolved.version,
          config.release.requireTagMatch,
          consoleLogger(globalOpts, true),
        );
      }
      renderer.renderVersion(output);
    });
}
