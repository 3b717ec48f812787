import { Command } from 'commander';
import { CliEnvironment, CliState, openPipeline } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';
import { finishReport } from './common';

interface PublishOptions {
  tag?: string;
  version?: string;
  dryRun?: boolean;
}

export function registerPublishCommand(
  program: Command,
  environment: CliEnvironment,
  state: CliState,
) {
  program
    .command('publish')
    .description('Publish the archives deposited by earlier build jobs')
    .option('--version <semver>', 'Version computed by an earlier job')
    .option('--tag <tag>', 'Tag to check the version against')
    .option('--dry-run', 'List what would be attached without publishing')
    .action(async (options: PublishOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const { pipeline } = await openPipeline(globalOpts, environment, state.argv);
      const report = await pipeline.runPublish({
        tag: options.tag,
        version: options.version,
        dryRun: !!options.dryRun,
      });
      finishReport(report, renderer, state);
    });
}
