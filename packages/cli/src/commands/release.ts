import { Command } from 'commander';
import { CliEnvironment, CliState, openPipeline } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';
import { MatrixFlags, finishReport, matrixOverrides, parsePositiveInt } from './common';

interface ReleaseOptions extends MatrixFlags {
  tag?: string;
  version?: string;
  dryRun?: boolean;
}

export function registerReleaseCommand(
  program: Command,
  environment: CliEnvironment,
  state: CliState,
) {
  program
    .command('release')
    .description('Build every matrix target, then publish once all of them succeed')
    .option('--tag <tag>', 'Tag that triggered the release, e.g. v1.2.3')
    .option('--version <semver>', 'Use this version instead of reading project metadata')
    .option('--dry-run', 'Build and check the barrier, but do not publish')
    .option('--max-parallel <n>', 'Upper bound on concurrent build jobs', parsePositiveInt)
    .option('--no-fail-fast', 'Keep starting builds after one has failed')
    .action(async (options: ReleaseOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const { pipeline } = await openPipeline(
        globalOpts,
        environment,
        state.argv,
        matrixOverrides(options),
      );
      const report = await pipeline.run({
        tag: options.tag,
        version: options.version,
        dryRun: !!options.dryRun,
      });
      finishReport(report, renderer, state);
    });
}
