import { Command } from 'commander';
import { CliEnvironment, CliState, openPipeline } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';
import { MatrixFlags, collect, finishReport, matrixOverrides, parsePositiveInt } from './common';

interface BuildOptions extends MatrixFlags {
  target: string[];
  tag?: string;
  version?: string;
}

export function registerBuildCommand(
  program: Command,
  environment: CliEnvironment,
  state: CliState,
) {
  program
    .command('build')
    .description('Build, package and deposit matrix targets without publishing')
    .option('--target <triple>', 'Target to build; repeat for several (default: all)', collect, [])
    .option('--version <semver>', 'Version computed by an earlier job')
    .option('--tag <tag>', 'Tag to check the version against')
    .option('--max-parallel <n>', 'Upper bound on concurrent build jobs', parsePositiveInt)
    .option('--no-fail-fast', 'Keep starting builds after one has failed')
    .action(async (options: BuildOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const { pipeline } = await openPipeline(
        globalOpts,
        environment,
        state.argv,
        matrixOverrides(options),
      );
      const report = await pipeline.runBuild({
        triples: options.target,
        tag: options.tag,
        version: options.version,
      });
      finishReport(report, renderer, state);
    });
}
