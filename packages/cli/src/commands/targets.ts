import { Command } from 'commander';
import { expandMatrix } from '@tagship/core';
import { CliEnvironment, loadConfig } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';

export function registerTargetsCommand(program: Command, environment: CliEnvironment) {
  program
    .command('targets')
    .description('List the build matrix, host target last')
    .action(() => {
      const globalOpts = program.opts<GlobalOptions>();
      const config = loadConfig(globalOpts, environment);
      new OutputRenderer(!!globalOpts.json).renderTargets(expandMatrix(config.matrix));
    });
}
