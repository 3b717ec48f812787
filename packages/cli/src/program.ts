import { Command, CommanderError } from 'commander';
import { exitCodeFor } from '@tagship/shared';
import { version } from '../package.json';
import { registerBuildCommand } from './commands/build';
import { registerInitCommand } from './commands/init';
import { registerPublishCommand } from './commands/publish';
import { registerReleaseCommand } from './commands/release';
import { registerTargetsCommand } from './commands/targets';
import { registerVersionCommand } from './commands/version';
import { registerWorkflowCommand } from './commands/workflow';
import { CliEnvironment, CliState, defaultEnvironment } from './context';
import { OutputRenderer } from './output/renderer';
import { GlobalOptions } from './types';

export function createProgram(environment: CliEnvironment, state: CliState): Command {
  const program = new Command();

  program
    .name('tagship')
    .description('Build, package and publish release binaries for every target')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Subcommands take their own --version; global options go before them.
    .enablePositionalOptions()
    .exitOverride();

  registerReleaseCommand(program, environment, state);
  registerVersionCommand(program, environment);
  registerBuildCommand(program, environment, state);
  registerPublishCommand(program, environment, state);
  registerTargetsCommand(program, environment);
  registerWorkflowCommand(program, environment);
  registerInitCommand(program, environment);

  return program;
}

/**
 * Runs one CLI invocation and returns its exit code: 0 on success, 2 for
 * usage and configuration errors, 1 for everything else.
 */
export async function runCli(
  argv: string[],
  environment: CliEnvironment = defaultEnvironment(),
): Promise<number> {
  const state: CliState = { argv: argv.slice(2), exitCode: 0 };
  const program = createProgram(environment, state);

  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      return e.exitCode === 0 ? 0 : 2;
    }
    const opts = program.opts<GlobalOptions>();
    new OutputRenderer(!!opts.json).renderError(e, !!opts.verbose);
    return exitCodeFor(e);
  }
  return state.exitCode;
}
