import path from 'path';
import {
  ConfigLoader,
  ConfigOverrides,
  ReleaseHost,
  ReleasePipeline,
  createReleasePipeline,
} from '@tagship/core';
import type { CommandRunner } from '@tagship/exec';
import {
  ConsoleLogger,
  JsonlLogger,
  Logger,
  RunPaths,
  TagshipConfig,
  createRunDir,
  newRunId,
} from '@tagship/shared';
import { GlobalOptions } from './types';

/**
 * Process-level inputs of one CLI invocation. Tests swap the runner and the
 * release host for in-process fakes.
 */
export interface CliEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  host?: ReleaseHost;
}

export interface CliState {
  /** Arguments after the executable, recorded in the run summary */
  argv: string[];
  /** Exit code chosen by the command that ran; errors thrown past it override it */
  exitCode: number;
}

export function defaultEnvironment(): CliEnvironment {
  return { cwd: process.cwd(), env: process.env };
}

export function loadConfig(
  globalOpts: GlobalOptions,
  environment: CliEnvironment,
  flags: ConfigOverrides = {},
): TagshipConfig {
  return ConfigLoader.load({
    configPath: globalOpts.config,
    cwd: environment.cwd,
    env: environment.env,
    flags,
  });
}

/** Console logger that stays off stdout when it carries JSON. */
export function consoleLogger(globalOpts: GlobalOptions, quiet = false): ConsoleLogger {
  return new ConsoleLogger({ verbose: !!globalOpts.verbose, quiet: quiet || !!globalOpts.json });
}

export function projectDirOf(config: TagshipConfig, environment: CliEnvironment): string {
  return path.resolve(environment.cwd, config.project.root);
}

export interface PipelineSession {
  config: TagshipConfig;
  pipeline: ReleasePipeline;
  runPaths: RunPaths;
  logger: Logger;
}

/**
 * Loads configuration, creates the run directory and wires a pipeline whose
 * events go to the run trace. The release credential is read here and
 * nowhere else.
 */
export async function openPipeline(
  globalOpts: GlobalOptions,
  environment: CliEnvironment,
  argv: string[],
  flags: ConfigOverrides = {},
): Promise<PipelineSession> {
  const config = loadConfig(globalOpts, environment, flags);
  const runId = newRunId();
  const runPaths = await createRunDir(environment.cwd, runId);
  ConfigLoader.writeEffectiveConfig(config, runPaths.root);

  const logger = new JsonlLogger(runPaths.trace, consoleLogger(globalOpts));
  const token = environment.env[config.release.tokenEnv] || undefined;

  const pipeline = createReleasePipeline({
    config,
    projectRoot: environment.cwd,
    runId,
    runPaths,
    logger,
    token,
    command: argv,
    runner: environment.runner,
    host: environment.host,
  });

  return { config, pipeline, runPaths, logger };
}
