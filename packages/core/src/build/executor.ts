import path from 'path';
import {
  AppError,
  AppErrorOptions,
  CompileError,
  Logger,
  RetryConfig,
  StripError,
  ToolchainConfig,
  ToolchainError,
  eventMeta,
} from '@tagship/shared';
import { CommandRunner, readTail } from '@tagship/exec';
import { BuildTarget } from '../matrix/targets';
import { withRetry } from '../common/retry';
import { BuildStep, StepFailure, binaryRelativePath, planBuildSteps } from './steps';

export interface BuiltBinary {
  target: BuildTarget;
  /** Absolute path of the stripped binary */
  binaryPath: string;
  /** Path relative to the project root, reused inside the archive */
  relativePath: string;
}

export interface BuildExecutorOptions {
  projectRoot: string;
  tool: string;
  toolchain: ToolchainConfig;
  retry: RetryConfig;
  runner: CommandRunner;
  logger: Logger;
  runId: string;
}

const FAILURES: Record<StepFailure, new (message: string, options?: AppErrorOptions) => AppError> = {
  ToolchainError,
  CompileError,
  StripError,
};

/**
 * Builds one matrix target. Holds no per-build state, so one instance can
 * serve concurrent jobs.
 */
export class BuildExecutor {
  constructor(private readonly options: BuildExecutorOptions) {}

  async build(target: BuildTarget, jobId: string): Promise<BuiltBinary> {
    const { tool, toolchain, projectRoot } = this.options;
    const logger = this.options.logger.child({ job: jobId });

    for (const step of planBuildSteps(target, tool, toolchain)) {
      if (step.retried) {
        await withRetry(
          `${step.name} (${target.triple})`,
          () => this.runStep(step, target, jobId, logger),
          this.options.retry,
          { logger, runId: this.options.runId },
        );
      } else {
        await this.runStep(step, target, jobId, logger);
      }
    }

    const relativePath = binaryRelativePath(target, tool);
    return {
      target,
      binaryPath: path.resolve(projectRoot, relativePath),
      relativePath,
    };
  }

  private async runStep(
    step: BuildStep,
    target: BuildTarget,
    jobId: string,
    logger: Logger,
  ): Promise<void> {
    await logger.debug(`$ ${step.command}`);
    const result = await this.options.runner.run({
      command: step.command,
      cwd: this.options.projectRoot,
      label: `${target.triple}-${step.name}`,
      kind: step.kind,
    });

    const success = result.exitCode === 0;
    await logger.log({
      ...eventMeta(this.options.runId),
      type: 'StepFinished',
      payload: {
        jobId,
        step: step.name,
        command: step.command,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
        success,
      },
    });

    if (!success) {
      const Failure = FAILURES[step.failure];
      throw new Failure(
        `${step.name} failed for ${target.triple} with exit code ${result.exitCode}: ${step.command}`,
        {
          details: {
            target: target.triple,
            exitCode: result.exitCode,
            stderrPath: result.stderrPath,
            stderrTail: readTail(result.stderrPath, 2000),
          },
        },
      );
    }
  }
}
