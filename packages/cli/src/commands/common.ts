import { InvalidArgumentError } from 'commander';
import type { ConfigOverrides, PipelineReport } from '@tagship/core';
import { exitCodeFor } from '@tagship/shared';
import type { CliState } from '../context';
import type { OutputRenderer } from '../output/renderer';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** Accumulates a repeatable option. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export interface MatrixFlags {
  maxParallel?: number;
  /** false only when --no-fail-fast was given */
  failFast: boolean;
}

export function matrixOverrides(options: MatrixFlags): ConfigOverrides {
  return {
    matrix: {
      maxParallel: options.maxParallel,
      // Unset flags must not shadow the config file.
      failFast: options.failFast === false ? false : undefined,
    },
  };
}

export function finishReport(report: PipelineReport, renderer: OutputRenderer, state: CliState) {
  renderer.renderReport(report);
  state.exitCode = report.status === 'success' ? 0 : exitCodeFor(report.error);
}
