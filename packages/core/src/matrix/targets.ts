import { ConfigError, MatrixConfig } from '@tagship/shared';

export interface BuildTarget {
  triple: string;
  runsOn: string;
  /** Built with the runner's native toolchain, without `--target` */
  host: boolean;
  systemPackages: string[];
}

/**
 * Enumerated targets followed by the host target, if any.
 */
export function expandMatrix(matrix: MatrixConfig): BuildTarget[] {
  const targets: BuildTarget[] = matrix.targets.map((t) => ({ ...t, host: false }));
  if (matrix.host) {
    targets.push({ ...matrix.host, host: true });
  }

  const seen = new Set<string>();
  for (const target of targets) {
    if (seen.has(target.triple)) {
      throw new ConfigError(`Target "${target.triple}" appears more than once in the build matrix`);
    }
    seen.add(target.triple);
  }
  return targets;
}

/** Stable job identifier used in logs, events and the summary. */
export function jobIdFor(target: Pick<BuildTarget, 'triple'>): string {
  return `build (${target.triple})`;
}

/**
 * Narrows the matrix to one triple, for CI runners that build a single target.
 */
export function selectTarget(targets: BuildTarget[], triple: string): BuildTarget {
  const match = targets.find((t) => t.triple === triple);
  if (!match) {
    throw new ConfigError(
      `Target "${triple}" is not in the build matrix (${targets.map((t) => t.triple).join(', ')})`,
    );
  }
  return match;
}
