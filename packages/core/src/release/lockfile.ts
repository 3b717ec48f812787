import path from 'path';
import { pathExists } from 'fs-extra';
import { LockfileConfig, ToolchainError } from '@tagship/shared';
import { CommandRunner } from '@tagship/exec';

/**
 * Regenerates the dependency lock file that is attached to every release.
 */
export class LockSnapshot {
  constructor(
    private readonly config: LockfileConfig,
    private readonly runner: CommandRunner,
  ) {}

  /** Returns the absolute path of the regenerated lock file. */
  async regenerate(projectRoot: string): Promise<string> {
    const result = await this.runner.run({
      command: this.config.command,
      cwd: projectRoot,
      label: 'lockfile',
      kind: 'lockfile',
    });
    if (result.exitCode !== 0) {
      throw new ToolchainError(
        `Lock file regeneration failed with exit code ${result.exitCode}: ${this.config.command}`,
        { details: { stderrPath: result.stderrPath } },
      );
    }

    const lockPath = path.resolve(projectRoot, this.config.path);
    if (!(await pathExists(lockPath))) {
      throw new ToolchainError(`Lock file not found after "${this.config.command}": ${lockPath}`);
    }
    return lockPath;
  }
}
