import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { LockfileConfigSchema, ToolchainError } from '@tagship/shared';
import type { CommandRunner } from '@tagship/exec';
import { LockSnapshot } from './lockfile';

function runnerExiting(exitCode: number, onRun?: () => Promise<void>): CommandRunner {
  return {
    run: vi.fn(async () => {
      await onRun?.();
      return { exitCode, durationMs: 1, stdoutPath: '/o', stderrPath: '/e', truncated: false };
    }),
  };
}

describe('LockSnapshot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagship-lock-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('runs the lock command and returns the lock path', async () => {
    const runner = runnerExiting(0, () => fs.writeFile(path.join(tmpDir, 'Cargo.lock'), '# lock'));
    const snapshot = new LockSnapshot(LockfileConfigSchema.parse({}), runner);

    await expect(snapshot.regenerate(tmpDir)).resolves.toBe(path.join(tmpDir, 'Cargo.lock'));
    expect(runner.run).toHaveBeenCalledWith({
      command: 'cargo update',
      cwd: tmpDir,
      label: 'lockfile',
      kind: 'lockfile',
    });
  });

  it('fails when the command fails', async () => {
    const snapshot = new LockSnapshot(LockfileConfigSchema.parse({}), runnerExiting(101));

    await expect(snapshot.regenerate(tmpDir)).rejects.toThrow(
      'Lock file regeneration failed with exit code 101: cargo update',
    );
  });

  it('fails when no lock file appears', async () => {
    const snapshot = new LockSnapshot(
      LockfileConfigSchema.parse({ command: 'npm install --package-lock-only', path: 'package-lock.json' }),
      runnerExiting(0),
    );

    await expect(snapshot.regenerate(tmpDir)).rejects.toThrow(ToolchainError);
  });
});
