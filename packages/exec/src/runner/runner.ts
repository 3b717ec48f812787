import { spawn, spawnSync } from 'child_process';
import fs from 'fs';
import { randomUUID } from 'crypto';
import {
  join,
  isWindows,
  CommandPolicy,
  CommandRequest,
  CommandResult,
  ProcessError,
  TimeoutError,
  UsageError,
} from '@tagship/shared';
import { parseCommand } from '../classify/parser';

function killProcessTree(pid: number, signal: NodeJS.Signals | number = 'SIGTERM') {
  if (isWindows()) {
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
  } else {
    // Negative pid signals the whole group; needs `detached: true` at spawn.
    try {
      process.kill(-pid, signal);
    } catch (err) {
      // ESRCH: the group already exited
      if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
        throw err;
      }
    }
  }
}

function isShellCommand(command: string): boolean {
  return /[|&;<>`$]/.test(command);
}

// Secrets reach a child only through CommandPolicy.envAllowlist.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'XDG_CONFIG_HOME',
  'XDG_CACHE_HOME',
  'XDG_DATA_HOME',
  // Windows
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function getSafeEnv(
  policy: Pick<CommandPolicy, 'envAllowlist'>,
  baseEnv: NodeJS.ProcessEnv,
  requestEnv?: Record<string, string>,
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...policy.envAllowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  // Values set explicitly on the request always pass.
  return { ...safeEnv, ...requestEnv };
}

/**
 * Reads at most `maxChars` characters from the end of a log file.
 * Returns an empty string when the file does not exist.
 */
export function readTail(filePath: string, maxChars = 2000): string {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return '';
    }
    throw err;
  }
  return content.length > maxChars ? content.slice(content.length - maxChars) : content;
}

/**
 * Executes a single command line. Implementations never throw for a
 * non-zero exit; callers inspect `exitCode`.
 */
export interface CommandRunner {
  run(req: CommandRequest): Promise<CommandResult>;
}

export class ProcessRunner implements CommandRunner {
  constructor(
    private readonly policy: CommandPolicy,
    private readonly logsDir: string,
  ) {}

  async run(req: CommandRequest): Promise<CommandResult> {
    fs.mkdirSync(this.logsDir, { recursive: true });

    const id = randomUUID().slice(0, 8);
    const stdoutPath = join(this.logsDir, `${req.label}_${id}_stdout.log`);
    const stderrPath = join(this.logsDir, `${req.label}_${id}_stderr.log`);

    return this.exec(req, stdoutPath, stderrPath);
  }

  protected async exec(
    req: CommandRequest,
    stdoutPath: string,
    stderrPath: string,
  ): Promise<CommandResult> {
    const policy = this.policy;
    const needsShell = isShellCommand(req.command);
    if (needsShell && !policy.allowShell) {
      throw new UsageError(
        `Command requires a shell, which is disallowed by policy: ${req.command}`,
        { details: { reason: 'shell_disallowed' } },
      );
    }

    let bin: string;
    let args: string[];
    let inlineEnv: Record<string, string> = {};

    if (needsShell) {
      bin = req.command;
      args = [];
    } else {
      const parsed = parseCommand(req.command);
      if (!parsed.bin) {
        throw new UsageError(`Could not parse command: ${req.command}`);
      }
      bin = parsed.bin;
      args = parsed.args;
      inlineEnv = parsed.env;
    }

    const env = getSafeEnv(policy, process.env, { ...inlineEnv, ...req.env });

    const stdoutStream = fs.createWriteStream(stdoutPath);
    const stderrStream = fs.createWriteStream(stderrPath);

    let stdoutBytes = 0;
    let stderrBytes = 0;
    let truncated = false;

    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(bin, args, {
        cwd: req.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: needsShell,
        detached: true,
      });

      const finish = () => {
        settled = true;
        clearTimeout(timeoutTimer);
        stdoutStream.end();
        stderrStream.end();
      };

      const timeoutTimer = setTimeout(() => {
        if (settled) return;
        if (child.pid) {
          killProcessTree(child.pid, 'SIGTERM');
        }
        finish();
        reject(
          new TimeoutError(`Command timed out after ${policy.timeoutMs}ms: ${req.command}`, {
            details: { label: req.label, stdoutPath, stderrPath },
          }),
        );
      }, policy.timeoutMs);

      const capture = (stream: fs.WriteStream, chunk: Buffer, otherBytes: number, ownBytes: number) => {
        const total = ownBytes + otherBytes;
        if (total > policy.maxOutputBytes) {
          truncated = true;
          const room = Math.max(0, policy.maxOutputBytes - (ownBytes - chunk.length) - otherBytes);
          stream.write(chunk.subarray(0, room));
          stream.write('\n[Output truncated due to limit]\n');
          if (child.pid) {
            killProcessTree(child.pid, 'SIGTERM');
          }
        } else {
          stream.write(chunk);
        }
      };

      child.stdout?.on('data', (chunk: Buffer) => {
        if (truncated) return;
        stdoutBytes += chunk.length;
        capture(stdoutStream, chunk, stderrBytes, stdoutBytes);
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        if (truncated) return;
        stderrBytes += chunk.length;
        capture(stderrStream, chunk, stdoutBytes, stderrBytes);
      });

      child.on('error', (err) => {
        if (settled) return;
        finish();
        reject(new ProcessError(`Failed to start process: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (settled) return;
        finish();
        resolve({
          exitCode: code ?? -1,
          durationMs: Date.now() - start,
          stdoutPath,
          stderrPath,
          truncated,
        });
      });
    });
  }
}
