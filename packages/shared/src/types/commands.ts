/**
 * What a command does, used to pick the error kind and the retry policy.
 *
 * - `install`: system packages, toolchains and targets (externally facing, retried)
 * - `compile`: the release build of one target
 * - `strip`: debug symbol removal
 * - `metadata`: read-only project queries such as `cargo pkgid`
 * - `lockfile`: dependency lock regeneration
 */
export type CommandKind = 'install' | 'compile' | 'strip' | 'metadata' | 'lockfile';

/**
 * Execution limits applied to every command a pipeline job runs.
 *
 * @example
 * ```typescript
 * const policy: CommandPolicy = {
 *   envAllowlist: ['CARGO_HOME', 'RUSTUP_HOME'],
 *   allowShell: false,
 *   maxOutputBytes: 16 * 1024 * 1024,
 *   timeoutMs: 30 * 60 * 1000,
 * };
 * ```
 */
export interface CommandPolicy {
  /** Environment variables passed through in addition to the baseline */
  envAllowlist: string[];
  /** Whether commands containing shell operators may run through a shell */
  allowShell: boolean;
  /** Maximum captured output in bytes before the process is killed */
  maxOutputBytes: number;
  /** Timeout for a single command in milliseconds */
  timeoutMs: number;
}

/**
 * Request to execute one command.
 */
export interface CommandRequest {
  /** The command line to execute */
  command: string;
  /** Working directory for command execution */
  cwd: string;
  /** Environment variables to set for the command */
  env?: Record<string, string>;
  /** Short label used to name the log files, e.g. `compile` */
  label: string;
  kind: CommandKind;
}

/**
 * Result of a command execution.
 */
export interface CommandResult {
  /** Exit code of the process (0 = success) */
  exitCode: number;
  /** Execution duration in milliseconds */
  durationMs: number;
  /** Path to captured stdout */
  stdoutPath: string;
  /** Path to captured stderr */
  stderrPath: string;
  /** Whether output was truncated due to size limits */
  truncated: boolean;
}
