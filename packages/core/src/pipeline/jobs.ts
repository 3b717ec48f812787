import { AppError, JobStatus, JobSummary } from '@tagship/shared';

const TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  pending: ['running', 'cancelled', 'skipped'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
  cancelled: [],
  skipped: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'UnknownError', message: error.message };
  }
  return { code: 'UnknownError', message: String(error) };
}

/**
 * One unit of pipeline work and its lifecycle:
 * `pending -> running -> succeeded | failed`, or `pending -> cancelled | skipped`.
 */
export class Job {
  private _status: JobStatus = 'pending';
  private startedAt?: number;
  private durationMs = 0;
  private _error?: unknown;
  private artifact?: JobSummary['artifact'];

  constructor(
    readonly id: string,
    readonly target?: string,
  ) {}

  get status(): JobStatus {
    return this._status;
  }

  get error(): unknown {
    return this._error;
  }

  start(now = Date.now()): void {
    this.transition('running');
    this.startedAt = now;
  }

  succeed(artifact?: JobSummary['artifact'], now = Date.now()): void {
    this.transition('succeeded');
    this.artifact = artifact;
    this.durationMs = now - (this.startedAt ?? now);
  }

  fail(error: unknown, now = Date.now()): void {
    this.transition('failed');
    this._error = error;
    this.durationMs = now - (this.startedAt ?? now);
  }

  cancel(): void {
    this.transition('cancelled');
  }

  skip(reason?: unknown): void {
    this.transition('skipped');
    this._error = reason;
  }

  elapsed(): number {
    return this.durationMs;
  }

  toSummary(): JobSummary {
    return {
      id: this.id,
      ...(this.target ? { target: this.target } : {}),
      status: this._status,
      durationMs: this.durationMs,
      ...(this._error !== undefined ? { error: describeError(this._error) } : {}),
      ...(this.artifact ? { artifact: this.artifact } : {}),
    };
  }

  private transition(next: JobStatus): void {
    if (!TRANSITIONS[this._status].includes(next)) {
      throw new Error(`Job "${this.id}" cannot move from ${this._status} to ${next}`);
    }
    this._status = next;
  }
}
