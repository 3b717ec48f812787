import type { PipelineEvent } from '../types/events';
import { redactString } from '../redaction';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Emit debug lines; off unless --verbose */
  verbose?: boolean;
  /** Print structured events as JSON lines */
  events?: boolean;
  /** Keep stdout free for machine-readable output; warnings and errors still print */
  quiet?: boolean;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  log(event: PipelineEvent): void {
    if (!this.options.events || this.options.quiet) return;
    console.log(JSON.stringify(event));
  }

  trace(event: PipelineEvent, message: string): void {
    if (this.options.quiet) return;
    if (this.options.events) {
      console.log(message, JSON.stringify(event));
    } else {
      console.log(message);
    }
  }

  debug(message: string): void {
    if (!this.options.verbose || this.options.quiet) return;
    console.debug(redactString(message).redacted);
  }

  info(message: string): void {
    if (this.options.quiet) return;
    console.info(redactString(message).redacted);
  }

  warn(message: string): void {
    console.warn(redactString(message).redacted);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(redactString(message).redacted, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PipelineEvent) {
    return this.base.log(event);
  }

  trace(event: PipelineEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
