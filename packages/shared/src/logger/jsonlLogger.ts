import * as fs from 'fs/promises';
import { PipelineEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import type { Logger } from './types';

/**
 * Appends every structured event to a JSONL trace file and forwards
 * plain log lines to an inner logger.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly inner: Logger;

  constructor(filePath: string, inner: Logger) {
    this.filePath = filePath;
    this.inner = inner;
  }

  async log(event: PipelineEvent): Promise<void> {
    const redactedEvent = redactForLogs(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Losing a trace line must not fail the release.
      this.inner.warn(
        `Failed to write to trace file at ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    await this.inner.log(event);
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    await this.log(event);
    await this.inner.info(message);
  }

  debug(message: string) {
    return this.inner.debug(message);
  }

  info(message: string) {
    return this.inner.info(message);
  }

  warn(message: string) {
    return this.inner.warn(message);
  }

  error(error: Error, message?: string) {
    return this.inner.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.inner.child(bindings));
  }
}
