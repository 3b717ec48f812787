import path from 'node:path';
import { atomicWrite } from '../fs/io';
import { redactForLogs } from '../redaction';
import type { JobStatus } from '../types/events';

/**
 * Schema version for the run summary.
 */
export const RUN_SUMMARY_SCHEMA_VERSION = 1;

export interface JobSummary {
  id: string;
  target?: string;
  status: JobStatus;
  durationMs: number;
  error?: { code: string; message: string };
  artifact?: {
    name: string;
    sha256: string;
    sizeBytes: number;
  };
}

export interface RunSummary {
  schemaVersion: typeof RUN_SUMMARY_SCHEMA_VERSION;
  runId: string;
  command: string[];
  projectRoot: string;
  tag?: string;
  version?: string;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  durationMs: number;
  status: 'success' | 'failure';
  stopReason?: string;
  dryRun: boolean;
  jobs: JobSummary[];
  release?: {
    name: string;
    tag: string;
    url?: string;
    files: string[];
  };
  paths: {
    tracePath: string;
    toolLogsDir: string;
    storeDir: string;
  };
}

export class SummaryWriter {
  static async write(summary: RunSummary, runDir: string): Promise<string> {
    const summaryPath = path.join(runDir, 'summary.json');
    const redactedSummary = redactForLogs(summary);
    const summaryJson = JSON.stringify(redactedSummary, null, 2);
    await atomicWrite(summaryPath, summaryJson);
    return summaryPath;
  }
}
