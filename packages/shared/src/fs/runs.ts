import * as fs from 'fs/promises';
import { join } from './path';

export const TAGSHIP_DIR = '.tagship';
export const RUNS_DIR = 'runs';

export interface RunPaths {
  root: string;
  trace: string;
  summary: string;
  toolLogsDir: string;
  /** Scratch space for archives before they are deposited */
  stagingDir: string;
}

/**
 * Computes the run directory layout without touching the filesystem.
 */
export function getRunPaths(baseDir: string, runId: string): RunPaths {
  const root = join(baseDir, TAGSHIP_DIR, RUNS_DIR, runId);
  return {
    root,
    trace: join(root, 'trace.jsonl'),
    summary: join(root, 'summary.json'),
    toolLogsDir: join(root, 'tool_logs'),
    stagingDir: join(root, 'staging'),
  };
}

/**
 * Creates the directory structure for a specific run.
 * Returns the paths to the standard run files.
 */
export async function createRunDir(baseDir: string, runId: string): Promise<RunPaths> {
  const paths = getRunPaths(baseDir, runId);
  await fs.mkdir(paths.root, { recursive: true });
  await fs.mkdir(paths.toolLogsDir, { recursive: true });
  await fs.mkdir(paths.stagingDir, { recursive: true });
  return paths;
}

/**
 * Builds a sortable, collision-resistant run id such as `20260218T101500Z-3f9a`.
 */
export function newRunId(now: Date = new Date(), suffix?: string): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  const tail = suffix ?? Math.random().toString(16).slice(2, 6);
  return `${stamp}-${tail}`;
}
