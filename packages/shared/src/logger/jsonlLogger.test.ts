import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import { join } from '../fs/path';
import * as os from 'os';
import { JsonlLogger } from './jsonlLogger';
import { ConsoleLogger } from './consoleLogger';
import type { JobFinished } from '../types/events';

const event: JobFinished = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  runId: 'run-1',
  type: 'JobFinished',
  payload: { jobId: 'publish', status: 'succeeded', durationMs: 12 },
};

describe('JsonlLogger', () => {
  let tmpDir: string;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  it('logs events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'tagship-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    await logger.log(event);

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(event));
  });

  it('appends multiple events', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'tagship-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath, new ConsoleLogger());
    const event2 = { ...event, timestamp: '2023-01-01T00:00:01Z' };

    await logger.log(event);
    await logger.log(event2);

    const content = await fs.readFile(logPath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(event);
    expect(JSON.parse(lines[1])).toEqual(event2);
  });

  it('redacts secrets before writing', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'tagship-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    await logger.log({ ...event, payload: { ...event.payload, error: 'rejected TOKEN=abc' } });

    const content = await fs.readFile(logPath, 'utf8');
    expect(JSON.parse(content.trim()).payload.error).toBe('rejected [REDACTED]');
  });

  it('writes the event and forwards the trace message', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'tagship-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    await logger.trace(event, 'publish finished');

    const content = await fs.readFile(logPath, 'utf8');
    expect(content.trim()).toBe(JSON.stringify(event));
    expect(infoSpy).toHaveBeenCalledWith('publish finished');
  });

  it('prefixes messages for child loggers', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null', new ConsoleLogger());
    logger.child({ a: 1 }).child({ b: 'x' }).info('i');
    logger.child({}).warn('w');

    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] i');
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'tagship-logger-test-'));
    // Use a directory path so appendFile fails deterministically (EISDIR).
    const logPath = tmpDir;
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(logger.log(event)).resolves.toBeUndefined();

    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Failed to write to trace file at ${logPath}`),
    );
  });
});
