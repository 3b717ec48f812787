import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  AuthenticationError,
  LockfileConfigSchema,
  PublishBlockedError,
  ReleaseExistsError,
  TransientError,
} from '@tagship/shared';
import type { CommandRunner } from '@tagship/exec';
import { expandMatrix } from '../matrix/targets';
import { LocalArtifactStore } from '../store/artifact-store';
import { LockSnapshot } from './lockfile';
import { ReleasePublisher, blockingJobs, planRelease } from './publisher';
import type { JobOutcome } from './publisher';
import { InMemoryReleaseHost } from '../__fixtures__/release-host';
import { createMockLogger } from '../__fixtures__/logger';
import { configForTest } from '../__fixtures__/test-config';

const config = configForTest();
const targets = expandMatrix(config.matrix);
const ARCHIVES = [
  'mytool-v1.2.3-x86_64-unknown-linux-gnu.tar.gz',
  'mytool-v1.2.3-x86_64-unknown-linux-musl.tar.gz',
  'mytool-v1.2.3-x86_64-apple-darwin.tar.gz',
];

function succeeded(): JobOutcome[] {
  return targets.map((t) => ({ id: `build (${t.triple})`, status: 'succeeded' }));
}

describe('blockingJobs', () => {
  it('is empty when every target succeeded', () => {
    expect(blockingJobs(targets, succeeded())).toEqual([]);
  });

  it('lists failed, cancelled and absent jobs', () => {
    const jobs: JobOutcome[] = [
      { id: 'build (x86_64-unknown-linux-gnu)', status: 'succeeded' },
      { id: 'build (x86_64-unknown-linux-musl)', status: 'failed' },
    ];

    expect(blockingJobs(targets, jobs)).toEqual([
      'build (x86_64-unknown-linux-musl)',
      'build (x86_64-apple-darwin)',
    ]);
  });
});

describe('planRelease', () => {
  it('attaches the lock file and one archive per target', () => {
    expect(planRelease('mytool', 'Cargo.lock', { version: '1.2.3', targets, jobs: succeeded() })).toEqual({
      tag: 'v1.2.3',
      name: 'v1.2.3',
      files: ['Cargo.lock', ...ARCHIVES],
    });
  });

  it('throws PublishBlockedError when a job did not succeed', () => {
    const jobs = succeeded();
    jobs[2] = { ...jobs[2], status: 'cancelled' };

    expect(() => planRelease('mytool', 'Cargo.lock', { version: '1.2.3', targets, jobs })).toThrow(
      'Publish blocked by unsuccessful jobs: build (x86_64-apple-darwin)',
    );
  });
});

describe('ReleasePublisher', () => {
  let tmpDir: string;
  let projectRoot: string;
  let store: LocalArtifactStore;
  let host: InMemoryReleaseHost;
  let runner: CommandRunner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagship-publish-'));
    projectRoot = path.join(tmpDir, 'project');
    await fs.ensureDir(projectRoot);
    store = new LocalArtifactStore(path.join(tmpDir, 'store'));
    host = new InMemoryReleaseHost();
    runner = {
      run: vi.fn(async () => {
        await fs.writeFile(path.join(projectRoot, 'Cargo.lock'), '# regenerated');
        return { exitCode: 0, durationMs: 1, stdoutPath: '/o', stderrPath: '/e', truncated: false };
      }),
    };
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  async function deposit(names: string[]) {
    for (const name of names) {
      const file = path.join(tmpDir, name);
      await fs.writeFile(file, `bytes of ${name}`);
      await store.put(name, file);
    }
  }

  function publisher(logger = createMockLogger(), release = config.release) {
    return new ReleasePublisher({
      tool: 'mytool',
      projectRoot,
      store,
      host,
      lockSnapshot: new LockSnapshot(LockfileConfigSchema.parse({}), runner),
      lockFileName: 'Cargo.lock',
      release,
      retry: config.retry,
      stagingDir: path.join(tmpDir, 'staging'),
      logger,
      runId: 'r1',
    });
  }

  it('creates one release with the lock file and every archive', async () => {
    await deposit(ARCHIVES);
    const logger = createMockLogger();

    const manifest = await publisher(logger).publish({ version: '1.2.3', targets, jobs: succeeded() });

    expect(manifest).toEqual({
      tag: 'v1.2.3',
      name: 'v1.2.3',
      files: ['Cargo.lock', ...ARCHIVES],
      url: 'https://example.test/releases/v1.2.3',
    });
    expect(host.assetNames('v1.2.3')).toEqual(['Cargo.lock', ...ARCHIVES]);
    expect(host.releases.size).toBe(1);
    const release = host.releases.get('v1.2.3');
    expect(release?.draft).toBe(false);
    expect(host.calls).toEqual([
      'find v1.2.3',
      'create v1.2.3',
      'upload Cargo.lock',
      ...ARCHIVES.map((name) => `upload ${name}`),
      'publish v1.2.3',
    ]);
    expect(release && host.assets.get(release.id)?.get('Cargo.lock')?.toString()).toBe('# regenerated');
    expect(logger.trace).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'ReleasePublished' }),
      'Published v1.2.3 with 4 files',
    );
  });

  it('does nothing when a job failed', async () => {
    const jobs = succeeded();
    jobs[0] = { ...jobs[0], status: 'failed' };

    await expect(publisher().publish({ version: '1.2.3', targets, jobs })).rejects.toThrow(
      PublishBlockedError,
    );
    expect(host.calls).toEqual([]);
    expect(runner.run).not.toHaveBeenCalled();
  });

  it('names missing archives before touching the host', async () => {
    await deposit(ARCHIVES.slice(0, 2));

    const error = await publisher()
      .publish({ version: '1.2.3', targets, jobs: succeeded() })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: 'ArtifactStoreError',
      reason: 'missing',
      message: 'Missing artifacts: mytool-v1.2.3-x86_64-apple-darwin.tar.gz',
    });
    expect(host.calls).toEqual([]);
  });

  it('refuses to publish over an existing release', async () => {
    await deposit(ARCHIVES);
    await host.createRelease({ tag: 'v1.2.3', name: 'v1.2.3', draft: false, prerelease: false });
    host.calls.length = 0;

    await expect(
      publisher().publish({ version: '1.2.3', targets, jobs: succeeded() }),
    ).rejects.toThrow(ReleaseExistsError);
    expect(host.calls).toEqual(['find v1.2.3']);
    expect(host.assetNames('v1.2.3')).toEqual([]);
  });

  it('retries transient upload failures', async () => {
    await deposit(ARCHIVES);
    host.failures.uploadAsset.push(new TransientError('502', { status: 502 }));

    await publisher().publish({ version: '1.2.3', targets, jobs: succeeded() });

    expect(host.calls.filter((c) => c === 'upload Cargo.lock')).toHaveLength(2);
    expect(host.assetNames('v1.2.3')).toHaveLength(4);
  });

  it('does not retry authentication failures', async () => {
    await deposit(ARCHIVES);
    host.failures.createRelease.push(new AuthenticationError('Bad credentials', { status: 401 }));

    await expect(
      publisher().publish({ version: '1.2.3', targets, jobs: succeeded() }),
    ).rejects.toThrow(AuthenticationError);
    expect(host.calls.filter((c) => c.startsWith('create'))).toHaveLength(1);
  });

  it('deletes the draft when an upload fails for good', async () => {
    await deposit(ARCHIVES);
    host.failures.uploadAsset.push(
      undefined,
      undefined,
      new AuthenticationError('Bad credentials', { status: 401 }),
    );

    await expect(
      publisher().publish({ version: '1.2.3', targets, jobs: succeeded() }),
    ).rejects.toThrow(AuthenticationError);
    expect(host.calls).toEqual([
      'find v1.2.3',
      'create v1.2.3',
      'upload Cargo.lock',
      `upload ${ARCHIVES[0]}`,
      `upload ${ARCHIVES[1]}`,
      'delete v1.2.3',
    ]);
    expect(host.releases.has('v1.2.3')).toBe(false);
    expect(host.assets.size).toBe(0);
  });

  it('deletes the draft when publishing it fails', async () => {
    await deposit(ARCHIVES);
    host.failures.publishRelease.push(new AuthenticationError('Forbidden', { status: 403 }));

    await expect(
      publisher().publish({ version: '1.2.3', targets, jobs: succeeded() }),
    ).rejects.toThrow(AuthenticationError);
    expect(host.calls.slice(-2)).toEqual(['publish v1.2.3', 'delete v1.2.3']);
    expect(host.releases.size).toBe(0);
  });

  it('reports the upload failure even when the draft cannot be deleted', async () => {
    await deposit(ARCHIVES);
    const logger = createMockLogger();
    host.failures.uploadAsset.push(new AuthenticationError('Bad credentials', { status: 401 }));
    host.failures.deleteRelease.push(new AuthenticationError('Forbidden', { status: 403 }));

    await expect(
      publisher(logger).publish({ version: '1.2.3', targets, jobs: succeeded() }),
    ).rejects.toThrow('Bad credentials');
    expect(host.releases.get('v1.2.3')?.draft).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      expect.any(AuthenticationError),
      'Draft release v1.2.3 could not be deleted; remove it before retrying',
    );
  });

  it('leaves the release as a draft when configured to', async () => {
    await deposit(ARCHIVES);

    const manifest = await publisher(createMockLogger(), { ...config.release, draft: true }).publish({
      version: '1.2.3',
      targets,
      jobs: succeeded(),
    });

    expect(manifest.files).toEqual(['Cargo.lock', ...ARCHIVES]);
    expect(host.releases.get('v1.2.3')?.draft).toBe(true);
    expect(host.calls).not.toContain('publish v1.2.3');
    expect(host.assetNames('v1.2.3')).toEqual(['Cargo.lock', ...ARCHIVES]);
  });
});
