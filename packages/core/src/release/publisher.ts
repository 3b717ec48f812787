import { promises as fs } from 'fs';
import {
  ArtifactStoreError,
  JobStatus,
  Logger,
  PublishBlockedError,
  ReleaseConfig,
  ReleaseExistsError,
  RetryConfig,
  eventMeta,
} from '@tagship/shared';
import { BuildTarget, jobIdFor } from '../matrix/targets';
import { artifactName } from '../package/naming';
import { ArtifactStore } from '../store/artifact-store';
import { withRetry } from '../common/retry';
import { releaseTagFor } from '../version/tag';
import { LockSnapshot } from './lockfile';
import { ReleaseHost, ReleaseInfo } from './host';

export interface JobOutcome {
  id: string;
  status: JobStatus;
}

export interface PublishRequest {
  version: string;
  /** Every target of the matrix, host included */
  targets: BuildTarget[];
  jobs: JobOutcome[];
}

export interface ReleasePlan {
  tag: string;
  name: string;
  /** Lock file first, then one archive per target */
  files: string[];
}

export interface ReleaseManifest extends ReleasePlan {
  url: string;
}

export interface ReleasePublisherOptions {
  tool: string;
  projectRoot: string;
  store: ArtifactStore;
  host: ReleaseHost;
  lockSnapshot: LockSnapshot;
  /** Lock file name as attached to the release */
  lockFileName: string;
  release: ReleaseConfig;
  retry: RetryConfig;
  /** Where archives are copied out of the store before upload */
  stagingDir: string;
  logger: Logger;
  runId: string;
}

/**
 * Jobs that keep the publisher from running: anything not succeeded, plus
 * matrix targets that have no job at all.
 */
export function blockingJobs(targets: BuildTarget[], jobs: JobOutcome[]): string[] {
  const byId = new Map(jobs.map((job) => [job.id, job]));
  const blocking = jobs.filter((job) => job.status !== 'succeeded').map((job) => job.id);
  for (const target of targets) {
    const id = jobIdFor(target);
    if (!byId.has(id)) {
      blocking.push(id);
    }
  }
  return blocking;
}

/**
 * Names and files of the release, after checking the join barrier.
 */
export function planRelease(
  tool: string,
  lockFileName: string,
  request: PublishRequest,
): ReleasePlan {
  const blocking = blockingJobs(request.targets, request.jobs);
  if (blocking.length > 0) {
    throw new PublishBlockedError(blocking);
  }
  const tag = releaseTagFor(request.version);
  return {
    tag,
    name: tag,
    files: [
      lockFileName,
      ...request.targets.map((t) => artifactName(tool, request.version, t.triple)),
    ],
  };
}

export class ReleasePublisher {
  constructor(private readonly options: ReleasePublisherOptions) {}

  plan(request: PublishRequest): ReleasePlan {
    return planRelease(this.options.tool, this.options.lockFileName, request);
  }

  async publish(request: PublishRequest): Promise<ReleaseManifest> {
    const { store, host, logger, runId, retry } = this.options;
    const plan = this.plan(request);
    const archives = plan.files.slice(1);

    // Nothing is created on the host unless every archive is present.
    const missing: string[] = [];
    for (const name of archives) {
      if (!(await store.has(name))) {
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      throw new ArtifactStoreError('missing', `Missing artifacts: ${missing.join(', ')}`, {
        details: { names: missing },
      });
    }

    const lockPath = await this.options.lockSnapshot.regenerate(this.options.projectRoot);
    const staged = [lockPath];
    for (const name of archives) {
      staged.push(await store.get(name, this.options.stagingDir));
    }

    const retryCtx = { logger, runId };
    const existing = await withRetry(
      `find release ${plan.tag}`,
      () => host.findRelease(plan.tag),
      retry,
      retryCtx,
    );
    if (existing) {
      throw new ReleaseExistsError(plan.tag, { details: { url: existing.url } });
    }

    // Assets go onto a draft; the release becomes visible only once every file is attached.
    const draft = await withRetry(
      `create release ${plan.tag}`,
      () =>
        host.createRelease({
          tag: plan.tag,
          name: plan.name,
          body: this.options.release.body,
          draft: true,
          prerelease: this.options.release.prerelease,
        }),
      retry,
      retryCtx,
    );
    await logger.info(`Created draft release ${plan.name}`);

    let released: ReleaseInfo;
    try {
      for (let i = 0; i < staged.length; i++) {
        const fileName = plan.files[i];
        const data = await fs.readFile(staged[i]);
        await withRetry(
          `upload ${fileName}`,
          () => host.uploadAsset(draft, fileName, data),
          retry,
          retryCtx,
        );
        await logger.debug(`Uploaded ${fileName} (${data.length} bytes)`);
      }
      released = this.options.release.draft
        ? draft
        : await withRetry(
            `publish release ${plan.tag}`,
            () => host.publishRelease(draft),
            retry,
            retryCtx,
          );
    } catch (error: unknown) {
      await this.discardDraft(draft);
      throw error;
    }
    await logger.info(`Released ${plan.name}: ${released.url}`);

    const manifest: ReleaseManifest = { ...plan, url: released.url };
    await logger.trace(
      {
        ...eventMeta(runId),
        type: 'ReleasePublished',
        payload: { tag: plan.tag, name: plan.name, files: plan.files, url: released.url },
      },
      `Published ${plan.name} with ${plan.files.length} files`,
    );
    return manifest;
  }

  private async discardDraft(draft: ReleaseInfo): Promise<void> {
    const { host, logger, retry, runId } = this.options;
    try {
      await withRetry(`delete draft ${draft.tag}`, () => host.deleteRelease(draft), retry, {
        logger,
        runId,
      });
      await logger.warn(`Deleted draft release ${draft.tag} after a failed upload`);
    } catch (cleanupError: unknown) {
      // The original failure is rethrown by the caller.
      await logger.error(
        cleanupError instanceof Error ? cleanupError : new Error(String(cleanupError)),
        `Draft release ${draft.tag} could not be deleted; remove it before retrying`,
      );
    }
  }
}
