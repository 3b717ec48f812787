import path from 'path';
import pLimit from 'p-limit';
import {
  ConfigError,
  Logger,
  PublishBlockedError,
  RunPaths,
  RunSummary,
  RUN_SUMMARY_SCHEMA_VERSION,
  SummaryWriter,
  TagshipConfig,
  eventMeta,
} from '@tagship/shared';
import { BuiltBinary } from '../build/executor';
import { withRetry } from '../common/retry';
import { BuildTarget, expandMatrix, jobIdFor, selectTarget } from '../matrix/targets';
import { ArtifactPackager } from '../package/packager';
import { ReleaseManifest, ReleasePlan, ReleasePublisher, planRelease } from '../release/publisher';
import { ArtifactStore } from '../store/artifact-store';
import { VersionResolver, resolveVersion } from '../version/resolver';
import { checkTag } from '../version/tag';
import { Job } from './jobs';

export interface TargetBuilder {
  build(target: BuildTarget, jobId: string): Promise<BuiltBinary>;
}

export interface ReleasePipelineOptions {
  config: TagshipConfig;
  projectRoot: string;
  runId: string;
  runPaths: RunPaths;
  logger: Logger;
  versionResolver: VersionResolver;
  builder: TargetBuilder;
  store: ArtifactStore;
  /** Required to publish; dry runs and build-only runs go without */
  publisher?: ReleasePublisher;
  /** argv recorded in the run summary */
  command?: string[];
}

export interface VersionRequest {
  tag?: string;
  /** Overrides metadata resolution, e.g. from an upstream CI job */
  version?: string;
}

export interface RunRequest extends VersionRequest {
  dryRun?: boolean;
}

export interface BuildRequest extends VersionRequest {
  /** Subset of the matrix to build; all targets when empty */
  triples?: string[];
}

export interface PipelineReport {
  runId: string;
  tag?: string;
  version?: string;
  status: 'success' | 'failure';
  dryRun: boolean;
  jobs: Job[];
  release?: ReleasePlan | ReleaseManifest;
  /** First error that decided the outcome */
  error?: unknown;
  durationMs: number;
  summaryPath: string;
}

export const PUBLISH_JOB_ID = 'publish';

/**
 * Resolves the version once, builds every matrix target concurrently,
 * waits for all of them, and publishes only when every build succeeded.
 */
export class ReleasePipeline {
  private readonly targets: BuildTarget[];

  constructor(private readonly options: ReleasePipelineOptions) {
    this.targets = expandMatrix(options.config.matrix);
  }

  get matrix(): BuildTarget[] {
    return this.targets;
  }

  async run(request: RunRequest = {}): Promise<PipelineReport> {
    const dryRun = request.dryRun ?? false;
    return this.execute(request, dryRun, async (version, report) => {
      const jobs = await this.buildAll(version, this.targets);
      report.jobs.push(...jobs);
      await this.publishAfterBarrier(version, jobs, dryRun, report);
    });
  }

  /**
   * Builds and deposits a subset of the matrix without publishing.
   */
  async runBuild(request: BuildRequest = {}): Promise<PipelineReport> {
    const wanted = [...new Set(request.triples ?? [])];
    const targets =
      wanted.length > 0 ? wanted.map((triple) => selectTarget(this.targets, triple)) : this.targets;

    return this.execute(request, false, async (version, report) => {
      report.jobs.push(...(await this.buildAll(version, targets)));
    });
  }

  /**
   * Publishes archives deposited by earlier build runs. The caller vouches
   * that every build job finished, as a CI `needs:` clause does; missing
   * archives still fail before anything is created.
   */
  async runPublish(request: RunRequest = {}): Promise<PipelineReport> {
    const dryRun = request.dryRun ?? false;
    return this.execute(request, dryRun, async (version, report) => {
      const jobs = this.targets.map((t) => new Job(jobIdFor(t), t.triple));
      for (const job of jobs) {
        job.start();
        job.succeed();
      }
      await this.publishAfterBarrier(version, jobs, dryRun, report);
    });
  }

  async resolveVersion(request: VersionRequest): Promise<string> {
    const { config, projectRoot, logger, runId } = this.options;
    const resolved = await resolveVersion(
      this.options.versionResolver,
      path.resolve(projectRoot, config.project.root),
      request.version,
    );

    let tagChecked = false;
    if (request.tag) {
      await checkTag(request.tag, resolved.version, config.release.requireTagMatch, logger);
      tagChecked = true;
    }

    await logger.trace(
      {
        ...eventMeta(runId),
        type: 'VersionResolved',
        payload: { version: resolved.version, source: resolved.source, tagChecked },
      },
      `Version ${resolved.version} (${resolved.source})`,
    );
    return resolved.version;
  }

  /**
   * Fans out one job per target and returns once every job is terminal.
   */
  async buildAll(version: string, targets: BuildTarget[]): Promise<Job[]> {
    const { config } = this.options;
    const limit = pLimit(config.matrix.maxParallel ?? Math.max(1, targets.length));
    let stopScheduling = false;

    const jobs = targets.map((target) => ({ target, job: new Job(jobIdFor(target), target.triple) }));

    await Promise.all(
      jobs.map(({ target, job }) =>
        limit(async () => {
          if (stopScheduling) {
            job.cancel();
            await this.jobFinished(job);
            return;
          }
          const failed = await this.runBuildJob(job, target, version);
          if (failed && config.matrix.failFast) {
            stopScheduling = true;
          }
        }),
      ),
    );

    return jobs.map(({ job }) => job);
  }

  /** Returns true when the job failed. */
  private async runBuildJob(job: Job, target: BuildTarget, version: string): Promise<boolean> {
    const { logger, runId, store, config, runPaths } = this.options;
    const jobLogger = logger.child({ job: job.id });

    job.start();
    await jobLogger.log({
      ...eventMeta(runId),
      type: 'JobStarted',
      payload: { jobId: job.id, target: target.triple },
    });

    try {
      const binary = await this.options.builder.build(target, job.id);
      const packager = new ArtifactPackager(config.tool, path.join(runPaths.stagingDir, 'packed'));
      const artifact = await packager.pack(binary, version);
      const stored = await withRetry(
        `deposit ${artifact.name}`,
        () => store.put(artifact.name, artifact.path),
        config.retry,
        { logger: jobLogger, runId },
      );
      await jobLogger.log({
        ...eventMeta(runId),
        type: 'ArtifactDeposited',
        payload: { name: stored.name, sha256: stored.sha256, sizeBytes: stored.sizeBytes },
      });
      job.succeed(stored);
    } catch (error: unknown) {
      job.fail(error);
      await jobLogger.error(
        error instanceof Error ? error : new Error(String(error)),
        `${job.id} failed`,
      );
    }

    await this.jobFinished(job);
    return job.status === 'failed';
  }

  private async publishAfterBarrier(
    version: string,
    jobs: Job[],
    dryRun: boolean,
    report: PipelineReport,
  ): Promise<void> {
    const { config, logger, runId } = this.options;
    const publishJob = new Job(PUBLISH_JOB_ID);
    report.jobs.push(publishJob);

    const blocking = jobs.filter((job) => job.status !== 'succeeded').map((job) => job.id);
    if (blocking.length > 0) {
      const blocked = new PublishBlockedError(blocking);
      publishJob.skip(blocked);
      report.error = jobs.find((job) => job.status === 'failed')?.error ?? blocked;
      await logger.log({
        ...eventMeta(runId),
        type: 'PublishSkipped',
        payload: { reason: 'prerequisite-failed', blockingJobs: blocking },
      });
      await this.jobFinished(publishJob);
      return;
    }

    const outcomes = jobs.map((job) => ({ id: job.id, status: job.status }));
    const publishRequest = { version, targets: this.targets, jobs: outcomes };

    if (dryRun) {
      const plan = planRelease(config.tool, path.basename(config.lockfile.path), publishRequest);
      report.release = plan;
      publishJob.skip();
      await logger.trace(
        {
          ...eventMeta(runId),
          type: 'PublishSkipped',
          payload: { reason: 'dry-run', blockingJobs: [] },
        },
        `Dry run: would publish ${plan.name} with ${plan.files.join(', ')}`,
      );
      await this.jobFinished(publishJob);
      return;
    }

    publishJob.start();
    try {
      if (!this.options.publisher) {
        throw new ConfigError(
          `Publishing needs a release host: set release.repo and ${config.release.tokenEnv}`,
        );
      }
      report.release = await this.options.publisher.publish(publishRequest);
      publishJob.succeed();
    } catch (error: unknown) {
      publishJob.fail(error);
      report.error = error;
    }
    await this.jobFinished(publishJob);
  }

  private async execute(
    request: VersionRequest,
    dryRun: boolean,
    body: (version: string, report: PipelineReport) => Promise<void>,
  ): Promise<PipelineReport> {
    const { logger, runId, runPaths } = this.options;
    const startedAt = new Date();
    const report: PipelineReport = {
      runId,
      tag: request.tag,
      status: 'failure',
      dryRun,
      jobs: [],
      durationMs: 0,
      summaryPath: runPaths.summary,
    };

    await logger.log({
      ...eventMeta(runId),
      type: 'PipelineStarted',
      payload: { tag: request.tag, targets: this.targets.map((t) => t.triple), dryRun },
    });

    try {
      report.version = await this.resolveVersion(request);
      await body(report.version, report);
    } catch (error: unknown) {
      report.error = error;
    }

    const failed =
      report.error !== undefined ||
      report.jobs.some((job) => job.status === 'failed' || job.status === 'cancelled');
    report.status = failed ? 'failure' : 'success';
    report.durationMs = Date.now() - startedAt.getTime();

    const published = report.release !== undefined && 'url' in report.release;
    await logger.trace(
      {
        ...eventMeta(runId),
        type: 'PipelineFinished',
        payload: { status: report.status, durationMs: report.durationMs, published },
      },
      `Run ${runId} finished: ${report.status}`,
    );

    report.summaryPath = await SummaryWriter.write(this.summarize(report, startedAt), runPaths.root);
    return report;
  }

  private summarize(report: PipelineReport, startedAt: Date): RunSummary {
    const { projectRoot, runPaths, config } = this.options;
    const finishedAt = new Date(startedAt.getTime() + report.durationMs);
    return {
      schemaVersion: RUN_SUMMARY_SCHEMA_VERSION,
      runId: report.runId,
      command: this.options.command ?? [],
      projectRoot,
      tag: report.tag,
      version: report.version,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: report.durationMs,
      status: report.status,
      stopReason: report.error instanceof Error ? report.error.message : undefined,
      dryRun: report.dryRun,
      jobs: report.jobs.map((job) => job.toSummary()),
      release: report.release && {
        name: report.release.name,
        tag: report.release.tag,
        url: 'url' in report.release ? report.release.url : undefined,
        files: report.release.files,
      },
      paths: {
        tracePath: runPaths.trace,
        toolLogsDir: runPaths.toolLogsDir,
        storeDir: path.resolve(projectRoot, config.store.dir),
      },
    };
  }

  private async jobFinished(job: Job): Promise<void> {
    const summary = job.toSummary();
    await this.options.logger.log({
      ...eventMeta(this.options.runId),
      type: 'JobFinished',
      payload: {
        jobId: job.id,
        target: job.target,
        status: job.status,
        durationMs: job.elapsed(),
        error: summary.error?.message,
      },
    });
  }
}
