import path from 'path';
import { Logger, RunPaths, TagshipConfig } from '@tagship/shared';
import { CommandRunner, ProcessRunner } from '@tagship/exec';
import { BuildExecutor } from '../build/executor';
import { GitHubReleaseHost } from '../release/github';
import { ReleaseHost } from '../release/host';
import { LockSnapshot } from '../release/lockfile';
import { ReleasePublisher } from '../release/publisher';
import { LocalArtifactStore } from '../store/artifact-store';
import { VersionResolver } from '../version/resolver';
import { ReleasePipeline } from './pipeline';

export interface PipelineFactoryOptions {
  config: TagshipConfig;
  projectRoot: string;
  runId: string;
  runPaths: RunPaths;
  logger: Logger;
  /** Release credential; only the publisher's host receives it */
  token?: string;
  command?: string[];
  runner?: CommandRunner;
  host?: ReleaseHost;
}

export function createReleaseHost(config: TagshipConfig, token?: string): ReleaseHost | undefined {
  if (!config.release.repo || !token) {
    return undefined;
  }
  return new GitHubReleaseHost({
    repo: config.release.repo,
    token,
    baseUrl: config.release.apiBaseUrl,
  });
}

/**
 * Wires the pipeline from configuration: process runner, build executor,
 * local artifact store and, when a repo and credential are present, the
 * GitHub-backed publisher.
 */
export function createReleasePipeline(options: PipelineFactoryOptions): ReleasePipeline {
  const { config, projectRoot, runId, runPaths, logger } = options;
  const projectDir = path.resolve(projectRoot, config.project.root);

  const runner =
    options.runner ??
    new ProcessRunner(
      {
        envAllowlist: config.exec.envAllowlist,
        allowShell: config.exec.allowShell,
        maxOutputBytes: config.exec.maxOutputBytes,
        timeoutMs: config.exec.timeoutMs,
      },
      runPaths.toolLogsDir,
    );
  const store = new LocalArtifactStore(path.resolve(projectRoot, config.store.dir));
  const host = options.host ?? createReleaseHost(config, options.token);

  const publisher =
    host &&
    new ReleasePublisher({
      tool: config.tool,
      projectRoot: projectDir,
      store,
      host,
      lockSnapshot: new LockSnapshot(config.lockfile, runner),
      lockFileName: path.basename(config.lockfile.path),
      release: config.release,
      retry: config.retry,
      stagingDir: path.join(runPaths.stagingDir, 'release'),
      logger,
      runId,
    });

  return new ReleasePipeline({
    config,
    projectRoot,
    runId,
    runPaths,
    logger,
    versionResolver: new VersionResolver({ source: config.project.metadata }),
    builder: new BuildExecutor({
      projectRoot: projectDir,
      tool: config.tool,
      toolchain: config.toolchain,
      retry: config.retry,
      runner,
      logger,
      runId,
    }),
    store,
    publisher,
    command: options.command,
  });
}
