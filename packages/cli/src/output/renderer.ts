import pc from 'picocolors';
import type { BuildTarget, PipelineReport, ReleaseManifest, ReleasePlan } from '@tagship/core';
import { AppError, JobStatus, JobSummary } from '@tagship/shared';
import { printTable } from './index';

export interface ErrorOutput {
  code: string;
  message: string;
  details?: Record<string, unknown> | string;
}

export interface ReportOutput {
  runId: string;
  status: 'success' | 'failure';
  tag?: string;
  version?: string;
  dryRun: boolean;
  jobs: JobSummary[];
  release?: ReleasePlan | ReleaseManifest;
  error?: ErrorOutput;
  durationMs: number;
  summaryPath: string;
}

export interface VersionOutput {
  version: string;
  source: string;
  tag?: string;
  tagMatches?: boolean;
}

export function errorToJson(error: unknown): ErrorOutput {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return {
    code: 'UnknownError',
    message: error instanceof Error ? error.message : String(error),
  };
}

export function reportToJson(report: PipelineReport): ReportOutput {
  return {
    runId: report.runId,
    status: report.status,
    tag: report.tag,
    version: report.version,
    dryRun: report.dryRun,
    jobs: report.jobs.map((job) => job.toSummary()),
    release: report.release,
    error: report.error === undefined ? undefined : errorToJson(report.error),
    durationMs: report.durationMs,
    summaryPath: report.summaryPath,
  };
}

const STATUS_ICONS: Record<JobStatus, string> = {
  pending: pc.gray('…'),
  running: pc.cyan('▶'),
  succeeded: pc.green('✅'),
  failed: pc.red('❌'),
  cancelled: pc.yellow('⊘'),
  skipped: pc.gray('⏭'),
};

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderReport(report: PipelineReport): void {
    const data = reportToJson(report);
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    const label = data.version ? `v${data.version}` : data.runId;
    if (data.status === 'success') {
      const suffix = data.dryRun ? ' (dry run)' : '';
      console.log(`\n${pc.green(`✅ Run for ${label} succeeded${suffix}.`)}`);
    } else {
      console.log(`\n${pc.red(`❌ Run for ${label} failed.`)}`);
      if (data.error) {
        console.log(`  ${pc.bold('Reason:')} ${data.error.code}: ${data.error.message}`);
      }
    }

    if (data.jobs.length > 0) {
      console.log(pc.bold('\nJobs:'));
      for (const job of data.jobs) {
        this.renderJob(job);
      }
    }

    if (data.release) {
      this.renderRelease(data.release, data.dryRun);
    }

    console.log(pc.bold('\nArtifacts:'));
    console.log(`  Run ID: ${data.runId}`);
    console.log(`  Summary: ${data.summaryPath}`);

    if (data.status === 'failure') {
      console.log(pc.bold('\nNext steps:'));
      console.log(`  - Inspect the tool logs next to ${data.summaryPath}.`);
      console.log(`  - Re-run with ${pc.cyan('--verbose')} for step-level output.`);
    }
  }

  private renderJob(job: JobSummary): void {
    const parts = [`  ${STATUS_ICONS[job.status]} ${job.id}`, job.status];
    if (job.status === 'succeeded' || job.status === 'failed') {
      parts.push(formatDuration(job.durationMs));
    }
    if (job.artifact) {
      parts.push(job.artifact.name);
    }
    console.log(parts.join('  '));
    if (job.error) {
      console.log(`      ${pc.red(`${job.error.code}: ${job.error.message}`)}`);
    }
  }

  private renderRelease(release: ReleasePlan | ReleaseManifest, dryRun: boolean): void {
    console.log(pc.bold(dryRun ? '\nWould publish:' : '\nRelease:'));
    console.log(`  Name: ${release.name}`);
    if ('url' in release) {
      console.log(`  URL: ${release.url}`);
    }
    console.log('  Files:');
    release.files.forEach((file) => console.log(`    - ${file}`));
  }

  renderVersion(data: VersionOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      // Bare value so CI can capture it with $(...)
      console.log(data.version);
    }
  }

  renderTargets(targets: BuildTarget[]): void {
    if (this.isJson) {
      console.log(JSON.stringify(targets, null, 2));
      return;
    }
    if (targets.length === 0) {
      console.log(pc.gray('The build matrix is empty.'));
      return;
    }
    printTable(
      targets.map((t) => ({
        triple: t.triple,
        runsOn: t.runsOn,
        host: t.host ? 'yes' : 'no',
        systemPackages: t.systemPackages.join(' ') || '-',
      })),
      { head: ['Target', 'Runner', 'Host', 'System packages'] },
    );
  }

  /** Prints an error that ended the command. */
  renderError(error: unknown, verbose: boolean): void {
    if (this.isJson) {
      console.log(JSON.stringify({ error: errorToJson(error) }));
      return;
    }

    console.error(pc.red(`❌ Error: ${(error instanceof Error && error.message) || String(error)}`));
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}
