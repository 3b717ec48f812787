/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the pipeline run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Terminal and non-terminal states of a pipeline job. */
export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled' | 'skipped';

/**
 * Emitted when a pipeline run starts.
 */
export interface PipelineStarted extends BaseEvent {
  type: 'PipelineStarted';
  payload: {
    /** Tag that triggered the run, if any */
    tag?: string;
    /** Target triples in the matrix, host last */
    targets: string[];
    dryRun: boolean;
  };
}

/** Emitted once the release version has been resolved from project metadata */
export interface VersionResolved extends BaseEvent {
  type: 'VersionResolved';
  payload: {
    version: string;
    source: 'cargo' | 'npm' | 'explicit';
    /** Whether the tag was compared against the version */
    tagChecked: boolean;
  };
}

/** Emitted when a job leaves the pending state */
export interface JobStarted extends BaseEvent {
  type: 'JobStarted';
  payload: {
    jobId: string;
    target?: string;
  };
}

/** Emitted after each step of a build job */
export interface StepFinished extends BaseEvent {
  type: 'StepFinished';
  payload: {
    jobId: string;
    step: string;
    command?: string;
    exitCode?: number;
    durationMs: number;
    success: boolean;
  };
}

/** Emitted when a job reaches a terminal state */
export interface JobFinished extends BaseEvent {
  type: 'JobFinished';
  payload: {
    jobId: string;
    target?: string;
    status: JobStatus;
    durationMs: number;
    error?: string;
  };
}

/** Emitted when an archive has been written to the artifact store */
export interface ArtifactDeposited extends BaseEvent {
  type: 'ArtifactDeposited';
  payload: {
    name: string;
    sha256: string;
    sizeBytes: number;
  };
}

/** Emitted before an externally facing operation is retried */
export interface RetryScheduled extends BaseEvent {
  type: 'RetryScheduled';
  payload: {
    operation: string;
    attempt: number;
    delayMs: number;
    error: string;
  };
}

/** Emitted when the publish job does not run */
export interface PublishSkipped extends BaseEvent {
  type: 'PublishSkipped';
  payload: {
    reason: 'prerequisite-failed' | 'dry-run';
    blockingJobs: string[];
  };
}

/** Emitted once the release object exists with all files attached */
export interface ReleasePublished extends BaseEvent {
  type: 'ReleasePublished';
  payload: {
    tag: string;
    name: string;
    files: string[];
    url?: string;
  };
}

/** Emitted when the run is over, whatever the outcome */
export interface PipelineFinished extends BaseEvent {
  type: 'PipelineFinished';
  payload: {
    status: 'success' | 'failure';
    durationMs: number;
    published: boolean;
  };
}

/**
 * Union type of all pipeline events.
 * Use discriminated union on the 'type' field for type narrowing.
 */
export type PipelineEvent =
  | PipelineStarted
  | VersionResolved
  | JobStarted
  | StepFinished
  | JobFinished
  | ArtifactDeposited
  | RetryScheduled
  | PublishSkipped
  | ReleasePublished
  | PipelineFinished;

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; spread it into the event literal.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}

/**
 * Interface for writing events to persistent storage.
 */
export interface EventWriter {
  /**
   * Write an event to storage.
   * @param event - The event to write
   */
  write(event: PipelineEvent): void;
  /**
   * Close the writer and flush any pending events.
   */
  close(): Promise<void>;
}
