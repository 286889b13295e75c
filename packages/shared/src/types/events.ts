/**
 * Base interface for all migration journal events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the migration run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once the plan is built and before the first file is touched.
 */
export interface MigrationStarted extends BaseEvent {
  type: 'MigrationStarted';
  payload: {
    root: string;
    mode: 'walk' | 'glob';
    /** Number of files in the plan */
    fileCount: number;
    dryRun: boolean;
  };
}

/** Emitted after rewritten content has been committed to the original path */
export interface FileRewritten extends BaseEvent {
  type: 'FileRewritten';
  payload: {
    path: string;
    changedLines: number[];
  };
}

/** Emitted after a file has been moved to its snake_case name */
export interface FileRenamed extends BaseEvent {
  type: 'FileRenamed';
  payload: {
    from: string;
    to: string;
  };
}

/** Emitted after every planned change has been applied */
export interface MigrationCompleted extends BaseEvent {
  type: 'MigrationCompleted';
  payload: {
    rewrittenCount: number;
    renamedCount: number;
  };
}

export type MigrationEvent = MigrationStarted | FileRewritten | FileRenamed | MigrationCompleted;

/**
 * Sink for migration events. `write` settles only after the event is stored,
 * so a caller that awaits it knows the step is recorded.
 */
export interface EventWriter {
  write(event: MigrationEvent): Promise<void>;
  close(): Promise<void>;
}
