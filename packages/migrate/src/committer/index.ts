import nodeFs from 'node:fs/promises';
import {
  FileSystemError,
  NullEventWriter,
  logger as defaultLogger,
  toAppError,
  type EventWriter,
  type Logger,
} from '@snakify/shared';
import { writeSource } from '../rewriter/content-rewriter';
import type { MigrationPlan, PlannedChange } from '../planner/types';

export interface RenameFs {
  rename(oldPath: string, newPath: string): Promise<void>;
}

export interface CommitOptions {
  runId: string;
  dryRun?: boolean;
  journal?: EventWriter;
  logger?: Logger;
  fs?: RenameFs;
}

export interface CommitResult {
  /** Changes whose content was (or, in a dry run, would be) rewritten */
  rewritten: PlannedChange[];
  /** Changes whose file was (or, in a dry run, would be) renamed */
  renamed: PlannedChange[];
}

/**
 * Applies a plan one file at a time, in plan order. Each file's content is
 * committed at its original path before the file is renamed, and every step is
 * journaled once it is on disk. The first failure aborts the run; files already
 * committed stay committed.
 */
export async function commitPlan(
  plan: MigrationPlan,
  options: CommitOptions,
): Promise<CommitResult> {
  const journal = options.journal ?? new NullEventWriter();
  const log = options.logger ?? defaultLogger;
  const fs = options.fs ?? nodeFs;
  const dryRun = options.dryRun ?? false;
  const result: CommitResult = { rewritten: [], renamed: [] };

  const meta = () => ({
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: options.runId,
  });

  await journal.write({
    ...meta(),
    type: 'MigrationStarted',
    payload: { root: plan.root, mode: plan.mode, fileCount: plan.changes.length, dryRun },
  });

  for (const change of plan.changes) {
    await log.info(`refactor ${change.file.path} ..`);

    if (change.contentChanged) {
      if (!dryRun) {
        await writeSource(change.file.absPath, change.rewrittenContent);
        await journal.write({
          ...meta(),
          type: 'FileRewritten',
          payload: { path: change.file.path, changedLines: change.changedLines },
        });
      }
      await log.debug(`  rewrote lines ${change.changedLines.join(', ')}`);
      result.rewritten.push(change);
    }

    if (change.renamed) {
      if (!dryRun) {
        try {
          await fs.rename(change.file.absPath, change.targetPath);
        } catch (error) {
          throw toAppError(
            error,
            (m, o) => new FileSystemError(m, o),
            `Failed to rename ${change.file.path} to ${change.targetRelativePath}`,
          );
        }
        await journal.write({
          ...meta(),
          type: 'FileRenamed',
          payload: { from: change.file.path, to: change.targetRelativePath },
        });
      }
      await log.debug(`  renamed to ${change.targetRelativePath}`);
      result.renamed.push(change);
    }
  }

  await journal.write({
    ...meta(),
    type: 'MigrationCompleted',
    payload: { rewrittenCount: result.rewritten.length, renamedCount: result.renamed.length },
  });

  return result;
}
