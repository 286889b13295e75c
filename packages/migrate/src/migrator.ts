import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  ConfigSchema,
  JsonlEventWriter,
  NullEventWriter,
  UsageError,
  logger as defaultLogger,
  type Config,
  type DiscoveryMode,
  type EventWriter,
  type Logger,
} from '@snakify/shared';
import { commitPlan, type RenameFs } from './committer';
import { planMigration, type PlannerFs } from './planner';
import type { LineRule } from './rules';
import { TreeWalker } from './scanner';

export interface MigrateDeps {
  walker?: TreeWalker;
  logger?: Logger;
  /** Overrides `config.journal` */
  journal?: EventWriter;
  rules?: readonly LineRule[];
  fs?: PlannerFs & RenameFs;
  runId?: string;
}

export interface FileReport {
  from: string;
  to: string;
  changedLines: number[];
  rewritten: boolean;
  renamed: boolean;
}

export interface MigrationReport {
  runId: string;
  root: string;
  mode: DiscoveryMode;
  dryRun: boolean;
  files: FileReport[];
  rewrittenCount: number;
  renamedCount: number;
  unchangedCount: number;
}

/**
 * Migrates every recognized file under `config.root`: discover, plan the
 * whole run in memory, then commit file by file.
 */
export async function migrate(config: Config, deps: MigrateDeps = {}): Promise<MigrationReport> {
  if (!config.root) {
    throw new UsageError('No directory to migrate was given');
  }
  const root = path.resolve(config.root);
  const runId = deps.runId ?? randomUUID();
  const log = (deps.logger ?? defaultLogger).child({ run: runId.slice(0, 8) });
  const walker = deps.walker ?? new TreeWalker();
  const walkOptions = { extensions: config.extensions, excludes: config.excludes };

  await log.debug(`discovering files under ${root} (${config.mode} mode)`);
  const discovered =
    config.mode === 'glob'
      ? await walker.glob(root, walkOptions)
      : await walker.walk(root, walkOptions);

  const plan = await planMigration(discovered, {
    root,
    mode: config.mode,
    extensions: config.extensions,
    rules: deps.rules,
    fs: deps.fs,
  });
  await log.debug(`planned ${plan.changes.length} file(s)`);

  const ownsJournal = !deps.journal && config.journal !== undefined;
  const journal =
    deps.journal ??
    (config.journal
      ? await JsonlEventWriter.open(path.resolve(config.journal))
      : new NullEventWriter());

  try {
    const result = await commitPlan(plan, {
      runId,
      dryRun: config.dryRun,
      journal,
      logger: deps.logger ?? defaultLogger,
      fs: deps.fs,
    });

    const files = plan.changes.map((change) => ({
      from: change.file.path,
      to: change.targetRelativePath,
      changedLines: change.changedLines,
      rewritten: change.contentChanged,
      renamed: change.renamed,
    }));

    return {
      runId,
      root,
      mode: config.mode,
      dryRun: config.dryRun,
      files,
      rewrittenCount: result.rewritten.length,
      renamedCount: result.renamed.length,
      unchangedCount: files.filter((f) => !f.rewritten && !f.renamed).length,
    };
  } finally {
    if (ownsJournal) {
      await journal.close();
    }
  }
}

/**
 * Migrates `root` with the default configuration.
 */
export function refactorTree(root: string, deps: MigrateDeps = {}): Promise<MigrationReport> {
  return migrate(ConfigSchema.parse({ root }), deps);
}
