import nodeFs from 'node:fs/promises';
import path from 'node:path';
import {
  FileSystemError,
  errnoCode,
  normalizePath,
  toAppError,
  type DiscoveryMode,
  type ExtensionMap,
} from '@snakify/shared';
import { toSnakeCaseOrLower } from '../naming/transformer';
import type { LineRule } from '../rules';
import { readSource, rewriteContent, type SourceReader } from '../rewriter/content-rewriter';
import type { SourceFile } from '../scanner/types';
import type { MigrationPlan, PlannedChange } from './types';

export * from './types';

export interface PlannerFs extends SourceReader {
  stat(path: string): Promise<{ dev: number; ino: number }>;
}

export interface PlanOptions {
  root: string;
  mode: DiscoveryMode;
  extensions: ExtensionMap;
  rules?: readonly LineRule[];
  fs?: PlannerFs;
}

/**
 * `FooBar` + `.cxx` -> `foo_bar.cc`. Extensions missing from the map are kept.
 */
export function targetFileName(baseName: string, ext: string, extensions: ExtensionMap): string {
  const mapped = Object.prototype.hasOwnProperty.call(extensions, ext) ? extensions[ext] : ext;
  return `${toSnakeCaseOrLower(baseName)}${mapped}`;
}

/**
 * Reads and rewrites every file in memory and works out its new name.
 * Throws `FileSystemError` before anything is modified when two files would
 * land on the same name or a target already exists on disk.
 */
export async function planMigration(
  files: SourceFile[],
  options: PlanOptions,
): Promise<MigrationPlan> {
  const fs: PlannerFs = options.fs ?? nodeFs;
  const changes: PlannedChange[] = [];
  const claimed = new Map<string, SourceFile>();

  for (const file of files) {
    const targetName = targetFileName(file.baseName, file.ext, options.extensions);
    const targetPath = path.join(file.dir, targetName);
    const renamed = targetPath !== file.absPath;

    const previous = claimed.get(targetPath);
    if (previous) {
      throw new FileSystemError(
        `Both ${previous.path} and ${file.path} would be renamed to ${targetName}`,
        { details: { source: file.path, conflictsWith: previous.path, target: targetName } },
      );
    }
    claimed.set(targetPath, file);

    if (renamed) {
      await assertTargetFree(fs, file, targetPath, options.root);
    }

    const rewrite = rewriteContent(await readSource(file.absPath, fs), options.rules);

    changes.push({
      file,
      targetPath,
      targetRelativePath: normalizePath(path.relative(options.root, targetPath)),
      rewrittenContent: rewrite.content,
      changedLines: rewrite.changedLines,
      contentChanged: rewrite.changedLines.length > 0,
      renamed,
    });
  }

  return { root: options.root, mode: options.mode, changes };
}

async function assertTargetFree(
  fs: PlannerFs,
  file: SourceFile,
  targetPath: string,
  root: string,
): Promise<void> {
  let target;
  try {
    target = await fs.stat(targetPath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return;
    throw toAppError(error, (m, o) => new FileSystemError(m, o), `Cannot stat ${targetPath}`);
  }

  // A case-only rename on a case-insensitive file system stats the source itself
  const source = await fs.stat(file.absPath);
  if (source.dev === target.dev && source.ino === target.ino) return;

  const relativeTarget = normalizePath(path.relative(root, targetPath));
  throw new FileSystemError(`Cannot rename ${file.path}: ${relativeTarget} already exists`, {
    details: { source: file.path, target: relativeTarget },
  });
}
