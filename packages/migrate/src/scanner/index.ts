import nodeFs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import ignore, { type Ignore } from 'ignore';
import { FileSystemError, normalizePath, toAppError } from '@snakify/shared';
import type { SourceFile, WalkOptions } from './types';

export * from './types';

type Fs = Pick<typeof nodeFs, 'readdir'>;

/**
 * Finds the files to migrate under a root directory.
 *
 * `walk` recurses through every subdirectory; `glob` is the legacy flat mode
 * that only matches `*<ext>` in the root itself. Both return files sorted by
 * relative path and raise `FileSystemError` when a directory cannot be read.
 */
export class TreeWalker {
  private fs: Fs;

  constructor(fs: Fs = nodeFs) {
    this.fs = fs;
  }

  async walk(root: string, options: WalkOptions): Promise<SourceFile[]> {
    const ig = this.buildIgnore(options);
    const recognized = new Set(Object.keys(options.extensions));
    const files: SourceFile[] = [];

    const visit = async (dir: string, relativeDir: string) => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        throw toAppError(
          error,
          (m, o) => new FileSystemError(m, o),
          `Cannot read directory ${dir}`,
        );
      }

      for (const entry of entries) {
        const entryRelativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

        if (entry.isDirectory()) {
          // Directory patterns in ignore only match with a trailing slash
          if (ig.ignores(entryRelativePath + '/')) continue;
          await visit(path.join(dir, entry.name), entryRelativePath);
        } else if (entry.isFile()) {
          if (ig.ignores(entryRelativePath)) continue;
          if (!recognized.has(path.extname(entry.name))) continue;
          files.push(this.toSourceFile(root, entryRelativePath));
        }
      }
    };

    await visit(root, '');
    return sortByPath(files);
  }

  async glob(root: string, options: WalkOptions): Promise<SourceFile[]> {
    await this.assertReadable(root);
    const ig = this.buildIgnore(options);
    const patterns = Object.keys(options.extensions).map((ext) => `*${ext}`);

    const matches = await fg(patterns, {
      cwd: root,
      deep: 1,
      onlyFiles: true,
      dot: false,
      caseSensitiveMatch: true,
    });

    const files = matches
      .filter((match) => !ig.ignores(match))
      .map((match) => this.toSourceFile(root, match));
    return sortByPath(files);
  }

  private async assertReadable(root: string): Promise<void> {
    try {
      await this.fs.readdir(root);
    } catch (error) {
      throw toAppError(error, (m, o) => new FileSystemError(m, o), `Cannot read directory ${root}`);
    }
  }

  private buildIgnore(options: WalkOptions): Ignore {
    const ig = ignore();
    if (options.excludes && options.excludes.length > 0) {
      ig.add(options.excludes);
    }
    return ig;
  }

  private toSourceFile(root: string, relativePath: string): SourceFile {
    const absPath = path.join(root, relativePath);
    const ext = path.extname(relativePath);
    return {
      path: normalizePath(relativePath),
      absPath,
      dir: path.dirname(absPath),
      baseName: path.basename(relativePath, ext),
      ext,
    };
  }
}

function sortByPath(files: SourceFile[]): SourceFile[] {
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
