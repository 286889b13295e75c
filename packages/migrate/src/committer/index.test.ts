import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  ConsoleLogger,
  DEFAULT_EXTENSION_MAP,
  FileSystemError,
  type EventWriter,
  type MigrationEvent,
} from '@snakify/shared';
import { TreeWalker } from '../scanner';
import { planMigration } from '../planner';
import { commitPlan } from './index';

class MemoryJournal implements EventWriter {
  readonly events: MigrationEvent[] = [];

  async write(event: MigrationEvent): Promise<void> {
    this.events.push(event);
  }

  async close(): Promise<void> {}
}

class SlowJournal extends MemoryJournal {
  async write(event: MigrationEvent): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 5));
    await super.write(event);
  }
}

describe('commitPlan', () => {
  let tmpDir: string;
  let journal: MemoryJournal;
  const logger = new ConsoleLogger({ level: 'silent' });

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'snakify-commit-test-'));
    journal = new MemoryJournal();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  async function buildPlan() {
    const files = await new TreeWalker().walk(tmpDir, { extensions: DEFAULT_EXTENSION_MAP });
    return planMigration(files, {
      root: tmpDir,
      mode: 'walk',
      extensions: DEFAULT_EXTENSION_MAP,
    });
  }

  it('writes rewritten content and then renames each file', async () => {
    await createFiles({
      'FooBar.cxx': '#include "FooBar.h"\nusing namespace FooBar;\n',
      'FooBar.h': 'namespace FooBar {\n}\n',
      'ab.cxx': 'int main() {}\n',
    });

    const result = await commitPlan(await buildPlan(), { runId: 'run-1', journal, logger });

    expect((await fs.readdir(tmpDir)).sort()).toEqual(['ab.cc', 'foo_bar.cc', 'foo_bar.h']);
    expect(await fs.readFile(path.join(tmpDir, 'foo_bar.cc'), 'utf8')).toBe(
      '#include "foo_bar.h"\nusing namespace foobar;\n',
    );
    expect(await fs.readFile(path.join(tmpDir, 'foo_bar.h'), 'utf8')).toBe(
      'namespace foobar {\n}\n',
    );
    expect(await fs.readFile(path.join(tmpDir, 'ab.cc'), 'utf8')).toBe('int main() {}\n');
    expect(result.rewritten.map((c) => c.file.path)).toEqual(['FooBar.cxx', 'FooBar.h']);
    expect(result.renamed.map((c) => c.file.path)).toEqual(['FooBar.cxx', 'FooBar.h', 'ab.cxx']);
  });

  it('journals each step in commit order', async () => {
    await createFiles({ 'FooBar.h': 'namespace FooBar {}\n', 'ab.cxx': '' });

    await commitPlan(await buildPlan(), { runId: 'run-2', journal, logger });

    expect(journal.events.map((e) => e.type)).toEqual([
      'MigrationStarted',
      'FileRewritten',
      'FileRenamed',
      'FileRenamed',
      'MigrationCompleted',
    ]);
    expect(journal.events.every((e) => e.runId === 'run-2' && e.schemaVersion === 1)).toBe(true);
    expect(journal.events[0].payload).toEqual({
      root: tmpDir,
      mode: 'walk',
      fileCount: 2,
      dryRun: false,
    });
    expect(journal.events[1].payload).toEqual({ path: 'FooBar.h', changedLines: [1] });
    expect(journal.events[2].payload).toEqual({ from: 'FooBar.h', to: 'foo_bar.h' });
    expect(journal.events[3].payload).toEqual({ from: 'ab.cxx', to: 'ab.cc' });
    expect(journal.events[4].payload).toEqual({ rewrittenCount: 1, renamedCount: 2 });
  });

  it('prints one progress line per file', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    await createFiles({ 'FooBar.h': '', 'sub/Guard.h': '' });

    await commitPlan(await buildPlan(), { runId: 'run-3', logger: new ConsoleLogger() });

    expect(infoSpy.mock.calls).toEqual([['refactor FooBar.h ..'], ['refactor sub/Guard.h ..']]);
  });

  it('changes nothing on disk in dry-run mode', async () => {
    await createFiles({ 'FooBar.h': 'namespace FooBar {}\n' });

    const result = await commitPlan(await buildPlan(), {
      runId: 'run-4',
      journal,
      logger,
      dryRun: true,
    });

    expect(await fs.readdir(tmpDir)).toEqual(['FooBar.h']);
    expect(await fs.readFile(path.join(tmpDir, 'FooBar.h'), 'utf8')).toBe(
      'namespace FooBar {}\n',
    );
    expect(result.renamed).toHaveLength(1);
    expect(result.rewritten).toHaveLength(1);
    expect(journal.events.map((e) => e.type)).toEqual(['MigrationStarted', 'MigrationCompleted']);
  });

  it('waits for each journal entry before starting the next step', async () => {
    await createFiles({ 'Alpha.h': 'namespace Alpha {}\n', 'Beta.h': 'namespace Beta {}\n' });
    const plan = await buildPlan();
    const slowJournal = new SlowJournal();
    const journaledAtRename: string[][] = [];
    const recordingFs = {
      rename: async (from: string, to: string) => {
        journaledAtRename.push(slowJournal.events.map((e) => e.type));
        await fs.rename(from, to);
      },
    };

    await commitPlan(plan, { runId: 'run-6', journal: slowJournal, logger, fs: recordingFs });

    expect(journaledAtRename).toEqual([
      ['MigrationStarted', 'FileRewritten'],
      ['MigrationStarted', 'FileRewritten', 'FileRenamed', 'FileRewritten'],
    ]);
    expect(slowJournal.events).toHaveLength(6);
  });

  it('aborts on the first rename failure and keeps earlier commits', async () => {
    await createFiles({ 'Alpha.h': 'namespace Alpha {}\n', 'Beta.h': 'namespace Beta {}\n' });
    const plan = await buildPlan();
    let calls = 0;
    const flakyFs = {
      rename: async (from: string, to: string) => {
        calls += 1;
        if (calls === 2) {
          throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
        }
        await fs.rename(from, to);
      },
    };

    const error = await commitPlan(plan, { runId: 'run-5', journal, logger, fs: flakyFs }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error).toMatchObject({
      message: 'Failed to rename Beta.h to beta.h: permission denied',
      details: { errno: 'EACCES' },
    });
    expect((await fs.readdir(tmpDir)).sort()).toEqual(['Beta.h', 'alpha.h']);
    // Beta.h was rewritten before its rename failed
    expect(await fs.readFile(path.join(tmpDir, 'Beta.h'), 'utf8')).toBe('namespace beta {}\n');
    expect(journal.events.map((e) => e.type)).toEqual([
      'MigrationStarted',
      'FileRewritten',
      'FileRenamed',
      'FileRewritten',
    ]);
  });
});
