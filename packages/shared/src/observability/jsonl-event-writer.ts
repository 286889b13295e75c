import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { ensureFile } from 'fs-extra';
import { IOError, toAppError } from '../errors';
import { type MigrationEvent, type EventWriter } from '../types/events';

export class JsonlEventWriter implements EventWriter {
  private closed = false;

  private constructor(
    private readonly logPath: string,
    private readonly handle: FileHandle,
  ) {}

  /**
   * Creates the journal (and its directory) if needed and opens it for
   * appending. Throws `IOError` when the path cannot be opened.
   */
  static async open(logPath: string): Promise<JsonlEventWriter> {
    try {
      await ensureFile(logPath);
      return new JsonlEventWriter(logPath, await fs.open(logPath, 'a'));
    } catch (error) {
      throw toAppError(error, (m, o) => new IOError(m, o), `Cannot open journal ${logPath}`);
    }
  }

  /** Resolves once the line has been handed to the OS. */
  async write(event: MigrationEvent): Promise<void> {
    if (this.closed) {
      console.warn(`Attempted to write to closed journal: ${this.logPath}`);
      return;
    }
    try {
      await this.handle.appendFile(JSON.stringify(event) + '\n');
    } catch (error) {
      throw toAppError(
        error,
        (m, o) => new IOError(m, o),
        `Failed to write journal ${this.logPath}`,
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw toAppError(
        error,
        (m, o) => new IOError(m, o),
        `Failed to close journal ${this.logPath}`,
      );
    }
  }
}

/**
 * Discards every event. Used when no journal path is configured.
 */
export class NullEventWriter implements EventWriter {
  async write(_event: MigrationEvent): Promise<void> {}

  async close(): Promise<void> {}
}
