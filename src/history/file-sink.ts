/**
 * File-backed history sink.
 *
 * One JSON document per scope at `<baseDir>/<domain>/<sessionId>.json`.
 * Writes go to a temp file that is renamed over the target, and existing
 * records are carried over unchanged.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { HistoryFileSchema, type HistoryFile, type HistoryRecord } from '../types/history.js';
import { IsolatedHistorySink } from './history-sink.js';
import type { HistoryIsolation } from './isolation.js';

export const HISTORY_FILE_VERSION = 1;

export class FileHistorySink extends IsolatedHistorySink {
  /** Serializes read-modify-write cycles within this process */
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly baseDir: string) {
    super();
  }

  /**
   * Path of the history document for a scope.
   */
  getFilePath(isolation: HistoryIsolation): string {
    return path.join(this.baseDir, isolation.domain, `${isolation.sessionId}.json`);
  }

  protected async read(isolation: HistoryIsolation): Promise<HistoryRecord[]> {
    const file = await this.loadFile(isolation);
    return file ? file.records : [];
  }

  protected write(isolation: HistoryIsolation, record: HistoryRecord): Promise<void> {
    const next = this.pending.then(() => this.append(isolation, record));
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async append(isolation: HistoryIsolation, record: HistoryRecord): Promise<void> {
    const existing = await this.loadFile(isolation);
    const file: HistoryFile = {
      version: HISTORY_FILE_VERSION,
      domain: isolation.domain,
      sessionId: isolation.sessionId,
      records: [...(existing?.records ?? []), record],
    };

    const filePath = this.getFilePath(isolation);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tempPath, JSON.stringify(file, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  }

  /**
   * Load and validate the scope's document.
   *
   * @returns null when no document exists yet.
   * @throws Error when the document exists but is corrupt or belongs to
   * another scope, so that a later write cannot clobber it.
   */
  private async loadFile(isolation: HistoryIsolation): Promise<HistoryFile | null> {
    const filePath = this.getFilePath(isolation);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Corrupt history file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = HistoryFileSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Invalid history file ${filePath}: ${result.error.message}`);
    }
    if (result.data.domain !== isolation.domain || result.data.sessionId !== isolation.sessionId) {
      throw new Error(`History file ${filePath} belongs to ${result.data.domain}/${result.data.sessionId}`);
    }
    return result.data;
  }
}
