/**
 * In-process history sink for tests and embedding.
 */

import type { HistoryRecord } from '../types/history.js';
import { IsolatedHistorySink } from './history-sink.js';
import type { HistoryIsolation } from './isolation.js';

export class MemoryHistorySink extends IsolatedHistorySink {
  private readonly scopes = new Map<string, HistoryRecord[]>();

  /** Number of records stored across all scopes */
  get size(): number {
    let total = 0;
    for (const records of this.scopes.values()) total += records.length;
    return total;
  }

  protected async write(isolation: HistoryIsolation, record: HistoryRecord): Promise<void> {
    const key = isolation.toString();
    const records = this.scopes.get(key) ?? [];
    records.push(structuredClone(record));
    this.scopes.set(key, records);
  }

  protected async read(isolation: HistoryIsolation): Promise<HistoryRecord[]> {
    return (this.scopes.get(isolation.toString()) ?? []).map((r) => structuredClone(r));
  }
}
