/**
 * History sink contract.
 *
 * Requests carry their isolation as a required field. IsolatedHistorySink
 * re-validates it before handing off to the storage hooks, so a violation
 * never reaches I/O.
 */

import { HistoryRecordSchema, type HistoryRecord } from '../types/history.js';
import { requireIsolation, type HistoryIsolation } from './isolation.js';

export interface PutHistoryRequest {
  readonly record: HistoryRecord;
  readonly isolation: HistoryIsolation;
}

export interface HistoryQuery {
  readonly projectIdentifier: string;
  readonly isolation: HistoryIsolation;
  /** Maximum records to return, newest first */
  readonly limit?: number;
}

export interface HistorySink {
  put(request: PutHistoryRequest): Promise<void>;
  history(query: HistoryQuery): Promise<HistoryRecord[]>;
}

/**
 * Newest first by timestamp; among equal timestamps the later write first.
 */
export function sortNewestFirst(records: readonly HistoryRecord[]): HistoryRecord[] {
  return [...records].reverse().sort((a, b) => {
    if (a.timestamp === b.timestamp) return 0;
    return a.timestamp < b.timestamp ? 1 : -1;
  });
}

export abstract class IsolatedHistorySink implements HistorySink {
  /**
   * Append a record to the session's history. The record's isolation
   * metadata is stamped from the validated request isolation.
   *
   * @throws IsolationViolationError before any I/O when isolation is invalid.
   */
  async put(request: PutHistoryRequest): Promise<void> {
    const isolation = requireIsolation(request.isolation);
    const record = HistoryRecordSchema.parse({ ...request.record, isolation: isolation.toMetadata() });
    await this.write(isolation, record);
  }

  /**
   * Records of one project within one session, newest first.
   *
   * @throws IsolationViolationError before any I/O when isolation is invalid.
   */
  async history(query: HistoryQuery): Promise<HistoryRecord[]> {
    const isolation = requireIsolation(query.isolation);
    if (typeof query.projectIdentifier !== 'string' || query.projectIdentifier === '') {
      throw new Error('History queries require a project identifier');
    }

    const records = await this.read(isolation);
    const matching = sortNewestFirst(
      records.filter(
        (r) =>
          r.projectIdentifier === query.projectIdentifier &&
          r.isolation.sessionId === isolation.sessionId &&
          r.isolation.domain === isolation.domain
      )
    );
    return query.limit !== undefined ? matching.slice(0, Math.max(0, query.limit)) : matching;
  }

  /** Persist one validated record under the given scope */
  protected abstract write(isolation: HistoryIsolation, record: HistoryRecord): Promise<void>;

  /** All records stored under the given scope, in write order */
  protected abstract read(isolation: HistoryIsolation): Promise<HistoryRecord[]>;
}
