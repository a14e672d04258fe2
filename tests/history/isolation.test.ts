/**
 * Tests for history isolation
 */

import { describe, it, expect } from 'vitest';
import type { HistoryRecord } from '../../src/types/history.js';
import { IsolationViolationError } from '../../src/types/errors.js';
import { HistoryIsolation, createIsolation, requireIsolation } from '../../src/history/isolation.js';
import { IsolatedHistorySink } from '../../src/history/history-sink.js';
import { makeRecord } from '../fixtures.js';

/**
 * Sink that only counts storage calls
 */
class CountingSink extends IsolatedHistorySink {
  writes = 0;
  reads = 0;

  protected async write(): Promise<void> {
    this.writes++;
  }

  protected async read(): Promise<HistoryRecord[]> {
    this.reads++;
    return [];
  }
}

describe('createIsolation', () => {
  it('should accept a valid session id and domain', () => {
    const isolation = createIsolation('ci-42.run_1', 'project-pulse');

    expect(isolation).toBeInstanceOf(HistoryIsolation);
    expect(isolation.toString()).toBe('project-pulse/ci-42.run_1');
    expect(isolation.toMetadata()).toEqual({ sessionId: 'ci-42.run_1', domain: 'project-pulse' });
    expect(Object.isFrozen(isolation)).toBe(true);
  });

  it('should reject an empty or blank session id', () => {
    expect(() => createIsolation('', 'project-pulse')).toThrow(IsolationViolationError);
    expect(() => createIsolation('   ', 'project-pulse')).toThrow('History calls require a non-empty session id');
  });

  it('should reject session ids that could escape their scope', () => {
    for (const id of ['../other', 'a/b', '.hidden', 'with space']) {
      try {
        createIsolation(id, 'project-pulse');
        expect.unreachable(`accepted ${id}`);
      } catch (error) {
        expect(error).toMatchObject({ code: 'MALFORMED_SESSION_ID' });
      }
    }
  });

  it('should reject an empty domain', () => {
    expect(() => createIsolation('run-1', '')).toThrow(IsolationViolationError);
  });
});

describe('requireIsolation', () => {
  it('should re-validate a plain object', () => {
    const restored = requireIsolation(JSON.parse('{"sessionId":"run-1","domain":"project-pulse"}'));

    expect(restored).toBeInstanceOf(HistoryIsolation);
    expect(restored.toString()).toBe('project-pulse/run-1');
  });

  it('should reject missing isolation', () => {
    expect(() => requireIsolation(undefined)).toThrow('History call without isolation');
    expect(() => requireIsolation({ domain: 'project-pulse' })).toThrow(IsolationViolationError);
  });
});

describe('IsolatedHistorySink', () => {
  it('should refuse a put with invalid isolation before any write', async () => {
    const sink = new CountingSink();
    const isolation = JSON.parse('{"sessionId":"","domain":"project-pulse"}');

    await expect(sink.put({ record: makeRecord('2026-03-01T10:00:00.000Z'), isolation })).rejects.toMatchObject({
      code: 'MISSING_SESSION_ID',
    });
    expect(sink.writes).toBe(0);
  });

  it('should refuse a query with invalid isolation before any read', async () => {
    const sink = new CountingSink();
    const isolation = JSON.parse('{"sessionId":"ok","domain":""}');

    await expect(sink.history({ projectIdentifier: 'demo', isolation })).rejects.toMatchObject({
      code: 'MISSING_DOMAIN',
    });
    expect(sink.reads).toBe(0);
  });

  it('should refuse a query without a project identifier', async () => {
    const sink = new CountingSink();

    await expect(
      sink.history({ projectIdentifier: '', isolation: createIsolation('run-1', 'project-pulse') })
    ).rejects.toThrow('History queries require a project identifier');
    expect(sink.reads).toBe(0);
  });
});
