/**
 * Tests for the memory and file history sinks
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { createIsolation } from '../../src/history/isolation.js';
import { MemoryHistorySink } from '../../src/history/memory-sink.js';
import { FileHistorySink } from '../../src/history/file-sink.js';
import { sortNewestFirst } from '../../src/history/history-sink.js';
import { makeRecord } from '../fixtures.js';

const sessionA = createIsolation('session-a', 'project-pulse');
const sessionB = createIsolation('session-b', 'project-pulse');

const T1 = '2026-03-01T10:00:00.000Z';
const T2 = '2026-03-01T11:00:00.000Z';
const T3 = '2026-03-01T12:00:00.000Z';

describe('sortNewestFirst', () => {
  it('should put the later write first among equal timestamps', () => {
    const sorted = sortNewestFirst([
      makeRecord(T1, { healthScore: 10 }),
      makeRecord(T2, { healthScore: 20 }),
      makeRecord(T1, { healthScore: 30 }),
    ]);
    expect(sorted.map((r) => r.healthScore)).toEqual([20, 30, 10]);
  });
});

describe('MemoryHistorySink', () => {
  it('should return records newest first within the limit', async () => {
    const sink = new MemoryHistorySink();
    for (const timestamp of [T1, T3, T2]) {
      await sink.put({ record: makeRecord(timestamp), isolation: sessionA });
    }

    const all = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    expect(all.map((r) => r.timestamp)).toEqual([T3, T2, T1]);

    const limited = await sink.history({ projectIdentifier: 'demo', isolation: sessionA, limit: 2 });
    expect(limited.map((r) => r.timestamp)).toEqual([T3, T2]);
  });

  it('should keep sessions and projects apart', async () => {
    const sink = new MemoryHistorySink();
    await sink.put({ record: makeRecord(T1), isolation: sessionA });
    await sink.put({ record: makeRecord(T2), isolation: sessionB });
    await sink.put({ record: makeRecord(T3, { projectIdentifier: 'other' }), isolation: sessionA });

    const a = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    const b = await sink.history({ projectIdentifier: 'demo', isolation: sessionB });

    expect(a.map((r) => r.timestamp)).toEqual([T1]);
    expect(b.map((r) => r.timestamp)).toEqual([T2]);
    expect(sink.size).toBe(3);
  });

  it('should stamp the request isolation onto the record', async () => {
    const sink = new MemoryHistorySink();
    const record = makeRecord(T1, { isolation: { sessionId: 'session-b', domain: 'project-pulse' } });
    await sink.put({ record, isolation: sessionA });

    const [stored] = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    expect(stored.isolation).toEqual({ sessionId: 'session-a', domain: 'project-pulse' });
    expect(await sink.history({ projectIdentifier: 'demo', isolation: sessionB })).toEqual([]);
  });

  it('should return copies', async () => {
    const sink = new MemoryHistorySink();
    await sink.put({ record: makeRecord(T1), isolation: sessionA });

    const [first] = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    first.healthScore = 0;
    const [again] = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    expect(again.healthScore).toBe(80);
  });
});

describe('FileHistorySink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pulse-history-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should store one document per scope', async () => {
    const sink = new FileHistorySink(dir);
    await sink.put({ record: makeRecord(T1), isolation: sessionA });

    const filePath = sink.getFilePath(sessionA);
    expect(filePath).toBe(join(dir, 'project-pulse', 'session-a.json'));

    const doc = JSON.parse(readFileSync(filePath, 'utf-8'));
    expect(doc).toMatchObject({ version: 1, domain: 'project-pulse', sessionId: 'session-a' });
    expect(doc.records).toHaveLength(1);
  });

  it('should read records written by another instance, newest first', async () => {
    await new FileHistorySink(dir).put({ record: makeRecord(T1), isolation: sessionA });
    await new FileHistorySink(dir).put({ record: makeRecord(T2), isolation: sessionA });

    const records = await new FileHistorySink(dir).history({ projectIdentifier: 'demo', isolation: sessionA });
    expect(records.map((r) => r.timestamp)).toEqual([T2, T1]);
  });

  it('should keep every record from concurrent puts', async () => {
    const sink = new FileHistorySink(dir);
    const stamps = [T1, T2, T3, '2026-03-01T13:00:00.000Z', '2026-03-01T14:00:00.000Z'];
    await Promise.all(stamps.map((timestamp) => sink.put({ record: makeRecord(timestamp), isolation: sessionA })));

    const records = await sink.history({ projectIdentifier: 'demo', isolation: sessionA });
    expect(records).toHaveLength(5);
  });

  it('should return nothing for a scope without a document', async () => {
    const sink = new FileHistorySink(dir);
    expect(await sink.history({ projectIdentifier: 'demo', isolation: sessionB })).toEqual([]);
  });

  it('should refuse a corrupt document', async () => {
    const sink = new FileHistorySink(dir);
    const filePath = sink.getFilePath(sessionA);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, '{ nope');

    await expect(sink.history({ projectIdentifier: 'demo', isolation: sessionA })).rejects.toThrow(
      /^Corrupt history file /
    );
    await expect(sink.put({ record: makeRecord(T1), isolation: sessionA })).rejects.toThrow(/^Corrupt history file /);
    expect(readFileSync(filePath, 'utf-8')).toBe('{ nope');
  });

  it('should refuse a document that belongs to another scope', async () => {
    const sink = new FileHistorySink(dir);
    const filePath = sink.getFilePath(sessionA);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(
      filePath,
      JSON.stringify({ version: 1, domain: 'project-pulse', sessionId: 'session-b', records: [] })
    );

    await expect(sink.history({ projectIdentifier: 'demo', isolation: sessionA })).rejects.toThrow(
      'belongs to project-pulse/session-b'
    );
  });
});
