import { describe, expect, it } from 'vitest';
import { makeSnapshot } from '../testing/snapshots.js';
import type { RunRecord } from '../types.js';
import { RunStateStore } from './runState.js';

function record(runId: string, overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    runId,
    scenarioName: 'demo',
    status: 'completed',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
    snapshot: makeSnapshot({ runId }),
    ...overrides
  };
}

describe('RunStateStore', () => {
  it('lists runs without their snapshots', () => {
    const store = new RunStateStore();
    store.save(record('a'));
    store.save(record('b', { status: 'failed', snapshot: null, error: 'boom' }));

    expect(store.list()).toEqual([
      {
        runId: 'a',
        scenarioName: 'demo',
        status: 'completed',
        startedAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:00:01.000Z',
        durationMs: 1000,
        simTime: 5
      },
      {
        runId: 'b',
        scenarioName: 'demo',
        status: 'failed',
        startedAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:00:01.000Z',
        durationMs: 1000,
        error: 'boom',
        simTime: null
      }
    ]);
  });

  it('evicts the oldest run beyond its capacity', () => {
    const store = new RunStateStore(2);
    store.save(record('a'));
    store.save(record('b'));
    store.save(record('c'));

    expect(store.size).toBe(2);
    expect(store.get('a')).toBeUndefined();
    expect(store.list().map((r) => r.runId)).toEqual(['b', 'c']);
  });

  it('accepts a snapshot once and skips identical repeats', () => {
    const store = new RunStateStore();
    const snapshot = makeSnapshot({ runId: 'x' });

    expect(store.evaluateSnapshot(snapshot)).toEqual({ accept: true, reason: 'accepted' });
    expect(store.evaluateSnapshot(makeSnapshot({ runId: 'x' }))).toEqual({ accept: false, reason: 'duplicate' });
    expect(store.evaluateSnapshot(makeSnapshot({ runId: 'x', simTime: 6 }))).toEqual({
      accept: true,
      reason: 'accepted'
    });
  });

  it('treats the snapshot of a saved run as already seen', () => {
    const store = new RunStateStore();
    store.save(record('a'));

    expect(store.evaluateSnapshot(makeSnapshot({ runId: 'a' }))).toEqual({ accept: false, reason: 'duplicate' });
  });

  it('skips snapshots without elements', () => {
    expect(new RunStateStore().evaluateSnapshot(makeSnapshot({ elements: [] }))).toEqual({
      accept: false,
      reason: 'empty_elements'
    });
  });
});
