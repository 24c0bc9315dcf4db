/**
 * Herald: Status Server Tests
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createStatusApp, type StatusDependencies } from '../src/server/status';
import { MemorySeenStore } from '../src/db/seen-store';
import type { CycleResult } from '../src/types';

const LAST_CYCLE: CycleResult = {
  cycleId: 'abc123',
  startedAt: '2024-06-01T00:00:00.000Z',
  finishedAt: '2024-06-01T00:00:02.000Z',
  durationMs: 2_000,
  categories: {
    blog: { fetched: 2, new: 1, delivered: 1, failed: 0, suppressed: 0, unavailable: false },
  },
  pruned: 0,
  aborted: false,
};

async function app(lastResult?: CycleResult) {
  const store = new MemorySeenStore([
    { category: 'blog', identity: 'post-a', firstSeenAt: '2024-05-01T00:00:00.000Z' },
  ]);
  await store.open();

  const scheduler: StatusDependencies['scheduler'] = {
    state: 'running',
    lastResult,
    skippedTriggers: 1,
    completedCycles: 4,
  };

  return createStatusApp({ scheduler, store, startedAt: new Date('2024-06-01T00:00:00.000Z') });
}

describe('GET /health', () => {
  it('should report scheduler state and the last cycle time', async () => {
    const res = await request(await app(LAST_CYCLE)).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', scheduler: 'running', lastCycleAt: '2024-06-01T00:00:02.000Z' });
  });

  it('should report null before any cycle finished', async () => {
    const res = await request(await app()).get('/health');

    expect(res.body.lastCycleAt).toBeNull();
  });
});

describe('GET /status', () => {
  it('should expose store counts and the last cycle', async () => {
    const res = await request(await app(LAST_CYCLE)).get('/status');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      startedAt: '2024-06-01T00:00:00.000Z',
      scheduler: { state: 'running', completedCycles: 4, skippedTriggers: 1 },
      store: {
        seen: {
          blog: 1,
          release: 0,
          merged_change: 0,
          changelog: 0,
          reference_doc: 0,
          incident_status: 0,
          social: 0,
        },
        corruptCategories: [],
      },
      lastCycle: LAST_CYCLE,
    });
  });
});

describe('unknown routes', () => {
  it('should return 404', async () => {
    const res = await request(await app()).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
