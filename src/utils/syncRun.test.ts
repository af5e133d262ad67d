import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SyncReport } from '../sync/orchestrator.js';
import { SyncRun } from './syncRun.js';

const directus = vi.hoisted(() => ({
  createOne: vi.fn(async (_collection: string, _item: Record<string, unknown>) => ({ id: 42 })),
  updateOne: vi.fn(async (_collection: string, _key: string | number, _item: Record<string, unknown>) => {})
}));

vi.mock('./directus.js', () => directus);

const report: SyncReport = {
  startedAt: '2024-05-01T10:00:00.000Z',
  finishedAt: '2024-05-01T10:01:00.000Z',
  gameDataVersion: 'v1',
  processed: 2,
  failed: 1,
  skipped: 0,
  rows: { players: 40, units: 40, skills: 38 },
  guilds: []
};

describe('SyncRun', () => {
  beforeEach(() => {
    directus.createOne.mockClear();
    directus.updateOne.mockClear();
  });

  it('records the run lifecycle in the configured collection', async () => {
    const run = new SyncRun('sync_runs');

    await run.start({ guild_filter: ['g1'] });
    await run.finishSuccess(report);

    expect(directus.createOne).toHaveBeenCalledWith(
      'sync_runs',
      expect.objectContaining({ state: 'running', guild_filter: ['g1'] })
    );
    expect(directus.updateOne).toHaveBeenCalledWith(
      'sync_runs',
      42,
      expect.objectContaining({
        state: 'success',
        stats_json: {
          processed: 2,
          failed: 1,
          skipped: 0,
          rows: { players: 40, units: 40, skills: 38 },
          game_data_version: 'v1'
        }
      })
    );
  });

  it('stores the serialized error of a failed run', async () => {
    const run = new SyncRun('sync_runs');
    await run.start();

    const error = new Error('store offline');
    error.stack = 'Error: store offline\n    at main';
    await run.finishFail(error);

    expect(directus.updateOne).toHaveBeenCalledWith(
      'sync_runs',
      42,
      expect.objectContaining({ state: 'failed', log: 'Error: store offline\n    at main' })
    );
  });

  it('swallows bookkeeping failures while recording a failed run', async () => {
    const run = new SyncRun('sync_runs');
    await run.start();
    directus.updateOne.mockRejectedValueOnce(new Error('403'));

    await expect(run.finishFail(new Error('boom'))).resolves.toBeUndefined();
  });

  it('does nothing without a collection', async () => {
    const run = new SyncRun(undefined);

    await run.start();
    await run.finishSuccess(report);

    expect(directus.createOne).not.toHaveBeenCalled();
    expect(directus.updateOne).not.toHaveBeenCalled();
  });
});
