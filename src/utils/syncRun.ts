import type { SyncReport } from '../sync/orchestrator.js';
import { createOne, updateOne } from './directus.js';
import { describeError, serializeError } from './errors.js';
import { log } from './log.js';

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Records one sync run as an item of a Directus collection. Without a
 * collection every method is a no-op.
 */
export class SyncRun {
  private runId?: string | number;
  private started = false;

  constructor(private readonly collection: string | undefined) {}

  async start(extra?: Record<string, unknown>): Promise<void> {
    if (this.started || !this.collection) {
      return;
    }

    const payload = {
      state: 'running',
      stats_json: {},
      log: null,
      started_at: nowIso(),
      ...extra
    } satisfies Record<string, unknown>;

    const created = await createOne(this.collection, payload);
    const id = created.id;
    this.runId = typeof id === 'string' || typeof id === 'number' ? id : undefined;
    this.started = true;
    log.info('Sync run started', { sync_run_id: this.runId });
  }

  async finishSuccess(report: SyncReport): Promise<void> {
    if (!this.collection || this.runId === undefined) return;
    await updateOne(this.collection, this.runId, {
      state: 'success',
      stats_json: {
        processed: report.processed,
        failed: report.failed,
        skipped: report.skipped,
        rows: report.rows,
        game_data_version: report.gameDataVersion ?? null
      },
      finished_at: nowIso()
    });
    log.info('Sync run finished successfully', { sync_run_id: this.runId });
  }

  /** Never throws; a bookkeeping error is logged instead. */
  async finishFail(error: unknown): Promise<void> {
    if (!this.collection || this.runId === undefined) return;
    try {
      await updateOne(this.collection, this.runId, {
        state: 'failed',
        log: serializeError(error),
        finished_at: nowIso()
      });
      log.error('Sync run failed', { sync_run_id: this.runId, error });
    } catch (bookkeepingError) {
      log.error('Could not record failed sync run', {
        sync_run_id: this.runId,
        error: describeError(bookkeepingError)
      });
    }
  }
}
