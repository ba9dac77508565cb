/**
 * One customer sync run: load unsynced customers, sync each one independently,
 * always log the run's start and finish.
 */
import { randomUUID } from 'crypto';
import type { ItemStatus, Logger, PendingRecord, RunContext } from '@customer-sync/shared';
import type { CrmClient } from './crm-client';
import type { CustomerStore } from './customer-store';
import { FetchError, classifyError } from './errors';
import type { RetryPolicy, Sleep } from './retry-policy';
import { syncCustomer } from './sync-customer';

export interface CustomerSyncDeps {
  store: CustomerStore;
  crm: Pick<CrmClient, 'sendCustomer'>;
  log: Logger;
  retryPolicy: RetryPolicy;
  /** Number of customers synced at once within a run (1 = sequential). */
  concurrency: number;
  markSynced: boolean;
  sleep?: Sleep;
  newRunId?: () => string;
}

async function loadPending(store: CustomerStore): Promise<readonly PendingRecord[] | null | undefined> {
  try {
    return await store.fetchPending();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Failed to load customers to sync: ${msg}`, { cause: err });
  }
}

export class CustomerSync {
  constructor(private readonly deps: CustomerSyncDeps) {}

  /** Never rejects: every failure is logged so the next tick is unaffected. */
  async runOnce(): Promise<void> {
    const { log, newRunId = randomUUID } = this.deps;
    const run: RunContext = { runId: newRunId(), startedAt: new Date() };
    const runLog = log.child({ runId: run.runId });
    let delivered = 0;
    let failed = 0;

    runLog.info(`Starting customer sync runId=${run.runId}`);
    try {
      const rows = await loadPending(this.deps.store);
      if (!rows || rows.length === 0) {
        runLog.info(`No customers to sync for runId=${run.runId}`);
      } else {
        runLog.info(
          { count: rows.length },
          `Loaded ${rows.length} customers to sync for runId=${run.runId}`
        );
        const statuses = await this.syncAll(rows, run, runLog);
        delivered = statuses.filter((s) => s === 'delivered').length;
        failed = statuses.length - delivered;
      }
    } catch (err) {
      if (err instanceof FetchError) {
        runLog.error({ errorKind: err.kind, err }, err.message);
      } else {
        const error = classifyError(err);
        runLog.error(
          { errorKind: error.kind, err: error },
          `Customer sync run failed: ${error.message}`
        );
      }
    } finally {
      runLog.info(
        { delivered, failed, durationMs: Date.now() - run.startedAt.getTime() },
        `Finished customer sync runId=${run.runId}`
      );
    }
  }

  /** Worker pool over the batch; each worker takes the next row in order. */
  private async syncAll(
    rows: readonly PendingRecord[],
    run: RunContext,
    runLog: Logger
  ): Promise<ItemStatus[]> {
    const statuses: ItemStatus[] = new Array<ItemStatus>(rows.length).fill('failed');
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < rows.length) {
        const index = next++;
        try {
          statuses[index] = await syncCustomer(rows[index], run, runLog, this.deps);
        } catch (err) {
          const error = classifyError(err);
          runLog.error(
            { index, errorKind: error.kind, err: error },
            `Unhandled exception during customer sync runId=${run.runId}. Exception=${error.kind}, message=${error.message}`
          );
        }
      }
    };

    const workers = Math.max(1, Math.min(this.deps.concurrency, rows.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return statuses;
  }
}
