/**
 * Per-customer pipeline: parse id → map → POST with retry → log outcome.
 * One call per pending row; resolves with the item's terminal status and never rejects.
 */
import type {
  CustomerPayload,
  ItemContext,
  ItemStatus,
  Logger,
  PendingRecord,
  RunContext,
} from '@customer-sync/shared';
import type { CrmClient } from './crm-client';
import type { CustomerStore } from './customer-store';
import { classifyError, type ItemError } from './errors';
import { mapCustomerRow, parseCustomerId } from './map-customer-row';
import { sendWithRetry, type RetryPolicy, type Sleep } from './retry-policy';

export interface SyncCustomerDeps {
  crm: Pick<CrmClient, 'sendCustomer'>;
  store: Pick<CustomerStore, 'markSynced'>;
  retryPolicy: RetryPolicy;
  markSynced: boolean;
  sleep?: Sleep;
}

function logUnhandled(log: Logger, ctx: ItemContext, error: ItemError): void {
  log.error(
    { errorKind: error.kind, err: error },
    `Unhandled exception during customer sync runId=${ctx.runId}. Exception=${error.kind}, message=${error.message}`
  );
}

export async function syncCustomer(
  row: PendingRecord,
  run: RunContext,
  runLog: Logger,
  deps: SyncCustomerDeps
): Promise<ItemStatus> {
  let ctx: ItemContext = { runId: run.runId };
  let log = runLog;

  try {
    runLog.debug(`Preparing CRM request for customerId=${String(row.id)}`);
    // Record the id before anything else so later failures are attributable.
    ctx = { ...ctx, customerId: parseCustomerId(row.id) };
    log = runLog.child({ customerId: ctx.customerId });

    const payload: CustomerPayload = mapCustomerRow(row);

    const outcome = await sendWithRetry(() => deps.crm.sendCustomer(payload), {
      policy: deps.retryPolicy,
      sleep: deps.sleep,
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn(
          { attempt, delayMs, errorKind: error.kind, err: error },
          'CRM request failed, retrying'
        ),
    });

    if (outcome.status === 'failed') {
      if (outcome.retriesExhausted) {
        const { error } = outcome;
        log.error(
          { attempts: outcome.attempts, errorKind: error.kind, err: error },
          `CRM sync failed for customerId=${ctx.customerId} after ${outcome.attempts} attempts. ` +
            `Exception=${error.kind}, message=${error.message}`
        );
      } else {
        logUnhandled(log, ctx, outcome.error);
      }
      return 'failed';
    }

    log.info(
      { attempts: outcome.attempts },
      `Successfully synced customerId=${ctx.customerId} during runId=${ctx.runId}`
    );

    if (deps.markSynced) {
      try {
        await deps.store.markSynced(payload.id);
        log.debug('Marked customer as synced');
      } catch (err) {
        log.warn({ err }, 'Could not mark customer as synced; it will be sent again next run');
      }
    }
    return 'delivered';
  } catch (err) {
    logUnhandled(log, ctx, classifyError(err));
    return 'failed';
  }
}
