/**
 * Customer Sync service
 * Every period, loads unsynced customers from PostgreSQL and POSTs each one to the CRM.
 * Load .env first so LOG_LEVEL/LOG_FILE are set before the logger is created.
 */
import path from 'path';
import { existsSync } from 'fs';
import { config as loadEnv } from 'dotenv';

// Load .env from repo root or cwd so it works regardless of run directory
const envPaths = [path.resolve(__dirname, '../../../.env'), path.resolve(process.cwd(), '.env')];
const envPath = envPaths.find((p) => existsSync(p));
if (envPath) {
  loadEnv({ path: envPath });
} else if (!process.env.DATABASE_URL) {
  console.warn('No .env found at', envPaths.join(' or '));
}

import { Pool } from 'pg';
import { createLogger, flushLogger } from '@customer-sync/shared';
import { loadConfig } from './config';
import { CrmClient } from './crm-client';
import { PgCustomerStore } from './customer-store';
import { scheduleSync } from './schedule';
import { CustomerSync } from './sync-run';

const log = createLogger('customer-sync', 'crm');

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = new Pool({ connectionString: config.databaseUrl });
  pool.on('error', (err) => log.error({ err }, 'Idle pg client error'));

  const crm = new CrmClient({
    baseUrl: config.crmBaseUrl,
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
  });
  const sync = new CustomerSync({
    store: new PgCustomerStore(pool),
    crm,
    log,
    retryPolicy: config.retryPolicy,
    concurrency: config.concurrency,
    markSynced: config.markSynced,
  });

  if (config.runOnce) {
    log.info('Starting (one-shot: sync then exit for system cron)');
    await sync.runOnce();
    await Promise.all([pool.end(), crm.close()]);
    log.info('Exiting after sync complete');
    flushLogger();
    return;
  }

  log.info(
    { concurrency: config.concurrency, markSynced: config.markSynced, crmBaseUrl: config.crmBaseUrl },
    'Starting (schedule + initial sync)'
  );
  const schedule = scheduleSync(() => sync.runOnce(), {
    periodMs: config.periodMs,
    cron: config.cron,
    log,
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Stopping schedule, waiting for in-flight runs');
    schedule.stop();
    schedule
      .idle()
      .then(() => Promise.all([pool.end(), crm.close()]))
      .then(() => {
        log.info('Shutdown complete');
        flushLogger();
        process.exit(0);
      })
      .catch((err) => {
        log.error({ err }, 'Shutdown failed');
        flushLogger();
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  log.error({ err }, 'Fatal error');
  flushLogger();
  process.exitCode = 1;
});
