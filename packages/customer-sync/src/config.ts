/**
 * Service configuration, read once from the environment at startup.
 */
import cron from 'node-cron';
import { ConfigError } from './errors';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry-policy';

export interface SyncConfig {
  databaseUrl: string;
  crmBaseUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  /** Fixed sync period; ignored when `cron` is set. */
  periodMs: number;
  cron?: string;
  concurrency: number;
  markSynced: boolean;
  runOnce: boolean;
  retryPolicy: RetryPolicy;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function flag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === '1' || raw === 'true';
}

export function loadConfig(env: Env = process.env): SyncConfig {
  const databaseUrl = env.DATABASE_URL?.trim();
  if (!databaseUrl) {
    throw new ConfigError('Missing env: DATABASE_URL');
  }

  const cronExpr = env.CUSTOMER_SYNC_CRON?.trim() || undefined;
  if (cronExpr && !cron.validate(cronExpr)) {
    throw new ConfigError(`CUSTOMER_SYNC_CRON is not a valid cron expression: "${cronExpr}"`);
  }

  return {
    databaseUrl,
    crmBaseUrl: env.CRM_SERVICE_BASE_URL?.trim() || 'http://localhost:8080/api',
    connectTimeoutMs: positiveInt(env, 'CRM_HTTP_CONNECT_TIMEOUT_MS', 5000),
    readTimeoutMs: positiveInt(env, 'CRM_HTTP_READ_TIMEOUT_MS', 5000),
    periodMs: positiveInt(env, 'CUSTOMER_SYNC_PERIOD_MS', 60_000),
    cron: cronExpr,
    concurrency: positiveInt(env, 'CUSTOMER_SYNC_CONCURRENCY', 1),
    markSynced: flag(env, 'CUSTOMER_SYNC_MARK_SYNCED'),
    runOnce: flag(env, 'RUN_ONCE'),
    retryPolicy: DEFAULT_RETRY_POLICY,
  };
}
