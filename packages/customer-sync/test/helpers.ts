import pino from 'pino';
import type { Logger, PendingRecord } from '@customer-sync/shared';
import type { CustomerStore } from '../src/customer-store';

export interface LogEntry {
  level: number;
  msg: string;
  runId?: string;
  customerId?: number;
  errorKind?: string;
  attempts?: number;
  count?: number;
  delivered?: number;
  failed?: number;
  err?: { type: string; message: string };
  [key: string]: unknown;
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/** pino logger writing parsed JSON lines into an array. */
export function createTestLogger(): { log: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const log = pino(
    { level: 'debug', base: null },
    {
      write(line: string) {
        const entry: LogEntry = JSON.parse(line);
        entries.push(entry);
      },
    }
  );
  return { log, entries };
}

export function messages(entries: LogEntry[]): string[] {
  return entries.map((e) => e.msg);
}

export class InMemoryCustomerStore implements CustomerStore {
  readonly synced: number[] = [];

  constructor(
    private readonly rows: PendingRecord[] | Error | null,
    private readonly markError?: Error
  ) {}

  async fetchPending(): Promise<readonly PendingRecord[] | null> {
    if (this.rows instanceof Error) throw this.rows;
    return this.rows;
  }

  async markSynced(customerId: number): Promise<void> {
    if (this.markError) throw this.markError;
    this.synced.push(customerId);
  }
}

