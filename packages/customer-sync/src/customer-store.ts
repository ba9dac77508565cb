/**
 * PostgreSQL access for the customers table.
 */
import type { Pool } from 'pg';
import type { PendingRecord } from '@customer-sync/shared';

export const PENDING_CUSTOMERS_QUERY =
  'SELECT id, first_name, last_name, email FROM customers WHERE synced = false ORDER BY id';

export const MARK_SYNCED_QUERY = 'UPDATE customers SET synced = true WHERE id = $1';

export interface CustomerStore {
  /** Unsynced customers, ordered by id; null or undefined counts as none. Rejects if the query fails. */
  fetchPending(): Promise<readonly PendingRecord[] | null | undefined>;
  markSynced(customerId: number): Promise<void>;
}

export class PgCustomerStore implements CustomerStore {
  constructor(private readonly pool: Pool) {}

  async fetchPending(): Promise<readonly PendingRecord[]> {
    const { rows } = await this.pool.query<Record<string, unknown>>(PENDING_CUSTOMERS_QUERY);
    return rows;
  }

  async markSynced(customerId: number): Promise<void> {
    await this.pool.query(MARK_SYNCED_QUERY, [customerId]);
  }
}
