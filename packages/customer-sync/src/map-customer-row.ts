/**
 * Map a row from the pending-customers query to the CRM payload.
 * Column names must match the SELECT in customer-store.ts.
 */
import type { CustomerPayload, PendingRecord } from '@customer-sync/shared';
import { InvalidRecordError } from './errors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

function toStr(val: unknown): string | null {
  if (val == null) return null;
  return String(val);
}

function invalidId(raw: unknown): InvalidRecordError {
  const shown = typeof raw === 'string' ? `"${raw}"` : String(raw);
  return new InvalidRecordError(`Invalid numeric value for id: ${shown}`, raw);
}

/**
 * Parse the raw `id` column. pg returns int8 as a string, so strings of digits
 * are accepted alongside numbers and bigints.
 */
export function parseCustomerId(raw: unknown): number {
  if (typeof raw === 'number') {
    if (Number.isSafeInteger(raw)) return raw;
    throw invalidId(raw);
  }
  if (typeof raw === 'bigint') {
    const n = Number(raw);
    if (Number.isSafeInteger(n)) return n;
    throw invalidId(raw);
  }
  if (typeof raw === 'string' && INTEGER_PATTERN.test(raw)) {
    const n = Number(raw);
    if (Number.isSafeInteger(n)) return n;
  }
  throw invalidId(raw);
}

export function mapCustomerRow(row: PendingRecord): CustomerPayload {
  return {
    id: parseCustomerId(row.id),
    firstName: toStr(row.first_name),
    lastName: toStr(row.last_name),
    email: toStr(row.email),
  };
}
