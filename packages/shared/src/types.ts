/**
 * Shared types for the customer sync pipeline
 */

/** Raw row from the pending-customers query, keyed by column name. */
export type PendingRecord = Readonly<Record<string, unknown>>;

/** Payload POSTed to the CRM for one customer. Key order is the wire order. */
export interface CustomerPayload {
  id: number;
  firstName: string | null;
  lastName: string | null;
  email: string | null;
}

/** One scheduler tick. Used for log correlation only. */
export interface RunContext {
  readonly runId: string;
  readonly startedAt: Date;
}

/** One record within a run. customerId is set once the row id has been parsed. */
export interface ItemContext {
  readonly runId: string;
  readonly customerId?: number;
}

/** Terminal state of one item. */
export type ItemStatus = 'delivered' | 'failed';
