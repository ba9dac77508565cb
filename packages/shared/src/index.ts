export { createLogger, flushLogger, type Logger } from './logger';
export type {
  CustomerPayload,
  ItemContext,
  ItemStatus,
  PendingRecord,
  RunContext,
} from './types';
