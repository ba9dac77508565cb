/**
 * Error taxonomy for the sync pipeline. Every failure an item can hit is one of
 * the ItemError variants; the retry decision switches over `kind`.
 */

/** Pending-customer query failed. Aborts only the current run. */
export class FetchError extends Error {
  readonly kind = 'FetchError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/** A row could not be mapped to a CustomerPayload. Never retried. */
export class InvalidRecordError extends Error {
  readonly kind = 'InvalidRecordError' as const;

  constructor(
    message: string,
    public readonly rawValue: unknown
  ) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

/** Connection refused, reset, DNS failure or timeout reaching the CRM. */
export class TransportError extends Error {
  readonly kind = 'TransportError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** The CRM answered with a non-2xx status. */
export class RemoteRejectedError extends Error {
  readonly kind = 'RemoteRejectedError' as const;

  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`CRM request failed: ${status} ${statusText} for ${url}`);
    this.name = 'RemoteRejectedError';
  }
}

/** Anything else. Never retried. */
export class UnclassifiedError extends Error {
  readonly kind = 'UnclassifiedError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnclassifiedError';
  }
}

/** Startup configuration is missing or invalid. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ItemError = InvalidRecordError | TransportError | RemoteRejectedError | UnclassifiedError;

export type ItemErrorKind = ItemError['kind'];

export function classifyError(err: unknown): ItemError {
  if (
    err instanceof InvalidRecordError ||
    err instanceof TransportError ||
    err instanceof RemoteRejectedError ||
    err instanceof UnclassifiedError
  ) {
    return err;
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new UnclassifiedError(msg, { cause: err });
}

export function isRetryable(error: ItemError): boolean {
  switch (error.kind) {
    case 'TransportError':
    case 'RemoteRejectedError':
      return true;
    case 'InvalidRecordError':
    case 'UnclassifiedError':
      return false;
    default: {
      const unreachable: never = error;
      return unreachable;
    }
  }
}
