/**
 * CRM HTTP client: POST one customer payload to {baseUrl}/customers.
 * Non-2xx responses become RemoteRejectedError, fetch rejections TransportError.
 */
import { Agent, fetch, type RequestInit, type Response } from 'undici';
import type { CustomerPayload } from '@customer-sync/shared';
import { RemoteRejectedError, TransportError } from './errors';

const MAX_ERROR_BODY_CHARS = 500;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface CrmClientOptions {
  baseUrl: string;
  connectTimeoutMs: number;
  /** Applies to waiting for the response headers and to each gap while reading the body. */
  readTimeoutMs: number;
  /** Custom fetch implementation (for testing) */
  fetchFn?: FetchFn;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function describeCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici wraps the socket error: TypeError('fetch failed') with cause ECONNREFUSED etc.
  const cause: unknown = err.cause;
  if (cause instanceof Error && cause.message) return `${err.message}: ${cause.message}`;
  return err.message;
}

export class CrmClient {
  private readonly customersUrl: string;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly agent: Agent;
  private readonly fetchFn: FetchFn;

  constructor(options: CrmClientOptions) {
    this.customersUrl = `${options.baseUrl.replace(/\/+$/, '')}/customers`;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.readTimeoutMs = options.readTimeoutMs;
    this.agent = new Agent({
      connect: { timeout: options.connectTimeoutMs },
      headersTimeout: options.readTimeoutMs,
      bodyTimeout: options.readTimeoutMs,
    });
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get url(): string {
    return this.customersUrl;
  }

  async sendCustomer(payload: CustomerPayload): Promise<void> {
    let res: Response;
    try {
      res = await this.fetchFn(this.customersUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        dispatcher: this.agent,
      });
    } catch (err) {
      throw this.transportError(err);
    }

    if (!res.ok) {
      let text = '';
      try {
        text = (await res.text()).slice(0, MAX_ERROR_BODY_CHARS);
      } catch (err) {
        text = `<unreadable body: ${describeCause(err)}>`;
      }
      throw new RemoteRejectedError(res.status, res.statusText, text, this.customersUrl);
    }

    // Drain the unused body so the keep-alive connection goes back to the pool.
    try {
      await res.arrayBuffer();
    } catch (err) {
      throw this.transportError(err);
    }
  }

  /** Release pooled connections. */
  async close(): Promise<void> {
    await this.agent.close();
  }

  private transportError(err: unknown): TransportError {
    const cause: unknown = err instanceof Error ? err.cause : undefined;
    switch (errorCode(cause) ?? errorCode(err)) {
      case 'UND_ERR_CONNECT_TIMEOUT':
        return new TransportError(
          `CRM request to ${this.customersUrl} timed out connecting after ${this.connectTimeoutMs}ms`,
          { cause: err }
        );
      case 'UND_ERR_HEADERS_TIMEOUT':
      case 'UND_ERR_BODY_TIMEOUT':
        return new TransportError(
          `CRM request to ${this.customersUrl} timed out reading the response after ${this.readTimeoutMs}ms`,
          { cause: err }
        );
      default:
        return new TransportError(`CRM request to ${this.customersUrl} failed: ${describeCause(err)}`, {
          cause: err,
        });
    }
  }
}
