/**
 * Transport boundary for batch writes. FetchTransport is the HTTP default;
 * tests inject their own implementation.
 */

import { ConnectionError, TimeoutError } from './errors.ts';

export interface TransportRequest {
  url: string;
  body: string;
  contentType: string;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface Transport {
  /**
   * Issue one request. Throws ConnectionError when the endpoint is
   * unreachable and TimeoutError when no response arrives in time; any
   * received status, accepting or not, resolves.
   */
  send(request: TransportRequest): Promise<TransportResponse>;
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/** The socket-level code of a failed fetch, looking through `cause`. */
export function connectionErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    const code = errorCode(current);
    if (code !== undefined && CONNECTION_CODES.has(code)) return code;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

export interface FetchTransportOptions {
  headers?: Record<string, string>;
}

export class FetchTransport implements Transport {
  constructor(private readonly options: FetchTransportOptions = {}) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: {
          'Content-Type': request.contentType,
          ...this.options.headers,
        },
        body: request.body,
        signal: controller.signal,
      });
      const body = await response.text().catch(() => '');
      return { status: response.status, body };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (controller.signal.aborted) {
        throw new TimeoutError(`No response from ${request.url} within ${request.timeoutMs}ms`, {
          cause: err,
        });
      }
      const code = connectionErrorCode(err);
      if (code !== undefined) {
        throw new ConnectionError(`Cannot reach ${request.url} (${code}): ${msg}`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
