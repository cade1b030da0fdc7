import { RpcError, TransportError } from '../shared';
import type { RpcClient } from './types';

export interface HttpRpcClientOptions {
  /** Node endpoint, e.g. http://127.0.0.1:8545 */
  url: string;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
}

/**
 * JSON-RPC 2.0 client over HTTP. One POST per call.
 */
export class HttpRpcClient implements RpcClient {
  private requestId = 0;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpRpcClientOptions) {
    this.url = options.url;
    this.headers = { 'content-type': 'application/json', ...options.headers };
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async call(method: string, params: readonly unknown[]): Promise<unknown> {
    const id = ++this.requestId;
    const body = JSON.stringify({ jsonrpc: '2.0', id, method, params });

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, { method: 'POST', headers: this.headers, body });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`request to ${this.url} failed: ${reason}`);
    }

    if (!response.ok) {
      throw new TransportError(
        `node answered ${response.status} ${response.statusText}`.trimEnd(),
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new TransportError('node answered with invalid JSON', response.status);
    }

    if (typeof payload !== 'object' || payload === null) {
      throw new TransportError('node answered with a non-object JSON-RPC response');
    }

    if ('error' in payload && payload.error != null) {
      const error: unknown = payload.error;
      if (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        typeof error.code === 'number'
      ) {
        const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
        throw new RpcError(error.code, message, 'data' in error ? error.data : undefined);
      }
      throw new TransportError('node answered with a malformed error object');
    }

    return 'result' in payload && payload.result !== undefined ? payload.result : null;
  }
}
