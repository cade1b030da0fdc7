import { NodeUnavailableError } from '../shared';
import type { RpcClient } from './types';

/**
 * RpcClient indirection that survives node restarts.
 *
 * Holders keep one RestartableClient for good; the node manager swaps the
 * client behind it whenever the node is (re)started or stopped.
 */
export class RestartableClient implements RpcClient {
  private current: RpcClient | null;
  private generation = 0;

  constructor(client: RpcClient | null = null) {
    this.current = client;
  }

  /**
   * Number of times the underlying client was replaced.
   */
  get restarts(): number {
    return this.generation;
  }

  get connected(): boolean {
    return this.current !== null;
  }

  swap(client: RpcClient | null): void {
    this.current = client;
    this.generation++;
  }

  call(method: string, params: readonly unknown[]): Promise<unknown> {
    const client = this.current;
    if (!client) {
      return Promise.reject(new NodeUnavailableError());
    }
    return client.call(method, params);
  }
}
