import { NodeUnavailableError } from '../shared';
import { RestartableClient } from './RestartableClient';
import { TransactionContextQueue } from './TransactionContextQueue';
import type { Logger, NodeAccessor, RequestQueue, RpcClient } from './types';

export interface NodeManagerOptions {
  /** Creates a fresh client each time the node is (re)started */
  createClient: () => RpcClient;
  /** Hook policy handed to cells. Default: TransactionContextQueue */
  requestQueue?: RequestQueue;
  debug?: boolean;
  logger?: Logger;
}

/**
 * Reference node manager.
 *
 * Owns one RestartableClient for its whole lifetime: starting, stopping and
 * restarting the node only swap the client behind it, so handles given out
 * earlier keep working.
 */
export class NodeManager implements NodeAccessor {
  private readonly createClient: () => RpcClient;
  private readonly requestQueue: RequestQueue;
  private readonly handle = new RestartableClient();
  private readonly debug: boolean;
  private readonly logger: Logger;
  private running = false;

  constructor(options: NodeManagerOptions) {
    this.createClient = options.createClient;
    this.requestQueue = options.requestQueue ?? new TransactionContextQueue();
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? console;
  }

  startNode(): void {
    if (this.running) {
      throw new Error('[jail:node] node is already running');
    }
    this.handle.swap(this.createClient());
    this.running = true;
    if (this.debug) {
      this.logger.log('[jail:node] node started');
    }
  }

  stopNode(): void {
    if (!this.running) {
      throw new NodeUnavailableError();
    }
    this.handle.swap(null);
    this.running = false;
    if (this.debug) {
      this.logger.log('[jail:node] node stopped');
    }
  }

  restartNode(): void {
    this.stopNode();
    this.startNode();
    this.logger.log(`[jail:node] node restarted (client generation ${this.handle.restarts})`);
  }

  hasNode(): boolean {
    return this.running;
  }

  getClient(): RpcClient {
    if (!this.running) {
      throw new NodeUnavailableError();
    }
    return this.handle;
  }

  getRequestQueue(): RequestQueue {
    if (!this.running) {
      throw new NodeUnavailableError();
    }
    return this.requestQueue;
  }
}
