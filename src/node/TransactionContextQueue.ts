import type { JSEngineContext } from '../sandbox';
import type { RpcId, RPCCall } from '../shared';
import type { RequestQueue } from './types';

/**
 * Script global a cell sets to correlate the transactions it sends with the
 * chat message that triggered them.
 */
export const MESSAGE_ID_GLOBAL = '_status_message_id';

export interface TrackedRequest {
  cellId: string;
  callId: RpcId;
  method: string;
  messageId: string | null;
  startedAt: number;
}

export interface TransactionContextQueueOptions {
  /** Methods whose requests are tracked. Default: eth_sendTransaction */
  methods?: readonly string[];
  onTrack?: (request: TrackedRequest) => void;
}

/**
 * Reference request-queue policy: remembers which cell and message an
 * in-flight transaction belongs to, for as long as the request is pending.
 */
export class TransactionContextQueue implements RequestQueue {
  private readonly methods: ReadonlySet<string>;
  private readonly onTrack?: (request: TrackedRequest) => void;
  private pending: TrackedRequest[] = [];

  constructor(options: TransactionContextQueueOptions = {}) {
    this.methods = new Set(options.methods ?? ['eth_sendTransaction']);
    this.onTrack = options.onTrack;
  }

  preDispatch(vm: JSEngineContext, call: RPCCall, cellId: string): void {
    if (!this.methods.has(call.method)) {
      return;
    }

    const raw = vm.getGlobal(MESSAGE_ID_GLOBAL);
    const request: TrackedRequest = {
      cellId,
      callId: call.id,
      method: call.method,
      messageId: typeof raw === 'string' ? raw : null,
      startedAt: Date.now(),
    };
    this.pending.push(request);
    this.onTrack?.(request);
  }

  postDispatch(_vm: JSEngineContext, call: RPCCall, cellId: string): void {
    const idx = this.pending.findIndex(
      (entry) => entry.cellId === cellId && entry.callId === call.id && entry.method === call.method
    );
    if (idx !== -1) {
      this.pending.splice(idx, 1);
    }
  }

  /**
   * Requests whose pre-dispatch ran and whose post-dispatch has not yet.
   */
  inFlight(): TrackedRequest[] {
    return [...this.pending];
  }
}
