/**
 * Contracts of the node-management collaborator.
 *
 * The registry only consumes these interfaces; NodeManager is the reference
 * implementation hosts can use as-is.
 */

import type { JSEngineContext } from '../sandbox';
import type { RPCCall } from '../shared';

/**
 * Network-facing JSON-RPC client.
 * Resolves with the decoded `result` member (`null` when the node sent none) and
 * rejects with RpcError when the node answered with an `error` member.
 */
export interface RpcClient {
  call(method: string, params: readonly unknown[]): Promise<unknown>;
}

/**
 * Pre/post processing around every request a cell dispatches.
 * Hook failures are logged by the bridge and never fail the request.
 */
export interface RequestQueue {
  preDispatch(vm: JSEngineContext, call: RPCCall, cellId: string): void | Promise<void>;
  postDispatch(vm: JSEngineContext, call: RPCCall, cellId: string): void | Promise<void>;
}

/**
 * What the registry needs from the node manager.
 */
export interface NodeAccessor {
  hasNode(): boolean;
  /**
   * Returns a handle that stays valid across node restarts.
   * Throws NodeUnavailableError when no node is running.
   */
  getClient(): RpcClient | Promise<RpcClient>;
  /**
   * Throws NodeUnavailableError when no node is running.
   */
  getRequestQueue(): RequestQueue | Promise<RequestQueue>;
}

/**
 * Minimal logger interface, satisfied by `console`.
 */
export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}
