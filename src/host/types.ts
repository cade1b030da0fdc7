/**
 * Registry Types and Options
 */

import type { Logger, NodeAccessor } from '../node';
import type { JSEngineProvider } from '../sandbox';
import type { ModuleSource } from './cell/modules';

/**
 * Registry configuration options
 */
export interface RegistryOptions {
  /**
   * Bootstrap text evaluated first in every new cell.
   * Use DEFAULT_BASE_SCRIPT for a catalog-backed `call(path, args)` entry point.
   * @default ''
   */
  baseScript?: string;

  /**
   * Node-management collaborator resolving the backend client and hook queue.
   * Without one, every RPC and dispatchCall fails with NodeUnavailableError.
   */
  nodeManager?: NodeAccessor;

  /**
   * JS engine provider creating cell contexts
   * @default new VMProvider()
   */
  provider?: JSEngineProvider;

  /**
   * Maximum wait for a cell's gate before the call is rejected as busy (milliseconds)
   * @default 60000
   */
  acquireTimeoutMs?: number;

  /**
   * Hard bound on one synchronous evaluation inside a cell (milliseconds).
   * Unbounded when omitted.
   */
  evalTimeoutMs?: number;

  /**
   * Modules cell scripts may `require`, as CommonJS source evaluated inside
   * each cell. Replaces the default table (`web3`, `bignumber.js`) when given.
   */
  modules?: Readonly<Record<string, ModuleSource>>;

  /**
   * Enable debug mode
   * @default false
   */
  debug?: boolean;

  /**
   * Custom logger. Also receives `console` output of cell scripts.
   */
  logger?: Logger;
}
