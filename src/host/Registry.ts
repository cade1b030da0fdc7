/**
 * Sandbox Registry
 *
 * Owns every scripting cell by session id, bootstraps them, and resolves the
 * shared backend client and request hook queue on first use.
 *
 * @example
 * ```typescript
 * const registry = new SandboxRegistry({
 *   baseScript: DEFAULT_BASE_SCRIPT,
 *   nodeManager,
 * });
 * await registry.bootstrapCell('chat-1', 'var _status_catalog = { ping: function () { return "pong"; } };');
 * await registry.dispatchCall('chat-1', 'ping', '[]'); // {"result":"pong"}
 * ```
 */

import type { Logger, NodeAccessor, RequestQueue, RpcClient } from '../node';
import { type JSEngineContext, type JSEngineProvider, type JSEngineRuntime, VMProvider } from '../sandbox';
import { CellNotFoundError, NodeUnavailableError, printError, printResult } from '../shared';
import { RpcBridge } from './bridge/RpcBridge';
import { createModuleLoader, DEFAULT_MODULES, type ModuleSource } from './cell/modules';
import { DEFAULT_ACQUIRE_TIMEOUT_MS, ScriptingCell } from './cell/ScriptingCell';
import type { ScriptValueCodec } from './cell/ScriptValueCodec';
import {
  BRIDGE_GLOBAL,
  CALL_ENTRY_POINT,
  CATALOG_TRAILER_CODE,
  PREAMBLE_CODE,
} from './cell/scripts';
import type { RegistryOptions } from './types';

export class SandboxRegistry {
  private cells = new Map<string, ScriptingCell>();
  private baseScript: string;
  private client: RpcClient | null = null;
  private requestQueue: RequestQueue | null = null;
  private runtime: JSEngineRuntime | null = null;
  private pendingRuntime: Promise<JSEngineRuntime> | null = null;
  private readonly nodeManager?: NodeAccessor;
  private readonly provider: JSEngineProvider;
  private readonly options: {
    acquireTimeoutMs: number;
    evalTimeoutMs?: number;
    modules: Readonly<Record<string, ModuleSource>>;
    debug: boolean;
    logger: Logger;
  };

  constructor(options: RegistryOptions = {}) {
    this.baseScript = options.baseScript ?? '';
    this.nodeManager = options.nodeManager;
    this.provider = options.provider ?? new VMProvider();
    this.options = {
      acquireTimeoutMs: options.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS,
      evalTimeoutMs: options.evalTimeoutMs,
      modules: options.modules ?? DEFAULT_MODULES,
      debug: options.debug ?? false,
      logger: options.logger ?? console,
    };
  }

  /**
   * Replaces the bootstrap text used for cells created from now on.
   */
  setBaseScript(baseScript: string): void {
    this.baseScript = baseScript;
  }

  getBaseScript(): string {
    return this.baseScript;
  }

  /**
   * Creates (or replaces) the cell for `id` and runs the bootstrap sequence:
   * base script, `jeth` binding, web3/bn preamble, `scriptBody`, then the
   * catalog trailer. Resolves with `{"result":<catalog JSON>}` or `{"error":...}`.
   */
  async bootstrapCell(id: string, scriptBody: string): Promise<string> {
    const startedAt = Date.now();

    let cell: ScriptingCell;
    try {
      cell = await this.createCell(id);
    } catch (error) {
      this.options.logger.error(`[jail] Cell[${id}] could not be created:`, error);
      return printError(error);
    }

    const previous = this.cells.get(id);
    this.cells.set(id, cell);
    if (previous) {
      previous.dispose();
      if (this.options.debug) {
        this.options.logger.log(`[jail] Cell[${id}] replaced, previous state discarded`);
      }
    }

    const bridge = new RpcBridge({
      cell,
      resolveClient: () => this.getClient(),
      resolveRequestQueue: () => this.getRequestQueue(),
      debug: this.options.debug,
      logger: this.options.logger,
    });

    try {
      const catalog = await cell.enter(() => {
        cell.vm.eval(`${this.baseScript};`);
        cell.vm.setGlobal(BRIDGE_GLOBAL, bridge.bindings());
        cell.vm.eval(PREAMBLE_CODE);
        cell.vm.eval(scriptBody);
        return cell.vm.eval(CATALOG_TRAILER_CODE);
      });

      if (this.options.debug) {
        this.options.logger.log(`[jail] Cell[${id}] bootstrapped in ${Date.now() - startedAt}ms`);
      }
      return printResult(typeof catalog === 'string' ? catalog : undefined);
    } catch (error) {
      this.options.logger.warn(`[jail] Cell[${id}] bootstrap failed:`, error);
      return printError(error);
    }
  }

  /**
   * Invokes the cell's `call(path, argsJSON)` entry point and wraps its
   * (awaited) return value in the envelope.
   */
  async dispatchCall(id: string, path: string, argsJSON: string): Promise<string> {
    const cell = this.cells.get(id);
    if (!cell) {
      return printError(new CellNotFoundError(id));
    }

    try {
      await this.getClient();
    } catch (error) {
      return printError(error);
    }

    try {
      const value = await cell.enter(() => cell.vm.callFunction(CALL_ENTRY_POINT, [path, argsJSON]));
      return printResult(cell.codec.stringify(value));
    } catch (error) {
      if (this.options.debug) {
        this.options.logger.warn(`[jail] Cell[${id}] call "${path}" failed:`, error);
      }
      return printError(error);
    }
  }

  /**
   * Direct access to a cell's script context.
   * Callers are responsible for not racing the cell's gate.
   */
  getVM(id: string): JSEngineContext {
    const cell = this.cells.get(id);
    if (!cell) {
      throw new CellNotFoundError(id);
    }
    return cell.vm;
  }

  hasCell(id: string): boolean {
    return this.cells.has(id);
  }

  cellIds(): string[] {
    return Array.from(this.cells.keys());
  }

  /**
   * Backend client accessor. Resolved once and cached; a failed resolution is
   * not cached, so the next call tries again.
   */
  async getClient(): Promise<RpcClient> {
    if (this.client) {
      return this.client;
    }

    const node = this.nodeManager;
    if (!node || !node.hasNode()) {
      throw new NodeUnavailableError();
    }

    const client = await node.getClient();
    this.client = client;
    return client;
  }

  /**
   * Request hook queue accessor, cached like the client.
   */
  async getRequestQueue(): Promise<RequestQueue> {
    if (this.requestQueue) {
      return this.requestQueue;
    }

    const node = this.nodeManager;
    if (!node || !node.hasNode()) {
      throw new NodeUnavailableError();
    }

    const queue = await node.getRequestQueue();
    this.requestQueue = queue;
    return queue;
  }

  /**
   * Disposes every cell and the engine runtime.
   */
  dispose(): void {
    for (const cell of this.cells.values()) {
      cell.dispose();
    }
    this.cells.clear();
    this.runtime?.dispose();
    this.runtime = null;
    this.pendingRuntime = null;
  }

  private async createCell(id: string): Promise<ScriptingCell> {
    const runtime = await this.getRuntime();
    const vm = runtime.createContext(id);

    const cell = new ScriptingCell({ id, vm, acquireTimeoutMs: this.options.acquireTimeoutMs });
    const { codec } = cell;
    const load = createModuleLoader(vm, this.options.modules);
    vm.setGlobal('require', codec.expose(([name]) => load(name)));
    vm.setGlobal('console', this.createConsole(id, codec));
    return cell;
  }

  private async getRuntime(): Promise<JSEngineRuntime> {
    if (this.runtime) {
      return this.runtime;
    }
    if (!this.pendingRuntime) {
      this.pendingRuntime = Promise.resolve(
        this.provider.createRuntime({ timeout: this.options.evalTimeoutMs })
      );
    }

    try {
      this.runtime = await this.pendingRuntime;
      return this.runtime;
    } finally {
      this.pendingRuntime = null;
    }
  }

  private createConsole(id: string, codec: ScriptValueCodec): unknown {
    const { logger } = this.options;
    const prefix = `[jail:${id}]`;
    const log = codec.expose((args) => logger.log(prefix, ...args));
    return codec.record({
      log,
      info: log,
      debug: log,
      warn: codec.expose((args) => logger.warn(prefix, ...args)),
      error: codec.expose((args) => logger.error(prefix, ...args)),
    });
  }
}
