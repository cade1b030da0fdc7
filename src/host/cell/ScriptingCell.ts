/**
 * ScriptingCell - one isolated script context plus the gate serializing access to it
 */

import type { JSEngineContext } from '../../sandbox';
import { BusyError } from '../../shared';
import { Gate } from './Gate';
import { createScriptValueCodec, type ScriptValueCodec } from './ScriptValueCodec';

/** Default bound on waiting for a cell's gate */
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 60_000;

/**
 * Work started by script code while an entry point holds the gate.
 * The entry point keeps the gate until all of it has settled.
 */
export class ExecutionScope {
  private pending = new Set<Promise<unknown>>();

  track<T>(promise: Promise<T>): Promise<T> {
    const settled = promise.then(
      () => {
        this.pending.delete(settled);
      },
      () => {
        this.pending.delete(settled);
      }
    );
    this.pending.add(settled);
    return promise;
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Waits until nothing is pending, including work started while draining.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}

export interface ScriptingCellOptions {
  id: string;
  vm: JSEngineContext;
  acquireTimeoutMs?: number;
}

export class ScriptingCell {
  readonly id: string;
  readonly vm: JSEngineContext;
  readonly gate: Gate;
  readonly codec: ScriptValueCodec;
  private scope: ExecutionScope | null = null;
  private disposed = false;

  constructor(options: ScriptingCellOptions) {
    this.id = options.id;
    this.vm = options.vm;
    this.gate = new Gate({
      timeoutMs: options.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS,
      onTimeout: (timeoutMs) => new BusyError(this.id, timeoutMs),
    });
    this.codec = createScriptValueCodec(this.vm);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Scope of the entry point currently holding the gate, if any
   */
  get activeScope(): ExecutionScope | null {
    return this.scope;
  }

  /**
   * Runs an entry point: acquires the gate (BusyError after the bound), opens a
   * scope, runs `fn`, waits for the scope to drain, releases the gate.
   */
  async enter<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.gate.acquire();
    const scope = new ExecutionScope();
    this.scope = scope;
    try {
      return await fn();
    } finally {
      try {
        await scope.drain();
      } finally {
        this.scope = null;
        release();
      }
    }
  }

  /**
   * Runs work requested from inside the cell. Joins the active scope when an
   * entry point holds the gate; otherwise becomes an entry point itself.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const scope = this.scope;
    if (scope) {
      return scope.track(task());
    }
    return this.enter(task);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.vm.dispose();
  }
}
