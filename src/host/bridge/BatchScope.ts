/**
 * BatchScope - deferred work bound to the processing of one request batch
 *
 * Deferred callbacks run when the scope exits, in registration order, however
 * the batch ended. A failing callback does not stop the ones after it.
 */

export type Deferred = () => void | Promise<void>;

export class BatchScope {
  private deferred: Deferred[] = [];
  private exited = false;

  constructor(private readonly onError: (error: unknown) => void) {}

  defer(fn: Deferred): void {
    if (this.exited) {
      throw new Error('[jail:bridge] cannot defer work on an exited batch scope');
    }
    this.deferred.push(fn);
  }

  get size(): number {
    return this.deferred.length;
  }

  async exit(): Promise<void> {
    if (this.exited) {
      return;
    }
    this.exited = true;

    const queued = this.deferred;
    this.deferred = [];
    for (const fn of queued) {
      try {
        await fn();
      } catch (error) {
        this.onError(error);
      }
    }
  }
}
