/**
 * Gate - single-slot mutual exclusion with a bounded wait
 *
 * One holder at a time; later callers queue in FIFO order and give up once
 * `timeoutMs` elapses without the slot being handed to them.
 */

export type Release = () => void;

export interface GateOptions {
  /** Maximum wait for the slot. 0 or less: fail at once when the slot is taken. */
  timeoutMs: number;
  /** Builds the rejection for a waiter that ran out of time */
  onTimeout: (timeoutMs: number) => Error;
}

interface Waiter {
  grant: (release: Release) => void;
  timerId?: ReturnType<typeof setTimeout>;
}

export class Gate {
  private held = false;
  private waiters: Waiter[] = [];
  private readonly timeoutMs: number;
  private readonly onTimeout: (timeoutMs: number) => Error;

  constructor(options: GateOptions) {
    this.timeoutMs = options.timeoutMs;
    this.onTimeout = options.onTimeout;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Number of callers waiting for the slot
   */
  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function once the slot is ours.
   * Release is idempotent.
   */
  acquire(): Promise<Release> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }

    if (this.timeoutMs <= 0) {
      return Promise.reject(this.onTimeout(this.timeoutMs));
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: (release) => {
          clearTimeout(waiter.timerId);
          resolve(release);
        },
      };

      waiter.timerId = setTimeout(() => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) {
          this.waiters.splice(idx, 1);
          reject(this.onTimeout(this.timeoutMs));
        }
      }, this.timeoutMs);

      this.waiters.push(waiter);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the slot over without ever marking it free
        next.grant(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}
