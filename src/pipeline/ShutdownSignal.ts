import { EventEmitter } from 'node:events';

export type ShutdownSource = 'server' | 'mux' | 'capture' | 'interrupt';

export interface ShutdownReason {
  source: ShutdownSource;
  error?: Error;
  signal?: NodeJS.Signals;
}

/**
 * One-shot shutdown trigger. The first `trigger()` decides the reason and
 * emits 'shutdown' once; every later call is a no-op that returns false.
 */
export class ShutdownSignal extends EventEmitter {
  private reason: ShutdownReason | null = null;

  get hasFired(): boolean {
    return this.reason !== null;
  }

  /** The winning reason, or null if the signal has not fired. */
  get firedReason(): ShutdownReason | null {
    return this.reason;
  }

  trigger(reason: ShutdownReason): boolean {
    if (this.reason) return false;
    this.reason = reason;
    this.emit('shutdown', reason);
    return true;
  }

  wait(): Promise<ShutdownReason> {
    const reason = this.reason;
    if (reason) return Promise.resolve(reason);
    return new Promise((resolve) => {
      this.once('shutdown', resolve);
    });
  }
}
