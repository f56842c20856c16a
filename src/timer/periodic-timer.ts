/**
 * Restartable interval timer.
 */

export type TickHandler = () => void;

/**
 * Calls `onTick` once every `intervalMs` while running. `reset()` restarts
 * the countdown so the next tick is a full interval away.
 */
export class PeriodicTimer {
  private readonly intervalMs: number;
  private readonly onTick: TickHandler;
  private handle?: NodeJS.Timeout;

  constructor(intervalMs: number, onTick: TickHandler) {
    this.intervalMs = intervalMs;
    this.onTick = onTick;
  }

  get isRunning(): boolean {
    return this.handle !== undefined;
  }

  /**
   * Starts ticking. No-op if already running.
   */
  start(): void {
    if (this.handle) {
      return;
    }
    this.handle = setInterval(this.onTick, this.intervalMs);
  }

  /**
   * Restarts the countdown from the full interval. Starts the timer if it
   * was stopped.
   */
  reset(): void {
    this.stop();
    this.start();
  }

  /**
   * Stops ticking. Safe to call more than once.
   */
  stop(): void {
    if (this.handle) {
      clearInterval(this.handle);
      this.handle = undefined;
    }
  }
}
