/**
 * Wakeup primitive for a single waiting loop.
 *
 * A `notify()` that arrives while nobody is waiting is remembered, so the
 * next `wait()` resolves immediately. Several notifies collapse into one
 * wakeup; the waiter re-checks its own conditions after waking.
 */
export class WakeSignal {
  private pending = false;
  private waiter?: () => void;

  notify(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter();
      return;
    }
    this.pending = true;
  }

  wait(): Promise<void> {
    if (this.pending) {
      this.pending = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiter = resolve;
    });
  }
}
