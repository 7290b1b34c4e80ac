// Named timers for one table

export type TimerKey =
  | 'action'     // action timeout for the seat to act
  | 'nextHand';  // delay before the next hand is dealt

export interface TimerSchedulerOptions {
  setTimeoutFn?: (callback: () => void, ms: number) => NodeJS.Timeout;
  clearTimeoutFn?: (timer: NodeJS.Timeout) => void;
  now?: () => number;
}

export class TimerScheduler {
  private timers = new Map<TimerKey, NodeJS.Timeout>();
  private deadlines = new Map<TimerKey, number>();
  private generations = new Map<TimerKey, number>();
  private setTimeoutFn: (cb: () => void, ms: number) => NodeJS.Timeout;
  private clearTimeoutFn: (timer: NodeJS.Timeout) => void;
  private now: () => number;

  constructor(options?: TimerSchedulerOptions) {
    this.setTimeoutFn = options?.setTimeoutFn ?? setTimeout;
    this.clearTimeoutFn = options?.clearTimeoutFn ?? clearTimeout;
    this.now = options?.now ?? (() => Date.now());
  }

  /**
   * Schedules a named timer, replacing any timer already scheduled under the same key.
   */
  schedule(key: TimerKey, delayMs: number, callback: () => void): void {
    this.cancel(key);
    const gen = (this.generations.get(key) ?? 0) + 1;
    this.generations.set(key, gen);

    const timer = this.setTimeoutFn(() => {
      if (this.generations.get(key) !== gen) return; // stale callback
      this.timers.delete(key);
      this.deadlines.delete(key);
      callback();
    }, delayMs);

    this.timers.set(key, timer);
    this.deadlines.set(key, this.now() + delayMs);
  }

  cancel(key: TimerKey): void {
    const timer = this.timers.get(key);
    if (timer) {
      this.clearTimeoutFn(timer);
      this.timers.delete(key);
    }
    this.deadlines.delete(key);
    // bump the generation so an already queued callback turns into a no-op
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
  }

  cancelAll(): void {
    for (const [key, timer] of this.timers) {
      this.clearTimeoutFn(timer);
      this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    }
    this.timers.clear();
    this.deadlines.clear();
  }

  isActive(key: TimerKey): boolean {
    return this.timers.has(key);
  }

  /** Epoch ms at which the timer fires, or null when not scheduled */
  getDeadline(key: TimerKey): number | null {
    return this.deadlines.get(key) ?? null;
  }
}
