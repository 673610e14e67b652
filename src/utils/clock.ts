export type TimerHandle = NodeJS.Timeout | number;

/**
 * Time source and timer seam shared by the session and the VI controller.
 * Tests swap in {@link ManualClock} to advance time deterministically.
 */
export interface Clock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => {
    clearTimeout(handle);
  },
};

interface ScheduledTimer {
  id: number;
  fireAt: number;
  callback: () => void;
}

export class ManualClock implements Clock {
  private current: number;
  private nextId = 1;
  private timers: ScheduledTimer[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(callback: () => void, delayMs: number): TimerHandle {
    const timer: ScheduledTimer = { id: this.nextId++, fireAt: this.current + Math.max(0, delayMs), callback };
    this.timers.push(timer);
    return timer.id;
  }

  clearTimeout(handle: TimerHandle): void {
    this.timers = this.timers.filter((timer) => timer.id !== handle);
  }

  /**
   * Delays of timers still waiting, in scheduling order
   */
  pendingDelays(): number[] {
    return this.timers.map((timer) => timer.fireAt - this.current);
  }

  get pendingCount(): number {
    return this.timers.length;
  }

  /**
   * Move time forward, firing due timers in deadline order.
   */
  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((timer) => timer.fireAt <= target)
        .sort((a, b) => a.fireAt - b.fireAt || a.id - b.id)[0];
      if (!due) break;
      this.timers = this.timers.filter((timer) => timer.id !== due.id);
      this.current = due.fireAt;
      due.callback();
    }
    this.current = target;
  }
}
