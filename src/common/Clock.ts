import { performance } from 'perf_hooks';

/**
 * Time source for the tick loops. All values are milliseconds.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Monotonic wall clock
 */
export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      setTimeout(resolve, Math.max(0, ms));
    });
  }
}

interface Sleeper {
  wakeAt: number;
  order: number;
  resolve: () => void;
}

/**
 * Virtual clock for deterministic runs.
 *
 * Time only moves when a sleeper is woken. Each `sleep` schedules one wake-up
 * on the macrotask queue, so every cooperative loop sharing the clock has parked
 * by the time the earliest sleeper is chosen. Ties wake in call order.
 */
export class ManualClock implements Clock {
  private current: number;
  private sleepers: Sleeper[] = [];
  private sequence = 0;

  constructor(startAt = 0) {
    this.current = startAt;
  }

  now(): number {
    return this.current;
  }

  /**
   * Move time forward without waking anyone
   */
  advance(ms: number): void {
    if (ms < 0) {
      throw new Error('Cannot advance a clock backwards');
    }
    this.current += ms;
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.sleepers.push({
        wakeAt: this.current + Math.max(0, ms),
        order: this.sequence++,
        resolve
      });
      setImmediate(() => this.wakeNext());
    });
  }

  pendingSleepers(): number {
    return this.sleepers.length;
  }

  private wakeNext(): void {
    this.sleepers.sort((a, b) => a.wakeAt - b.wakeAt || a.order - b.order);
    const next = this.sleepers.shift();
    if (!next) return;

    if (next.wakeAt > this.current) {
      this.current = next.wakeAt;
    }
    next.resolve();
  }
}
