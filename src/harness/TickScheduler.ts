import { EventEmitter } from 'events';
import { Clock, SystemClock } from '../common/Clock';

export const DEFAULT_TICK_RATE = 64;

/**
 * What a tick body reports back to the scheduler:
 * - `waiting`: no peer connection yet (or any more)
 * - `connected`: a peer connection is active
 * - `abort`: a fatal error occurred, stop now
 */
export type TickStatus = 'waiting' | 'connected' | 'abort';

export interface TickContext {
  /** Ordinal of the iteration, from 0 */
  tick: number;
  tickStart: number;
  periodMs: number;
}

export type TickBody = (context: TickContext) => Promise<TickStatus> | TickStatus;

export interface TickSchedulerOptions {
  durationMs: number;
  /** Iterations per second */
  tickRate?: number;
  clock?: Clock;
}

export interface SchedulerResult {
  ticks: number;
  aborted: boolean;
  elapsedMs: number;
}

export interface TickOverrun {
  tick: number;
  elapsedMs: number;
  periodMs: number;
}

export interface TickScheduler {
  on(event: 'overrun', listener: (overrun: TickOverrun) => void): this;
  on(event: 'stopped', listener: (result: SchedulerResult) => void): this;
  on(event: string, listener: (...args: unknown[]) => void): this;

  emit(event: 'overrun', overrun: TickOverrun): boolean;
  emit(event: 'stopped', result: SchedulerResult): boolean;
  emit(event: string, ...args: unknown[]): boolean;
}

/**
 * Fixed-cadence loop for one role.
 *
 * Each iteration sleeps for whatever is left of the period after the body
 * ran. An overrunning iteration is followed immediately by the next one; missed
 * periods are never made up, so drift accumulates instead of bursting.
 */
export class TickScheduler extends EventEmitter {
  readonly periodMs: number;
  readonly durationMs: number;
  private readonly clock: Clock;
  private running = false;

  constructor(options: TickSchedulerOptions) {
    super();
    const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
    if (!Number.isFinite(tickRate) || tickRate <= 0) {
      throw new Error('Tick rate must be a positive number');
    }
    if (!Number.isFinite(options.durationMs) || options.durationMs < 0) {
      throw new Error('Duration must be a non-negative number');
    }

    this.periodMs = 1000 / tickRate;
    this.durationMs = options.durationMs;
    this.clock = options.clock ?? new SystemClock();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run until the duration has elapsed while connected, or the body aborts.
   * A run that never sees a connection does not end on its own.
   */
  async run(body: TickBody): Promise<SchedulerResult> {
    if (this.running) {
      throw new Error('Scheduler is already running');
    }
    this.running = true;

    const startedAt = this.clock.now();
    const endAt = startedAt + this.durationMs;
    let tick = 0;
    let aborted = false;

    try {
      for (;;) {
        const tickStart = this.clock.now();
        const status = await body({ tick, tickStart, periodMs: this.periodMs });
        tick++;

        if (status === 'abort') {
          aborted = true;
          break;
        }
        if (status === 'connected' && this.clock.now() >= endAt) {
          break;
        }

        const elapsed = this.clock.now() - tickStart;
        if (elapsed < this.periodMs) {
          await this.clock.sleep(this.periodMs - elapsed);
        } else {
          this.emit('overrun', { tick: tick - 1, elapsedMs: elapsed, periodMs: this.periodMs });
        }
      }
    } finally {
      this.running = false;
    }

    const result: SchedulerResult = {
      ticks: tick,
      aborted,
      elapsedMs: this.clock.now() - startedAt
    };
    this.emit('stopped', result);
    return result;
  }
}
