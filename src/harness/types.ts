import { Clock } from '../common/Clock';
import { Logger } from '../common/logger';
import { SchedulerResult } from './TickScheduler';

export interface RunOptions {
  durationMs: number;
  /** Iterations per second */
  tickRate?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RunResult<S> {
  stats: S;
  scheduler: SchedulerResult;
}
