import { Observation } from './ConsistencyStats';

/**
 * Append-only buffers of raw per-tick observations for one role.
 */
export class RunRecorder {
  private readonly tickCounts: number[] = [];
  private readonly observations: Observation[] = [];
  private pendingCount = 0;

  /**
   * Record one received message for the tick in progress
   */
  observe(observation: Observation): void {
    this.observations.push({ ...observation });
    this.pendingCount++;
  }

  /**
   * Close the tick in progress, appending its count (zero included)
   */
  closeTick(): number {
    const count = this.pendingCount;
    this.tickCounts.push(count);
    this.pendingCount = 0;
    return count;
  }

  /**
   * Forget messages seen in a tick that will not be recorded
   */
  discardTick(): void {
    this.pendingCount = 0;
  }

  getTickCounts(): readonly number[] {
    return this.tickCounts.slice();
  }

  getObservations(): readonly Observation[] {
    return this.observations.map(observation => ({ ...observation }));
  }
}
