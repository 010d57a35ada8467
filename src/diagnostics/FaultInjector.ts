import { EventEmitter } from 'eventemitter3';

export interface FaultPlan {
  /** Probability of dropping each message, 0..1 */
  dropRate?: number;
  /** Probability of delivering each message twice, 0..1 */
  duplicateRate?: number;
  /** Drop every Nth message, counting from 1 */
  dropEvery?: number;
  /** Duplicate every Nth message, counting from 1 */
  duplicateEvery?: number;
  latencyMs?: number;
  /** Uniform extra delay in [0, jitterMs) */
  jitterMs?: number;
}

export interface FaultDecision {
  /** Index of the message among all processed, from 1 */
  index: number;
  drop: boolean;
  copies: number;
  delayMs: number;
}

export interface FaultStatistics {
  processed: number;
  dropped: number;
  duplicated: number;
  delayed: number;
}

export interface FaultInjectorEvents {
  'message-dropped': (decision: FaultDecision) => void;
  'message-duplicated': (decision: FaultDecision) => void;
}

export type RandomSource = () => number;

/**
 * Decides the fate of each unreliable message crossing a simulated link
 */
export class FaultInjector extends EventEmitter<FaultInjectorEvents> {
  private readonly plan: FaultPlan;
  private readonly random: RandomSource;
  private statistics: FaultStatistics = {
    processed: 0,
    dropped: 0,
    duplicated: 0,
    delayed: 0
  };

  constructor(plan: FaultPlan = {}, random: RandomSource = Math.random) {
    super();
    FaultInjector.validatePlan(plan);
    this.plan = { ...plan };
    this.random = random;
  }

  /**
   * False when the plan leaves every message untouched
   */
  isActive(): boolean {
    const plan = this.plan;
    return Boolean(
      plan.dropRate || plan.duplicateRate || plan.dropEvery ||
      plan.duplicateEvery || plan.latencyMs || plan.jitterMs
    );
  }

  decide(): FaultDecision {
    const index = ++this.statistics.processed;
    const plan = this.plan;

    const drop = this.hits(index, plan.dropEvery) || this.chance(plan.dropRate);
    if (drop) {
      const decision: FaultDecision = { index, drop: true, copies: 0, delayMs: 0 };
      this.statistics.dropped++;
      this.emit('message-dropped', decision);
      return decision;
    }

    const duplicate = this.hits(index, plan.duplicateEvery) || this.chance(plan.duplicateRate);
    const delayMs = this.calculateDelay();
    const decision: FaultDecision = { index, drop: false, copies: duplicate ? 2 : 1, delayMs };

    if (delayMs > 0) {
      this.statistics.delayed++;
    }
    if (duplicate) {
      this.statistics.duplicated++;
      this.emit('message-duplicated', decision);
    }
    return decision;
  }

  getStatistics(): FaultStatistics {
    return { ...this.statistics };
  }

  private hits(index: number, every: number | undefined): boolean {
    return every !== undefined && index % every === 0;
  }

  private chance(rate: number | undefined): boolean {
    return rate !== undefined && rate > 0 && this.random() < rate;
  }

  private calculateDelay(): number {
    const latency = this.plan.latencyMs ?? 0;
    const jitter = this.plan.jitterMs ? this.random() * this.plan.jitterMs : 0;
    return latency + jitter;
  }

  static validatePlan(plan: FaultPlan): void {
    validateRate(plan.dropRate, 'Drop rate');
    validateRate(plan.duplicateRate, 'Duplicate rate');
    validateInterval(plan.dropEvery, 'dropEvery');
    validateInterval(plan.duplicateEvery, 'duplicateEvery');
    validateDelay(plan.latencyMs, 'Latency');
    validateDelay(plan.jitterMs, 'Jitter');
  }
}

function validateRate(rate: number | undefined, rateName: string): void {
  if (rate === undefined) return;
  if (typeof rate !== 'number' || isNaN(rate)) {
    throw new Error(`${rateName} must be a valid number`);
  }
  if (rate < 0 || rate > 1) {
    throw new Error(`${rateName} must be between 0 and 1`);
  }
}

function validateInterval(every: number | undefined, name: string): void {
  if (every === undefined) return;
  if (!Number.isInteger(every) || every < 1) {
    throw new Error(`${name} must be a positive integer`);
  }
}

function validateDelay(delay: number | undefined, name: string): void {
  if (delay === undefined) return;
  if (typeof delay !== 'number' || isNaN(delay)) {
    throw new Error(`${name} must be a valid number`);
  }
  if (delay < 0) {
    throw new Error(`${name} must be non-negative`);
  }
}
