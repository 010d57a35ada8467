/**
 * Derivation of the end-of-run consistency metrics.
 *
 * Everything here is a pure function over finalized record buffers: nothing is
 * computed incrementally and nothing mutates its input.
 */

/**
 * A single received message. `receivedAt` is the clock reading at receipt and
 * `sequence` the sequence number decoded from the payload.
 */
export interface Observation {
  receivedAt: number;
  sequence: number;
}

export interface DistributionEntry {
  messagesPerTick: number;
  ticks: number;
  /** Share of connected ticks, 0..100 */
  percentage: number;
}

export interface TickDistributionStats {
  totalTicks: number;
  distribution: DistributionEntry[];
  batchedTicks: number;
  /** Fraction of ticks with more than one message, 0..1 */
  batchedRatio: number;
  emptyTicks: number;
  /** Fraction of ticks with no message, 0..1 */
  emptyRatio: number;
  maxBatch: number;
  longestEmptyStreak: number;
}

export interface SequenceRange {
  first: number;
  last: number;
  expected: number;
  received: number;
  lost: number;
}

export interface ServerRunRecords {
  tickCounts: readonly number[];
  observations: readonly Observation[];
  echoesSent: number;
}

export interface ClientRunRecords {
  tickCounts: readonly number[];
  observations: readonly Observation[];
  messagesSent: number;
  echoesReceived: number;
}

export interface ServerTickStats extends TickDistributionStats {
  outOfOrder: number;
  sequenceRange?: SequenceRange;
}

export interface ClientTickStats extends TickDistributionStats {
  outOfOrder: number;
}

export interface ServerRunStats {
  role: 'server';
  totalTicks: number;
  messagesReceived: number;
  echoesSent: number;
  /** Absent when no tick was ever recorded */
  ticks?: ServerTickStats;
}

export interface EchoLoss {
  lost: number;
  /** Share of sent messages, 0..100 */
  percentage: number;
}

export interface ClientRunStats {
  role: 'client';
  totalTicks: number;
  messagesSent: number;
  echoesReceived: number;
  ticks?: ClientTickStats;
  loss: EchoLoss;
}

export type RunStats = ServerRunStats | ClientRunStats;

/**
 * Map each per-tick message count to the number of ticks that saw it,
 * ascending by count
 */
export function buildDistribution(tickCounts: readonly number[]): DistributionEntry[] {
  const totals = new Map<number, number>();
  for (const count of tickCounts) {
    totals.set(count, (totals.get(count) ?? 0) + 1);
  }

  const totalTicks = tickCounts.length;
  return Array.from(totals.entries())
    .sort(([a], [b]) => a - b)
    .map(([messagesPerTick, ticks]) => ({
      messagesPerTick,
      ticks,
      percentage: totalTicks > 0 ? (ticks / totalTicks) * 100 : 0
    }));
}

export function longestEmptyStreak(tickCounts: readonly number[]): number {
  let longest = 0;
  let current = 0;
  for (const count of tickCounts) {
    current = count === 0 ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
}

/**
 * Returns undefined when no tick was recorded
 */
export function summarizeTicks(tickCounts: readonly number[]): TickDistributionStats | undefined {
  const totalTicks = tickCounts.length;
  if (totalTicks === 0) {
    return undefined;
  }

  const batchedTicks = tickCounts.filter(count => count > 1).length;
  const emptyTicks = tickCounts.filter(count => count === 0).length;

  return {
    totalTicks,
    distribution: buildDistribution(tickCounts),
    batchedTicks,
    batchedRatio: batchedTicks / totalTicks,
    emptyTicks,
    emptyRatio: emptyTicks / totalTicks,
    maxBatch: tickCounts.reduce((max, count) => Math.max(max, count), 0),
    longestEmptyStreak: longestEmptyStreak(tickCounts)
  };
}

/**
 * Number of adjacent pairs where a sequence does not exceed its predecessor.
 * Duplicates count.
 */
export function countOutOfOrder(sequences: readonly number[]): number {
  let outOfOrder = 0;
  for (let i = 1; i < sequences.length; i++) {
    if (sequences[i] <= sequences[i - 1]) {
      outOfOrder++;
    }
  }
  return outOfOrder;
}

/**
 * Infer loss from the first and last sequence received, assuming the sender
 * numbered its stream without gaps.
 */
export function estimateSequenceLoss(sequences: readonly number[]): SequenceRange | undefined {
  if (sequences.length === 0) {
    return undefined;
  }

  const first = sequences[0];
  const last = sequences[sequences.length - 1];
  const expected = Math.max(0, last - first + 1);
  const received = sequences.length;

  return {
    first,
    last,
    expected,
    received,
    lost: Math.max(0, expected - received)
  };
}

export function estimateEchoLoss(sent: number, received: number): EchoLoss {
  const lost = Math.max(0, sent - received);
  return {
    lost,
    percentage: sent > 0 ? (lost / sent) * 100 : 0
  };
}

export function deriveServerStats(records: ServerRunRecords): ServerRunStats {
  const sequences = records.observations.map(observation => observation.sequence);
  const summary = summarizeTicks(records.tickCounts);

  return {
    role: 'server',
    totalTicks: records.tickCounts.length,
    messagesReceived: records.observations.length,
    echoesSent: records.echoesSent,
    ticks: summary && {
      ...summary,
      outOfOrder: countOutOfOrder(sequences),
      sequenceRange: estimateSequenceLoss(sequences)
    }
  };
}

export function deriveClientStats(records: ClientRunRecords): ClientRunStats {
  const sequences = records.observations.map(observation => observation.sequence);
  const summary = summarizeTicks(records.tickCounts);

  return {
    role: 'client',
    totalTicks: records.tickCounts.length,
    messagesSent: records.messagesSent,
    echoesReceived: records.echoesReceived,
    ticks: summary && {
      ...summary,
      outOfOrder: countOutOfOrder(sequences)
    },
    loss: estimateEchoLoss(records.messagesSent, records.echoesReceived)
  };
}
