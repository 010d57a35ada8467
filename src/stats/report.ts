import {
  ClientRunStats,
  DistributionEntry,
  RunStats,
  ServerRunStats
} from './ConsistencyStats';

export const NO_DATA_LINE = 'No data received.';

const SERVER_HEADER = '========== SERVER RECEIVE STATS ==========';
const SERVER_FOOTER = '==========================================';
const CLIENT_HEADER = '========== CLIENT STATS ==========';
const CLIENT_FOOTER = '==================================';

function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function distributionLines(title: string, distribution: DistributionEntry[]): string[] {
  return [
    title,
    ...distribution.map(entry =>
      `  ${entry.messagesPerTick} msg/tick: ${entry.ticks} ticks (${percent(entry.percentage)})`
    )
  ];
}

export function formatServerReport(stats: ServerRunStats): string {
  const lines = [
    SERVER_HEADER,
    `Total ticks: ${stats.totalTicks}`,
    `Total messages received: ${stats.messagesReceived}`,
    `Echo updates sent back: ${stats.echoesSent}`
  ];

  const ticks = stats.ticks;
  if (!ticks) {
    lines.push(NO_DATA_LINE, SERVER_FOOTER);
    return lines.join('\n');
  }

  lines.push(
    '',
    ...distributionLines('Messages per tick distribution:', ticks.distribution),
    '',
    `Batched ticks (>1 msg): ${ticks.batchedTicks} (${percent(ticks.batchedRatio * 100)})`,
    `Empty ticks (0 msg): ${ticks.emptyTicks} (${percent(ticks.emptyRatio * 100)})`,
    `Longest empty streak: ${ticks.longestEmptyStreak} ticks`,
    `Out of order messages: ${ticks.outOfOrder}`
  );

  const range = ticks.sequenceRange;
  if (range) {
    lines.push(
      `Sequence range: ${range.first} .. ${range.last} ` +
      `(expected ${range.expected}, got ${range.received}, lost ${range.lost})`
    );
  }

  lines.push(`Max messages in single tick: ${ticks.maxBatch}`, SERVER_FOOTER);
  return lines.join('\n');
}

export function formatClientReport(stats: ClientRunStats): string {
  const lines = [
    CLIENT_HEADER,
    `Total updates sent: ${stats.messagesSent}`,
    `Total echo updates received: ${stats.echoesReceived}`,
    `Client ticks: ${stats.totalTicks}`,
    ''
  ];

  const ticks = stats.ticks;
  if (ticks) {
    lines.push(
      ...distributionLines('Echo updates per tick distribution:', ticks.distribution),
      '',
      `Batched ticks (>1 msg): ${ticks.batchedTicks} (${percent(ticks.batchedRatio * 100)})`,
      `Longest empty streak: ${ticks.longestEmptyStreak} ticks`,
      `Out of order echoes: ${ticks.outOfOrder}`,
      `Max messages in single tick: ${ticks.maxBatch}`
    );
  } else {
    lines.push(NO_DATA_LINE);
  }

  lines.push(
    '',
    `Message loss: ${stats.loss.lost} (${percent(stats.loss.percentage)})`,
    CLIENT_FOOTER
  );
  return lines.join('\n');
}

export function formatReport(stats: RunStats): string {
  return stats.role === 'server' ? formatServerReport(stats) : formatClientReport(stats);
}
