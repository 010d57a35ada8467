import { Clock, SystemClock } from '../common/Clock';
import { Logger, silentLogger } from '../common/logger';
import { deriveServerStats, ServerRunStats } from '../stats/ConsistencyStats';
import { RunRecorder } from '../stats/RunRecorder';
import { ServerTransport } from '../transport/Transport';
import { ClientMessageType, DeliveryClass } from '../types';
import { ConnectionState, ServerConnectionTracker } from './ConnectionTracker';
import { createEcho, decodeSequence } from './exchange';
import { TickContext, TickScheduler, TickStatus } from './TickScheduler';
import { RunOptions, RunResult } from './types';

export interface ServerRoleOptions {
  transport: ServerTransport;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Server half of the exchange: echoes every sequenced update straight back
 * and records what arrived in each tick
 */
export class ServerRole {
  private readonly transport: ServerTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly tracker: ServerConnectionTracker;
  private readonly recorder = new RunRecorder();
  private echoesSent = 0;

  constructor(options: ServerRoleOptions) {
    this.transport = options.transport;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? silentLogger;
    this.tracker = new ServerConnectionTracker(this.logger);
  }

  get connectionState(): ConnectionState {
    return this.tracker.state;
  }

  async tick({ tickStart, periodMs }: TickContext): Promise<TickStatus> {
    await this.transport.step(periodMs);

    for (const error of this.transport.drainErrors()) {
      this.logger.error(`Server error: ${error.message}`);
    }

    this.tracker.apply(this.transport.drainConnections());

    const connection = this.tracker.connection;
    if (!connection) {
      return 'waiting';
    }

    for (const message of connection.drainMessages()) {
      switch (message.type) {
        case ClientMessageType.PLAYER_MOVE: {
          const now = this.clock.now();
          this.recorder.observe({ receivedAt: now, sequence: decodeSequence(message.position) });
          connection.sendMessage(DeliveryClass.UNRELIABLE, createEcho(message, now - tickStart));
          this.echoesSent++;
          break;
        }
        case ClientMessageType.CONNECTION_INFO:
          this.logger.info(
            `Client sent ConnectionInfo: login=${message.login} version=${message.version} ` +
            `arch=${message.architecture}`
          );
          break;
        default:
          break;
      }
    }

    this.recorder.closeTick();
    return 'connected';
  }

  stats(): ServerRunStats {
    return deriveServerStats({
      tickCounts: this.recorder.getTickCounts(),
      observations: this.recorder.getObservations(),
      echoesSent: this.echoesSent
    });
  }
}

export interface ServerRunOptions extends RunOptions {
  transport: ServerTransport;
}

export async function runServer(options: ServerRunOptions): Promise<RunResult<ServerRunStats>> {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? new SystemClock();
  const role = new ServerRole({ transport: options.transport, clock, logger });
  const scheduler = new TickScheduler({ durationMs: options.durationMs, tickRate: options.tickRate, clock });

  scheduler.on('overrun', overrun => {
    logger.debug(`Tick ${overrun.tick} overran: ${overrun.elapsedMs.toFixed(2)}ms`);
  });

  logger.info('Waiting for client connection...');
  const result = await scheduler.run(context => role.tick(context));
  logger.info(`Server run finished after ${result.ticks} ticks`);

  return { stats: role.stats(), scheduler: result };
}
