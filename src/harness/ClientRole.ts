import { Clock, SystemClock } from '../common/Clock';
import { Logger, silentLogger } from '../common/logger';
import { ClientRunStats, deriveClientStats } from '../stats/ConsistencyStats';
import { RunRecorder } from '../stats/RunRecorder';
import { ClientTransport } from '../transport/Transport';
import { DeliveryClass, ServerMessageType } from '../types';
import { HARNESS_VERSION } from '../version';
import { ClientConnectionTracker, ConnectionState } from './ConnectionTracker';
import {
  ClientEnvironment,
  createConnectionInfo,
  createPlayerMove,
  decodeSequence,
  SendGate,
  SequenceCounter
} from './exchange';
import { DEFAULT_TICK_RATE, TickContext, TickScheduler, TickStatus } from './TickScheduler';
import { RunOptions, RunResult } from './types';

export interface ClientRoleOptions {
  transport: ClientTransport;
  /** Target send rate in Hz */
  sendRate?: number;
  clock?: Clock;
  logger?: Logger;
  environment?: Partial<ClientEnvironment>;
}

export function defaultEnvironment(): ClientEnvironment {
  return {
    version: HARNESS_VERSION,
    architecture: process.arch,
    renderingDevice: 'headless'
  };
}

/**
 * Client half of the exchange: emits sequenced updates on an elapsed-time
 * cadence once the server has accepted it, and counts the echoes
 */
export class ClientRole {
  private readonly transport: ClientTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly environment: ClientEnvironment;
  private readonly tracker = new ClientConnectionTracker();
  private readonly recorder = new RunRecorder();
  private readonly sequence = new SequenceCounter();
  private readonly gate: SendGate;
  private messagesSent = 0;
  private echoesReceived = 0;

  constructor(options: ClientRoleOptions) {
    this.transport = options.transport;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? silentLogger;
    this.environment = { ...defaultEnvironment(), ...options.environment };

    const sendRate = options.sendRate ?? DEFAULT_TICK_RATE;
    this.gate = new SendGate(1000 / sendRate, this.clock.now());
  }

  get connectionState(): ConnectionState {
    return this.tracker.state;
  }

  get lastSequence(): number {
    return this.sequence.current;
  }

  async tick({ tickStart, periodMs }: TickContext): Promise<TickStatus> {
    await this.transport.step(periodMs);

    const errors = this.transport.drainErrors();
    if (errors.length > 0) {
      for (const error of errors) {
        this.logger.error(`Client error: ${error.message}`);
      }
      return 'abort';
    }

    for (const message of this.transport.drainMessages()) {
      switch (message.type) {
        case ServerMessageType.ALLOW_CONNECTION:
          this.handleAllowConnection();
          break;
        case ServerMessageType.ENTITY_MOVE:
          this.echoesReceived++;
          this.recorder.observe({
            receivedAt: this.clock.now(),
            sequence: decodeSequence(message.position)
          });
          break;
        default:
          break;
      }
    }

    if (!this.tracker.isConnected) {
      this.recorder.discardTick();
      return 'waiting';
    }

    this.recorder.closeTick();

    if (this.gate.isDue(tickStart)) {
      const sequence = this.sequence.next();
      this.transport.sendMessage(DeliveryClass.UNRELIABLE, createPlayerMove(sequence));
      this.messagesSent++;
      this.gate.markSent(tickStart);
    }

    return 'connected';
  }

  stats(): ClientRunStats {
    return deriveClientStats({
      tickCounts: this.recorder.getTickCounts(),
      observations: this.recorder.getObservations(),
      messagesSent: this.messagesSent,
      echoesReceived: this.echoesReceived
    });
  }

  private handleAllowConnection(): void {
    const now = this.clock.now();
    if (!this.tracker.acknowledge(now)) {
      this.logger.debug('Ignoring repeated connection acknowledgment');
      return;
    }

    this.logger.info('Connection allowed, starting test...');
    this.transport.sendMessage(DeliveryClass.RELIABLE_ORDERED, createConnectionInfo(this.environment));
    this.gate.reset(now);
  }
}

export interface ClientRunOptions extends RunOptions {
  transport: ClientTransport;
  sendRate?: number;
  environment?: Partial<ClientEnvironment>;
}

export async function runClient(options: ClientRunOptions): Promise<RunResult<ClientRunStats>> {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? new SystemClock();
  const role = new ClientRole({
    transport: options.transport,
    sendRate: options.sendRate ?? options.tickRate,
    clock,
    logger,
    environment: options.environment
  });
  const scheduler = new TickScheduler({ durationMs: options.durationMs, tickRate: options.tickRate, clock });

  scheduler.on('overrun', overrun => {
    logger.debug(`Tick ${overrun.tick} overran: ${overrun.elapsedMs.toFixed(2)}ms`);
  });

  const result = await scheduler.run(context => role.tick(context));
  if (result.aborted) {
    logger.warn(`Client run aborted after ${result.ticks} ticks`);
  } else {
    logger.info(`Client run finished after ${result.ticks} ticks`);
  }

  return { stats: role.stats(), scheduler: result };
}
