import { Logger } from '../common/logger';
import { ConnectionEvent, ServerConnection } from '../transport/Transport';
import { DeliveryClass, ServerMessageType } from '../types';

export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTED = 'connected'
}

/**
 * Tracks the single peer a server role talks to.
 *
 * A new Connect replaces whatever connection was held and closes the old one;
 * a Disconnect clears the slot whichever client it names.
 */
export class ServerConnectionTracker {
  private current?: ServerConnection;

  constructor(private readonly logger: Logger) {}

  /**
   * Apply the tick's connection events in order
   */
  apply(events: readonly ConnectionEvent[]): void {
    for (const event of events) {
      if (event.type === 'connect') {
        this.handleConnect(event.connection);
      } else {
        this.handleDisconnect(event.clientId, event.reason);
      }
    }
  }

  get connection(): ServerConnection | undefined {
    return this.current;
  }

  get state(): ConnectionState {
    return this.current ? ConnectionState.CONNECTED : ConnectionState.DISCONNECTED;
  }

  private handleConnect(connection: ServerConnection): void {
    this.logger.info(`Client connected: id=${connection.clientId}`);
    const previous = this.current;
    if (previous && previous.clientId !== connection.clientId) {
      this.logger.warn(`Replacing connection ${previous.clientId} with ${connection.clientId}`);
      previous.close(`replaced by ${connection.clientId}`);
    }
    connection.sendMessage(DeliveryClass.RELIABLE_ORDERED, { type: ServerMessageType.ALLOW_CONNECTION });
    this.current = connection;
  }

  private handleDisconnect(clientId: string, reason: string): void {
    this.logger.info(`Client disconnected: id=${clientId} reason=${reason}`);
    this.current = undefined;
  }
}

/**
 * Client side of the lifecycle: connected once the server's acceptance
 * acknowledgment arrives, not when the transport link comes up.
 */
export class ClientConnectionTracker {
  private connectedAt?: number;

  get state(): ConnectionState {
    return this.connectedAt === undefined ? ConnectionState.DISCONNECTED : ConnectionState.CONNECTED;
  }

  get isConnected(): boolean {
    return this.connectedAt !== undefined;
  }

  /**
   * Returns true only for the acknowledgment that flips the state
   */
  acknowledge(now: number): boolean {
    if (this.connectedAt !== undefined) {
      return false;
    }
    this.connectedAt = now;
    return true;
  }
}
