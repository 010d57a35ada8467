import { ClientMessage, DeliveryClass, ServerMessage } from '../types';

/**
 * Server-side handle for one connected peer
 */
export interface ServerConnection {
  readonly clientId: string;

  /**
   * Take every client message delivered since the last drain, in delivery order
   */
  drainMessages(): ClientMessage[];

  sendMessage(delivery: DeliveryClass, message: ServerMessage): void;

  /**
   * Drop the peer from the server side. Undrained messages are discarded and
   * no disconnect event is reported for it.
   */
  close(reason: string): void;
}

export type ConnectionEvent =
  | { type: 'connect'; connection: ServerConnection }
  | { type: 'disconnect'; clientId: string; reason: string };

interface SteppedTransport {
  /**
   * Advance transport processing, suspending for at most `maxDurationMs`
   */
  step(maxDurationMs: number): Promise<void>;

  /**
   * Take every transport error reported since the last drain
   */
  drainErrors(): Error[];

  close(): Promise<void>;
}

export interface ServerTransport extends SteppedTransport {
  drainConnections(): ConnectionEvent[];
}

export interface ClientTransport extends SteppedTransport {
  drainMessages(): ServerMessage[];
  sendMessage(delivery: DeliveryClass, message: ClientMessage): void;
}
