import {
  ClientMessageType,
  ConnectionInfoMessage,
  EntityMoveMessage,
  PlayerMoveMessage,
  Rotation,
  ServerMessageType,
  Vector3
} from '../types';

export const HANDSHAKE_LOGIN = 'consistency-test';
export const PLACEHOLDER_ROTATION: Readonly<Rotation> = Object.freeze({ yaw: 0, pitch: 0 });
export const ECHO_ENTITY_ID = 1;

export function encodeSequence(sequence: number): Vector3 {
  return { x: sequence, y: 0, z: 0 };
}

/**
 * Recover the sequence number from a position; fractions truncate, and
 * negative or non-finite values read as 0
 */
export function decodeSequence(position: Vector3): number {
  const value = Math.trunc(position.x);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function createPlayerMove(sequence: number): PlayerMoveMessage {
  return {
    type: ClientMessageType.PLAYER_MOVE,
    position: encodeSequence(sequence),
    rotation: { ...PLACEHOLDER_ROTATION }
  };
}

export function createEcho(move: PlayerMoveMessage, tickOffsetMs: number): EntityMoveMessage {
  return {
    type: ServerMessageType.ENTITY_MOVE,
    worldSlug: '',
    id: ECHO_ENTITY_ID,
    position: { ...move.position },
    rotation: { ...move.rotation },
    tickOffsetMs
  };
}

export interface ClientEnvironment {
  version: string;
  architecture: string;
  renderingDevice: string;
}

export function createConnectionInfo(environment: ClientEnvironment): ConnectionInfoMessage {
  return {
    type: ClientMessageType.CONNECTION_INFO,
    login: HANDSHAKE_LOGIN,
    ...environment
  };
}

/**
 * Strictly increasing sequence numbers starting at 1
 */
export class SequenceCounter {
  private last = 0;

  next(): number {
    return ++this.last;
  }

  get current(): number {
    return this.last;
  }
}

/**
 * Elapsed-time gate for the client's send cadence. A send is due once at
 * least one interval has passed since the last send, measured from tick starts.
 */
export class SendGate {
  readonly intervalMs: number;
  private lastSend: number;

  constructor(intervalMs: number, startAt: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error('Send interval must be a positive number');
    }
    this.intervalMs = intervalMs;
    this.lastSend = startAt;
  }

  isDue(tickStart: number): boolean {
    return tickStart - this.lastSend >= this.intervalMs;
  }

  markSent(tickStart: number): void {
    this.lastSend = tickStart;
  }

  reset(now: number): void {
    this.lastSend = now;
  }
}
