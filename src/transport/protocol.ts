import { isRecord } from '../common/utils';
import {
  ClientMessage,
  ClientMessageType,
  Rotation,
  ServerMessage,
  ServerMessageType,
  Vector3
} from '../types';

/**
 * Frames carried by the WebSocket (reliable-ordered) channel
 */
export type ReliableFrame<T> =
  | { kind: 'welcome'; clientId: string }
  | { kind: 'message'; message: T };

/**
 * Frames carried by the UDP (unreliable) channel
 */
export type DatagramFrame<T> =
  | { kind: 'bind'; clientId: string }
  | { kind: 'message'; clientId: string; message: T };

type MessageGuard<T> = (value: unknown) => value is T;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isVector3(value: unknown): value is Vector3 {
  return isRecord(value) && isFiniteNumber(value.x) && isFiniteNumber(value.y) && isFiniteNumber(value.z);
}

export function isRotation(value: unknown): value is Rotation {
  return isRecord(value) && isFiniteNumber(value.yaw) && isFiniteNumber(value.pitch);
}

export function isClientMessage(value: unknown): value is ClientMessage {
  if (!isRecord(value)) return false;

  switch (value.type) {
    case ClientMessageType.CONNECTION_INFO:
      return typeof value.login === 'string' &&
        typeof value.version === 'string' &&
        typeof value.architecture === 'string' &&
        typeof value.renderingDevice === 'string';
    case ClientMessageType.PLAYER_MOVE:
      return isVector3(value.position) && isRotation(value.rotation);
    case ClientMessageType.CONSOLE_INPUT:
      return typeof value.command === 'string';
    default:
      return false;
  }
}

export function isServerMessage(value: unknown): value is ServerMessage {
  if (!isRecord(value)) return false;

  switch (value.type) {
    case ServerMessageType.ALLOW_CONNECTION:
      return true;
    case ServerMessageType.ENTITY_MOVE:
      return typeof value.worldSlug === 'string' &&
        isFiniteNumber(value.id) &&
        isVector3(value.position) &&
        isRotation(value.rotation) &&
        isFiniteNumber(value.tickOffsetMs);
    case ServerMessageType.CONSOLE_OUTPUT:
      return typeof value.text === 'string';
    default:
      return false;
  }
}

function parseJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

export function encodeFrame<T>(frame: ReliableFrame<T> | DatagramFrame<T>): string {
  return JSON.stringify(frame);
}

/**
 * Decode a WebSocket frame, returning undefined for anything malformed
 */
export function decodeReliableFrame<T>(data: string, guard: MessageGuard<T>): ReliableFrame<T> | undefined {
  const frame = parseJson(data);
  if (!isRecord(frame)) return undefined;

  if (frame.kind === 'welcome' && typeof frame.clientId === 'string') {
    return { kind: 'welcome', clientId: frame.clientId };
  }
  if (frame.kind === 'message' && guard(frame.message)) {
    return { kind: 'message', message: frame.message };
  }
  return undefined;
}

/**
 * Decode a UDP datagram, returning undefined for anything malformed
 */
export function decodeDatagramFrame<T>(data: string, guard: MessageGuard<T>): DatagramFrame<T> | undefined {
  const frame = parseJson(data);
  if (!isRecord(frame) || typeof frame.clientId !== 'string') return undefined;

  if (frame.kind === 'bind') {
    return { kind: 'bind', clientId: frame.clientId };
  }
  if (frame.kind === 'message' && guard(frame.message)) {
    return { kind: 'message', clientId: frame.clientId, message: frame.message };
  }
  return undefined;
}
