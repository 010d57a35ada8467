/**
 * Type definitions for the tick consistency instrument
 */

export type RunRole = 'server' | 'client';

export enum DeliveryClass {
  RELIABLE_ORDERED = 'reliable_ordered',
  UNRELIABLE = 'unreliable'
}

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Rotation {
  yaw: number;
  pitch: number;
}

export enum ClientMessageType {
  CONNECTION_INFO = 'connection_info',
  PLAYER_MOVE = 'player_move',
  CONSOLE_INPUT = 'console_input'
}

export enum ServerMessageType {
  ALLOW_CONNECTION = 'allow_connection',
  ENTITY_MOVE = 'entity_move',
  CONSOLE_OUTPUT = 'console_output'
}

export interface ConnectionInfoMessage {
  type: ClientMessageType.CONNECTION_INFO;
  login: string;
  version: string;
  architecture: string;
  renderingDevice: string;
}

/**
 * Position update sent by the client; `position.x` carries the sequence number.
 */
export interface PlayerMoveMessage {
  type: ClientMessageType.PLAYER_MOVE;
  position: Vector3;
  rotation: Rotation;
}

export interface ConsoleInputMessage {
  type: ClientMessageType.CONSOLE_INPUT;
  command: string;
}

export type ClientMessage = ConnectionInfoMessage | PlayerMoveMessage | ConsoleInputMessage;

export interface AllowConnectionMessage {
  type: ServerMessageType.ALLOW_CONNECTION;
}

/**
 * Echo of a received PlayerMove. `tickOffsetMs` is the time elapsed since the
 * server tick that produced it began.
 */
export interface EntityMoveMessage {
  type: ServerMessageType.ENTITY_MOVE;
  worldSlug: string;
  id: number;
  position: Vector3;
  rotation: Rotation;
  tickOffsetMs: number;
}

export interface ConsoleOutputMessage {
  type: ServerMessageType.CONSOLE_OUTPUT;
  text: string;
}

export type ServerMessage = AllowConnectionMessage | EntityMoveMessage | ConsoleOutputMessage;

export interface NetworkAddress {
  host: string;
  port: number;
}
