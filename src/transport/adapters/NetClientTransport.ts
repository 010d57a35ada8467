import * as dgram from 'dgram';
import WebSocket = require('ws');
import { Logger } from '../../common/logger';
import { toError } from '../../common/utils';
import { ClientMessage, DeliveryClass, NetworkAddress, ServerMessage } from '../../types';
import {
  decodeDatagramFrame,
  decodeReliableFrame,
  encodeFrame,
  isServerMessage
} from '../protocol';
import { ClientTransport } from '../Transport';
import { rawDataToString, SocketTransport } from './SocketTransport';

export interface NetClientTransportOptions extends NetworkAddress {
  logger?: Logger;
  connectTimeoutMs?: number;
}

/**
 * Client side of the network transport. The unreliable channel stays mute
 * until the server's welcome frame hands out a client id.
 */
export class NetClientTransport extends SocketTransport implements ClientTransport {
  private readonly address: NetworkAddress;
  private readonly connectTimeoutMs: number;
  private ws?: WebSocket;
  private socket?: dgram.Socket;
  private clientId?: string;
  private inbox: ServerMessage[] = [];
  private closing = false;

  constructor(options: NetClientTransportOptions) {
    super(options.logger);
    this.address = { host: options.host, port: options.port };
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
  }

  static async connect(options: NetClientTransportOptions): Promise<NetClientTransport> {
    const transport = new NetClientTransport(options);
    await transport.open();
    return transport;
  }

  get assignedId(): string | undefined {
    return this.clientId;
  }

  /**
   * Bind the datagram socket, open the WebSocket and wait for the server's
   * welcome frame. Resolves once the client id is known.
   */
  async open(): Promise<void> {
    if (this.ws) return;

    const socket = dgram.createSocket('udp4');
    socket.on('message', buffer => this.handleDatagram(buffer));
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(0, () => {
        socket.off('error', reject);
        resolve();
      });
    });
    socket.on('error', error => this.reportError(error));
    this.socket = socket;

    const ws = new WebSocket(`ws://${this.address.host}:${this.address.port}`);
    ws.on('message', data => this.handleReliable(rawDataToString(data)));
    ws.on('error', error => this.reportError(toError(error)));
    ws.on('close', (code, reason) => {
      if (this.closing) return;
      this.reportError(new Error(`Connection closed: ${reason.toString('utf8') || `code ${code}`}`));
    });
    this.ws = ws;

    try {
      await this.awaitWelcome(ws);
    } catch (error) {
      await this.close();
      throw error;
    }

    this.logger.info(`Connected to ${this.address.host}:${this.address.port} as ${this.clientId}`);
  }

  drainMessages(): ServerMessage[] {
    const messages = this.inbox;
    this.inbox = [];
    return messages;
  }

  sendMessage(delivery: DeliveryClass, message: ClientMessage): void {
    if (delivery === DeliveryClass.RELIABLE_ORDERED) {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) return;
      ws.send(encodeFrame<ClientMessage>({ kind: 'message', message }), error => {
        if (error) this.reportError(error);
      });
      return;
    }

    if (this.clientId) {
      this.sendDatagram(encodeFrame<ClientMessage>({ kind: 'message', clientId: this.clientId, message }));
    }
  }

  async close(): Promise<void> {
    this.closing = true;

    const socket = this.socket;
    if (socket) {
      await new Promise<void>(resolve => socket.close(() => resolve()));
      this.socket = undefined;
    }

    const ws = this.ws;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>(resolve => {
        ws.once('close', () => resolve());
        ws.close(1000, 'client closed');
      });
    }
    this.ws = undefined;
    this.clientId = undefined;
  }

  protected hasPendingInbound(): boolean {
    return this.inbox.length > 0;
  }

  private awaitWelcome(ws: WebSocket): Promise<void> {
    const target = `${this.address.host}:${this.address.port}`;

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        this.off('welcome', onWelcome);
        ws.off('error', onError);
        ws.off('close', onClose);
      };
      const onWelcome = (): void => {
        cleanup();
        resolve();
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const onClose = (code: number): void => {
        cleanup();
        reject(new Error(`Connection to ${target} closed before welcome (code ${code})`));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new Error(`Timed out connecting to ${target}`));
      }, this.connectTimeoutMs);

      this.once('welcome', onWelcome);
      ws.once('error', onError);
      ws.once('close', onClose);
    });
  }

  private sendDatagram(payload: string): void {
    const socket = this.socket;
    if (!socket) return;
    socket.send(Buffer.from(payload, 'utf8'), this.address.port, this.address.host, error => {
      if (error) this.reportError(error);
    });
  }

  private handleReliable(data: string): void {
    const frame = decodeReliableFrame(data, isServerMessage);
    if (!frame) {
      this.logger.debug('Dropping malformed frame from server');
      return;
    }

    if (frame.kind === 'welcome') {
      this.clientId = frame.clientId;
      this.sendDatagram(encodeFrame<ClientMessage>({ kind: 'bind', clientId: frame.clientId }));
      this.emit('welcome', frame.clientId);
      return;
    }

    this.inbox.push(frame.message);
    this.notifyActivity();
  }

  private handleDatagram(buffer: Buffer): void {
    const frame = decodeDatagramFrame(buffer.toString('utf8'), isServerMessage);
    if (!frame || frame.kind !== 'message') {
      this.logger.debug('Dropping malformed datagram from server');
      return;
    }
    this.inbox.push(frame.message);
    this.notifyActivity();
  }
}
