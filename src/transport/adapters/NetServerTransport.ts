import * as dgram from 'dgram';
import * as http from 'http';
import WebSocket = require('ws');
import { Logger } from '../../common/logger';
import { createId, toError } from '../../common/utils';
import { ClientMessage, DeliveryClass, NetworkAddress, ServerMessage } from '../../types';
import {
  decodeDatagramFrame,
  decodeReliableFrame,
  encodeFrame,
  isClientMessage
} from '../protocol';
import { ConnectionEvent, ServerConnection, ServerTransport } from '../Transport';
import { rawDataToString, SocketTransport } from './SocketTransport';

export interface NetServerTransportOptions extends NetworkAddress {
  logger?: Logger;
  /** Largest accepted WebSocket frame in bytes */
  maxPayload?: number;
}

interface DatagramEndpoint {
  address: string;
  port: number;
}

class NetServerConnection implements ServerConnection {
  private inbox: ClientMessage[] = [];
  private endpoint?: DatagramEndpoint;

  constructor(
    readonly clientId: string,
    private readonly ws: WebSocket,
    private readonly owner: NetServerTransport
  ) {}

  bind(endpoint: DatagramEndpoint): void {
    this.endpoint = endpoint;
  }

  enqueue(message: ClientMessage): void {
    this.inbox.push(message);
  }

  hasPending(): boolean {
    return this.inbox.length > 0;
  }

  drainMessages(): ClientMessage[] {
    const messages = this.inbox;
    this.inbox = [];
    return messages;
  }

  sendMessage(delivery: DeliveryClass, message: ServerMessage): void {
    if (delivery === DeliveryClass.RELIABLE_ORDERED) {
      if (this.ws.readyState !== WebSocket.OPEN) return;
      this.ws.send(encodeFrame<ServerMessage>({ kind: 'message', message }), error => {
        if (error) this.owner.reportError(error);
      });
      return;
    }

    // Until the client's datagram endpoint is known, unreliable sends go nowhere
    if (this.endpoint) {
      this.owner.sendDatagram(
        this.endpoint,
        encodeFrame<ServerMessage>({ kind: 'message', clientId: this.clientId, message })
      );
    }
  }

  close(reason: string): void {
    this.owner.forgetPeer(this.clientId);
    this.inbox = [];
    this.ws.close(1000, reason);
  }
}

/**
 * Server side of the network transport: WebSocket for the reliable-ordered
 * channel, UDP on the same port number for the unreliable one
 */
export class NetServerTransport extends SocketTransport implements ServerTransport {
  private readonly options: Required<Omit<NetServerTransportOptions, 'logger'>>;
  private server?: http.Server;
  private wss?: WebSocket.Server;
  private socket?: dgram.Socket;
  private readonly peers = new Map<string, NetServerConnection>();
  private events: ConnectionEvent[] = [];
  private boundPort?: number;
  private isStarted = false;

  constructor(options: NetServerTransportOptions) {
    super(options.logger);
    this.options = {
      host: options.host,
      port: options.port,
      maxPayload: options.maxPayload ?? 64 * 1024
    };
  }

  static async listen(options: NetServerTransportOptions): Promise<NetServerTransport> {
    const transport = new NetServerTransport(options);
    await transport.start();
    return transport;
  }

  /**
   * The port both channels listen on, once started
   */
  get port(): number | undefined {
    return this.boundPort;
  }

  /**
   * Bind UDP first, then put the WebSocket listener on the same port number.
   * Port 0 takes whatever port the UDP bind is given.
   */
  async start(): Promise<void> {
    if (this.isStarted) return;

    const socket = dgram.createSocket('udp4');
    socket.on('message', (buffer, rinfo) => this.handleDatagram(buffer, rinfo));
    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject);
        socket.bind(this.options.port, this.options.host, () => {
          socket.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      socket.close();
      throw error;
    }
    socket.on('error', error => this.reportError(error));

    const port = socket.address().port;
    const server = http.createServer();
    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, this.options.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      await new Promise<void>(resolve => socket.close(() => resolve()));
      throw error;
    }

    const wss = new WebSocket.Server({ server, maxPayload: this.options.maxPayload });
    wss.on('connection', ws => this.handleConnection(ws));
    wss.on('error', error => this.reportError(error));

    this.server = server;
    this.wss = wss;
    this.socket = socket;
    this.boundPort = port;
    this.isStarted = true;
    this.logger.info(`Listening on ${this.options.host}:${port} (ws + udp)`);
  }

  async close(): Promise<void> {
    if (!this.isStarted) return;

    for (const peer of Array.from(this.peers.values())) {
      peer.close('server closed');
    }

    const socket = this.socket;
    if (socket) {
      await new Promise<void>(resolve => socket.close(() => resolve()));
      this.socket = undefined;
    }

    const wss = this.wss;
    if (wss) {
      await new Promise<void>(resolve => wss.close(() => resolve()));
      this.wss = undefined;
    }

    const server = this.server;
    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
      this.server = undefined;
    }

    this.boundPort = undefined;
    this.isStarted = false;
  }

  drainConnections(): ConnectionEvent[] {
    const events = this.events;
    this.events = [];
    return events;
  }

  sendDatagram(endpoint: DatagramEndpoint, payload: string): void {
    const socket = this.socket;
    if (!socket) return;
    socket.send(Buffer.from(payload, 'utf8'), endpoint.port, endpoint.address, error => {
      if (error) this.reportError(error);
    });
  }

  /**
   * Stop routing traffic to a peer the server closed itself
   */
  forgetPeer(clientId: string): void {
    this.peers.delete(clientId);
  }

  protected hasPendingInbound(): boolean {
    if (this.events.length > 0) return true;
    for (const peer of this.peers.values()) {
      if (peer.hasPending()) return true;
    }
    return false;
  }

  private handleConnection(ws: WebSocket): void {
    const clientId = createId();
    const peer = new NetServerConnection(clientId, ws, this);
    this.peers.set(clientId, peer);

    ws.on('message', data => this.handleReliable(peer, rawDataToString(data)));
    ws.on('error', error => this.reportError(toError(error)));
    ws.on('close', (code, reason) => {
      if (!this.peers.delete(clientId)) return;
      this.events.push({
        type: 'disconnect',
        clientId,
        reason: reason.toString('utf8') || `code ${code}`
      });
      this.notifyActivity();
    });

    ws.send(encodeFrame<ServerMessage>({ kind: 'welcome', clientId }));
    this.events.push({ type: 'connect', connection: peer });
    this.notifyActivity();
  }

  private handleReliable(peer: NetServerConnection, data: string): void {
    const frame = decodeReliableFrame(data, isClientMessage);
    if (!frame || frame.kind !== 'message') {
      this.logger.debug(`Dropping malformed frame from ${peer.clientId}`);
      return;
    }
    peer.enqueue(frame.message);
    this.notifyActivity();
  }

  private handleDatagram(buffer: Buffer, rinfo: dgram.RemoteInfo): void {
    const frame = decodeDatagramFrame(buffer.toString('utf8'), isClientMessage);
    if (!frame) {
      this.logger.debug(`Dropping malformed datagram from ${rinfo.address}:${rinfo.port}`);
      return;
    }

    const peer = this.peers.get(frame.clientId);
    if (!peer) return;

    peer.bind({ address: rinfo.address, port: rinfo.port });
    if (frame.kind === 'message') {
      peer.enqueue(frame.message);
      this.notifyActivity();
    }
  }
}
