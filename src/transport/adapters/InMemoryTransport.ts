import { Clock, SystemClock } from '../../common/Clock';
import { createId } from '../../common/utils';
import { FaultInjector } from '../../diagnostics/FaultInjector';
import { ClientMessage, DeliveryClass, ServerMessage } from '../../types';
import { ClientTransport, ConnectionEvent, ServerConnection, ServerTransport } from '../Transport';

interface QueuedDelivery<T> {
  deliverAt: number;
  order: number;
  message: T;
}

/**
 * Messages in flight towards one endpoint, released once their delivery
 * instant has passed
 */
export class DeliveryQueue<T> {
  private items: QueuedDelivery<T>[] = [];
  private order = 0;

  push(message: T, deliverAt: number): void {
    this.items.push({ deliverAt, order: this.order++, message });
  }

  drain(now: number): T[] {
    const ready: QueuedDelivery<T>[] = [];
    const waiting: QueuedDelivery<T>[] = [];
    for (const item of this.items) {
      (item.deliverAt <= now ? ready : waiting).push(item);
    }
    this.items = waiting;
    return ready
      .sort((a, b) => a.deliverAt - b.deliverAt || a.order - b.order)
      .map(item => item.message);
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Both directions of one simulated client link
 */
export class InMemoryLink {
  readonly toServer = new DeliveryQueue<ClientMessage>();
  readonly toClient = new DeliveryQueue<ServerMessage>();
  open = true;

  constructor(readonly clientId: string) {}
}

export interface InMemoryNetworkOptions {
  clock?: Clock;
  /** Faults applied to unreliable client -> server messages */
  toServer?: FaultInjector;
  /** Faults applied to unreliable server -> client messages */
  toClient?: FaultInjector;
}

/**
 * In-process network for local testing and simulations.
 * One server endpoint, any number of client endpoints.
 */
export class InMemoryNetwork {
  readonly clock: Clock;
  private readonly toServer?: FaultInjector;
  private readonly toClient?: FaultInjector;
  private server?: InMemoryServerTransport;
  private readonly clients = new Map<string, InMemoryClientTransport>();

  constructor(options: InMemoryNetworkOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.toServer = options.toServer;
    this.toClient = options.toClient;
  }

  listen(): InMemoryServerTransport {
    if (this.server) {
      throw new Error('A server is already listening on this network');
    }
    this.server = new InMemoryServerTransport(this);
    return this.server;
  }

  connect(clientId: string = createId()): InMemoryClientTransport {
    const server = this.server;
    if (!server) {
      throw new Error('No server is listening on this network');
    }
    if (this.clients.has(clientId)) {
      throw new Error(`Client ${clientId} is already connected`);
    }

    const link = new InMemoryLink(clientId);
    const client = new InMemoryClientTransport(link, this);
    this.clients.set(clientId, client);
    server.accept(link);
    return client;
  }

  sendToServer(link: InMemoryLink, delivery: DeliveryClass, message: ClientMessage): void {
    this.transmit(link.toServer, delivery, message, this.toServer);
  }

  sendToClient(link: InMemoryLink, delivery: DeliveryClass, message: ServerMessage): void {
    this.transmit(link.toClient, delivery, message, this.toClient);
  }

  /**
   * Tear down a link from the client side
   */
  closeFromClient(link: InMemoryLink, reason: string): void {
    if (!link.open) return;
    link.open = false;
    this.clients.delete(link.clientId);
    this.server?.handleLinkClosed(link.clientId, reason);
  }

  /**
   * Tear down a link from the server side
   */
  closeFromServer(link: InMemoryLink, reason: string): void {
    if (!link.open) return;
    link.open = false;
    link.toServer.clear();
    const client = this.clients.get(link.clientId);
    this.clients.delete(link.clientId);
    client?.reportError(new Error(`Disconnected by server: ${reason}`));
  }

  detachServer(server: InMemoryServerTransport): void {
    if (this.server === server) {
      this.server = undefined;
    }
  }

  private transmit<T>(
    queue: DeliveryQueue<T>,
    delivery: DeliveryClass,
    message: T,
    faults: FaultInjector | undefined
  ): void {
    const now = this.clock.now();

    if (delivery === DeliveryClass.RELIABLE_ORDERED || !faults || !faults.isActive()) {
      queue.push(structuredClone(message), now);
      return;
    }

    const decision = faults.decide();
    for (let copy = 0; copy < decision.copies; copy++) {
      queue.push(structuredClone(message), now + decision.delayMs);
    }
  }
}

/**
 * Yield once to the other cooperative loops. In-memory delivery involves no
 * I/O, so there is nothing to wait for within the step budget.
 */
function yieldStep(): Promise<void> {
  return Promise.resolve();
}

class InMemoryServerConnection implements ServerConnection {
  constructor(
    private readonly link: InMemoryLink,
    private readonly server: InMemoryServerTransport,
    private readonly network: InMemoryNetwork
  ) {}

  get clientId(): string {
    return this.link.clientId;
  }

  drainMessages(): ClientMessage[] {
    return this.link.toServer.drain(this.network.clock.now());
  }

  sendMessage(delivery: DeliveryClass, message: ServerMessage): void {
    if (!this.link.open) return;
    this.network.sendToClient(this.link, delivery, message);
  }

  close(reason: string): void {
    this.server.release(this.link.clientId, reason);
  }
}

export class InMemoryServerTransport implements ServerTransport {
  private events: ConnectionEvent[] = [];
  private errors: Error[] = [];
  private readonly links = new Map<string, InMemoryLink>();
  private closed = false;

  constructor(private readonly network: InMemoryNetwork) {}

  accept(link: InMemoryLink): void {
    this.links.set(link.clientId, link);
    this.events.push({ type: 'connect', connection: new InMemoryServerConnection(link, this, this.network) });
  }

  handleLinkClosed(clientId: string, reason: string): void {
    if (!this.links.delete(clientId)) return;
    this.events.push({ type: 'disconnect', clientId, reason });
  }

  /**
   * Close a client's link without reporting a disconnect event
   */
  release(clientId: string, reason: string): boolean {
    const link = this.links.get(clientId);
    if (!link) return false;
    this.links.delete(clientId);
    this.network.closeFromServer(link, reason);
    return true;
  }

  /**
   * Drop a client from the server side, as if the link had failed
   */
  disconnect(clientId: string, reason: string): void {
    if (this.release(clientId, reason)) {
      this.events.push({ type: 'disconnect', clientId, reason });
    }
  }

  async step(_maxDurationMs: number): Promise<void> {
    await yieldStep();
  }

  drainConnections(): ConnectionEvent[] {
    const events = this.events;
    this.events = [];
    return events;
  }

  drainErrors(): Error[] {
    const errors = this.errors;
    this.errors = [];
    return errors;
  }

  reportError(error: Error): void {
    this.errors.push(error);
  }

  connectedClients(): string[] {
    return Array.from(this.links.keys());
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const clientId of this.connectedClients()) {
      this.disconnect(clientId, 'server closed');
    }
    this.network.detachServer(this);
  }
}

export class InMemoryClientTransport implements ClientTransport {
  private errors: Error[] = [];

  constructor(
    private readonly link: InMemoryLink,
    private readonly network: InMemoryNetwork
  ) {}

  get clientId(): string {
    return this.link.clientId;
  }

  isOpen(): boolean {
    return this.link.open;
  }

  async step(_maxDurationMs: number): Promise<void> {
    await yieldStep();
  }

  drainMessages(): ServerMessage[] {
    return this.link.toClient.drain(this.network.clock.now());
  }

  sendMessage(delivery: DeliveryClass, message: ClientMessage): void {
    if (!this.link.open) return;
    this.network.sendToServer(this.link, delivery, message);
  }

  drainErrors(): Error[] {
    const errors = this.errors;
    this.errors = [];
    return errors;
  }

  reportError(error: Error): void {
    this.errors.push(error);
  }

  async close(): Promise<void> {
    this.network.closeFromClient(this.link, 'client closed');
  }
}
