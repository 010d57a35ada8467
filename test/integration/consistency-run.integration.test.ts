import { ManualClock } from '../../src/common/Clock';
import { FaultInjector } from '../../src/diagnostics/FaultInjector';
import { runClient } from '../../src/harness/ClientRole';
import { runServer } from '../../src/harness/ServerRole';
import { formatReport } from '../../src/stats/report';
import {
  InMemoryClientTransport,
  InMemoryNetwork,
  InMemoryServerTransport
} from '../../src/transport/adapters/InMemoryTransport';
import { HARNESS_VERSION } from '../../src/version';
import { SpyLogger } from '../helpers/spyLogger';

const TEN_SECONDS = 10_000;

describe('Consistency run over the in-memory network', () => {
  let clock: ManualClock;
  let serverLogger: SpyLogger;
  let clientLogger: SpyLogger;

  beforeEach(() => {
    clock = new ManualClock();
    serverLogger = new SpyLogger();
    clientLogger = new SpyLogger();
  });

  function createNetwork(toServer?: FaultInjector): {
    server: InMemoryServerTransport;
    client: InMemoryClientTransport;
  } {
    const network = new InMemoryNetwork({ clock, toServer });
    const server = network.listen();
    const client = network.connect('client-1');
    return { server, client };
  }

  async function runBoth(server: InMemoryServerTransport, client: InMemoryClientTransport) {
    return Promise.all([
      runServer({ transport: server, durationMs: TEN_SECONDS, clock, logger: serverLogger }),
      runClient({ transport: client, durationMs: TEN_SECONDS, clock, logger: clientLogger })
    ]);
  }

  it('should exchange one update per tick over a lossless link', async () => {
    const { server, client } = createNetwork();

    const [serverRun, clientRun] = await runBoth(server, client);

    expect(clientRun.stats.messagesSent).toBe(640);
    expect(clientRun.stats.echoesReceived).toBe(639);
    expect(clientRun.stats.loss.lost).toBe(1);
    expect(clientRun.scheduler).toEqual({ ticks: 641, aborted: false, elapsedMs: TEN_SECONDS });

    expect(serverRun.stats.totalTicks).toBe(641);
    expect(serverRun.stats.messagesReceived).toBe(639);
    expect(serverRun.stats.echoesSent).toBe(639);
    expect(serverRun.stats.ticks?.outOfOrder).toBe(0);
    expect(serverRun.stats.ticks?.sequenceRange).toEqual({
      first: 1,
      last: 639,
      expected: 639,
      received: 639,
      lost: 0
    });
    expect(serverRun.stats.ticks?.distribution.map(entry => [entry.messagesPerTick, entry.ticks])).toEqual([
      [0, 2],
      [1, 639]
    ]);
  });

  it('should log the lifecycle on both sides', async () => {
    const { server, client } = createNetwork();

    await runBoth(server, client);

    expect(serverLogger.messages('info')).toEqual([
      'Waiting for client connection...',
      'Client connected: id=client-1',
      `Client sent ConnectionInfo: login=consistency-test version=${HARNESS_VERSION} arch=${process.arch}`,
      'Server run finished after 641 ticks'
    ]);
    expect(clientLogger.messages('info')).toEqual([
      'Connection allowed, starting test...',
      'Client run finished after 641 ticks'
    ]);
  });

  it('should count every injected duplicate as out of order', async () => {
    const { server, client } = createNetwork(new FaultInjector({ duplicateEvery: 3 }));

    const [serverRun, clientRun] = await runBoth(server, client);
    const last = serverRun.stats.ticks?.sequenceRange?.last ?? 0;

    expect(last).toBe(639);
    expect(serverRun.stats.ticks?.outOfOrder).toBe(Math.floor(last / 3));
    expect(serverRun.stats.messagesReceived).toBe(639 + 213);
    expect(serverRun.stats.ticks?.maxBatch).toBe(2);
    expect(clientRun.stats.ticks?.outOfOrder).toBe(213);
    expect(clientRun.stats.loss.lost).toBe(0);
  });

  it('should estimate loss from dropped updates', async () => {
    const { server, client } = createNetwork(new FaultInjector({ dropEvery: 5 }));

    const [serverRun, clientRun] = await runBoth(server, client);
    const range = serverRun.stats.ticks?.sequenceRange;

    expect(range?.first).toBe(1);
    expect(range?.last).toBe(639);
    expect(range?.lost).toBe(Math.floor(639 / 5));
    expect(serverRun.stats.ticks?.outOfOrder).toBe(0);
    expect(serverRun.stats.ticks?.emptyTicks).toBe(2 + 127);
    expect(clientRun.stats.echoesReceived).toBe(512);
    expect(clientRun.stats.loss.lost).toBe(128);
  });

  it('should abort the client in the tick a transport error surfaces', async () => {
    const faults = new FaultInjector({ dropEvery: 5 });
    const { server, client } = createNetwork(faults);
    faults.once('message-dropped', () => client.reportError(new Error('link reset')));

    const [serverRun, clientRun] = await runBoth(server, client);

    expect(clientRun.scheduler.aborted).toBe(true);
    expect(clientRun.scheduler.ticks).toBe(7);
    expect(clientRun.stats.messagesSent).toBe(5);
    expect(clientRun.stats.totalTicks).toBe(6);
    expect(clientLogger.messages('error')).toEqual(['Client error: link reset']);
    expect(clientLogger.messages('warn')).toEqual(['Client run aborted after 7 ticks']);
    expect(formatReport(clientRun.stats)).toContain('Total updates sent: 5');

    expect(serverRun.scheduler.aborted).toBe(false);
    expect(serverRun.stats.totalTicks).toBe(641);
  });

  it('should keep the server running through transport errors', async () => {
    const { server, client } = createNetwork();
    server.reportError(new Error('send buffer full'));

    const [serverRun] = await runBoth(server, client);

    expect(serverLogger.messages('error')).toEqual(['Server error: send buffer full']);
    expect(serverRun.scheduler.aborted).toBe(false);
    expect(serverRun.stats.totalTicks).toBe(641);
  });
});
