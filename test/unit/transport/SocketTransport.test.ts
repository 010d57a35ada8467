import { rawDataToString, SocketTransport } from '../../../src/transport/adapters/SocketTransport';

class TestSocketTransport extends SocketTransport {
  pending = false;

  poke(): void {
    this.notifyActivity();
  }

  protected hasPendingInbound(): boolean {
    return this.pending;
  }
}

describe('SocketTransport', () => {
  let transport: TestSocketTransport;

  beforeEach(() => {
    transport = new TestSocketTransport();
  });

  describe('step', () => {
    it('should return at once while an error is queued', async () => {
      transport.reportError(new Error('link reset'));
      const started = Date.now();

      await transport.step(60_000);

      expect(Date.now() - started).toBeLessThan(1000);
      expect(transport.drainErrors().map(error => error.message)).toEqual(['link reset']);
    });

    it('should return at once while inbound traffic is pending', async () => {
      transport.pending = true;
      const started = Date.now();

      await transport.step(60_000);

      expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should wake a waiting step on activity', async () => {
      const stepping = transport.step(60_000);
      transport.poke();

      await stepping;

      expect(transport.listenerCount('activity')).toBe(0);
    });

    it('should give up after the budget when idle', async () => {
      await transport.step(20);

      expect(transport.listenerCount('activity')).toBe(0);
    });
  });

  describe('rawDataToString', () => {
    it('should decode a single buffer', () => {
      expect(rawDataToString(Buffer.from('{"kind":"welcome"}', 'utf8'))).toBe('{"kind":"welcome"}');
    });

    it('should join fragmented buffers', () => {
      expect(rawDataToString([Buffer.from('{"ki'), Buffer.from('nd":1}')])).toBe('{"kind":1}');
    });

    it('should decode an ArrayBuffer', () => {
      const data = new ArrayBuffer(3);
      new Uint8Array(data).set([104, 105, 33]);

      expect(rawDataToString(data)).toBe('hi!');
    });
  });
});
