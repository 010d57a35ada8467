import { FaultDecision, FaultInjector } from '../../../src/diagnostics/FaultInjector';

function sequenceRandom(...values: number[]): () => number {
  let index = 0;
  return () => values[index++ % values.length];
}

function decideMany(injector: FaultInjector, count: number): FaultDecision[] {
  return Array.from({ length: count }, () => injector.decide());
}

describe('FaultInjector', () => {
  describe('Construction and Initialization', () => {
    it('should pass everything through without a plan', () => {
      const injector = new FaultInjector();

      expect(injector.isActive()).toBe(false);
      expect(injector.decide()).toEqual({ index: 1, drop: false, copies: 1, delayMs: 0 });
    });

    it('should report an active plan', () => {
      expect(new FaultInjector({ dropEvery: 3 }).isActive()).toBe(true);
      expect(new FaultInjector({ latencyMs: 0, dropRate: 0 }).isActive()).toBe(false);
    });
  });

  describe('Deterministic faults', () => {
    it('should drop every Nth message counting from 1', () => {
      const injector = new FaultInjector({ dropEvery: 5 });

      const dropped = decideMany(injector, 10).filter(decision => decision.drop).map(decision => decision.index);

      expect(dropped).toEqual([5, 10]);
      expect(injector.getStatistics()).toEqual({ processed: 10, dropped: 2, duplicated: 0, delayed: 0 });
    });

    it('should duplicate every Nth message', () => {
      const injector = new FaultInjector({ duplicateEvery: 3 });

      const copies = decideMany(injector, 7).map(decision => decision.copies);

      expect(copies).toEqual([1, 1, 2, 1, 1, 2, 1]);
      expect(injector.getStatistics().duplicated).toBe(2);
    });

    it('should let a drop win over a duplicate', () => {
      const injector = new FaultInjector({ dropEvery: 2, duplicateEvery: 2 });

      expect(decideMany(injector, 2)[1]).toEqual({ index: 2, drop: true, copies: 0, delayMs: 0 });
    });
  });

  describe('Probabilistic faults', () => {
    it('should drop when the random draw falls under the rate', () => {
      const injector = new FaultInjector({ dropRate: 0.5 }, sequenceRandom(0.2, 0.9));

      expect(decideMany(injector, 2).map(decision => decision.drop)).toEqual([true, false]);
    });

    it('should duplicate when the random draw falls under the rate', () => {
      const injector = new FaultInjector({ duplicateRate: 0.25 }, sequenceRandom(0.1, 0.3));

      expect(decideMany(injector, 2).map(decision => decision.copies)).toEqual([2, 1]);
    });

    it('should add latency and jitter', () => {
      const injector = new FaultInjector({ latencyMs: 20, jitterMs: 10 }, () => 0.5);

      expect(injector.decide().delayMs).toBe(25);
      expect(injector.getStatistics().delayed).toBe(1);
    });
  });

  describe('Events', () => {
    it('should emit drop and duplicate events', () => {
      const injector = new FaultInjector({ dropEvery: 2, duplicateEvery: 3 });
      const dropped: number[] = [];
      const duplicated: number[] = [];
      injector.on('message-dropped', decision => dropped.push(decision.index));
      injector.on('message-duplicated', decision => duplicated.push(decision.index));

      decideMany(injector, 6);

      expect(dropped).toEqual([2, 4, 6]);
      expect(duplicated).toEqual([3]);
    });
  });

  describe('Validation', () => {
    it('should reject invalid rates', () => {
      expect(() => new FaultInjector({ dropRate: 1.5 })).toThrow('Drop rate must be between 0 and 1');
      expect(() => new FaultInjector({ duplicateRate: -0.1 })).toThrow('Duplicate rate must be between 0 and 1');
      expect(() => new FaultInjector({ dropRate: Number.NaN })).toThrow('Drop rate must be a valid number');
    });

    it('should reject non-integer intervals', () => {
      expect(() => new FaultInjector({ dropEvery: 0 })).toThrow('dropEvery must be a positive integer');
      expect(() => new FaultInjector({ duplicateEvery: 1.5 })).toThrow('duplicateEvery must be a positive integer');
    });

    it('should reject negative delays', () => {
      expect(() => new FaultInjector({ latencyMs: -1 })).toThrow('Latency must be non-negative');
      expect(() => new FaultInjector({ jitterMs: Number.NaN })).toThrow('Jitter must be a valid number');
    });
  });
});
