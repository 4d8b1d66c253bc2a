import { ArgumentError } from '@dispatch-perf/types';
import type { MemorySnapshotProvider } from '@dispatch-perf/types';
import { MetricsCollector } from './metrics-collector';

function memoryReadings(...readings: number[]): MemorySnapshotProvider & { currentAllocatedBytes: jest.Mock } {
  const currentAllocatedBytes = jest.fn((_forceCollection: boolean) => 0);
  for (const reading of readings) {
    currentAllocatedBytes.mockReturnValueOnce(reading);
  }
  return { currentAllocatedBytes };
}

describe('MetricsCollector', () => {
  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000);
    jest.spyOn(performance, 'now').mockReturnValueOnce(10).mockReturnValueOnce(35);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('collect', () => {
    it('should return the result with its metrics', () => {
      const collector = new MetricsCollector({ memory: memoryReadings(500, 800) });

      const { result, metrics } = collector.collect('parse', () => 'parsed');

      expect(result).toBe('parsed');
      expect(metrics).toEqual({
        name: 'parse',
        duration: 25,
        memoryUsed: 300,
        allocations: 0,
        startTime: 1_000,
        endTime: 1_025,
      });
      expect(Object.isFrozen(metrics)).toBe(true);
    });

    it('should take unforced memory snapshots', () => {
      const memory = memoryReadings(500, 800);
      const collector = new MetricsCollector({ memory });

      collector.collect('parse', () => undefined);

      expect(memory.currentAllocatedBytes.mock.calls).toEqual([[false], [false]]);
    });

    it('should clamp shrinking memory to zero', () => {
      const collector = new MetricsCollector({ memory: memoryReadings(800, 500) });

      const { metrics } = collector.collect('gc-heavy', () => undefined);

      expect(metrics.memoryUsed).toBe(0);
    });

    it('should propagate errors from the function', () => {
      const collector = new MetricsCollector({ memory: memoryReadings(0, 0) });
      const failure = new Error('boom');

      expect(() =>
        collector.collect('failing', () => {
          throw failure;
        }),
      ).toThrow(failure);
    });

    it('should reject a blank name without calling the function', () => {
      const collector = new MetricsCollector({ memory: memoryReadings() });
      const fn = jest.fn();

      expect(() => collector.collect(' ', fn)).toThrow(ArgumentError);
      expect(() => collector.collect('', fn)).toThrow('Invalid argument "name": must be a non-empty string');
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe('collectAsync', () => {
    it('should await the function before measuring', async () => {
      const collector = new MetricsCollector({ memory: memoryReadings(100, 164) });

      const { result, metrics } = await collector.collectAsync('fetch', async () => 42);

      expect(result).toBe(42);
      expect(metrics.duration).toBe(25);
      expect(metrics.memoryUsed).toBe(64);
      expect(metrics.endTime).toBe(1_025);
    });

    it('should accept a synchronous function', async () => {
      const collector = new MetricsCollector({ memory: memoryReadings(0, 0) });

      const { result } = await collector.collectAsync('sync', () => 'value');

      expect(result).toBe('value');
    });

    it('should reject with the function error', async () => {
      const collector = new MetricsCollector({ memory: memoryReadings(0, 0) });
      const failure = new Error('async boom');

      await expect(collector.collectAsync('failing', () => Promise.reject(failure))).rejects.toBe(failure);
    });
  });

  describe('default memory provider', () => {
    it('should read the process heap', () => {
      jest.restoreAllMocks();
      const collector = new MetricsCollector();

      const { metrics } = collector.collect('heap', () => new Array(1000).fill(0));

      expect(Number.isInteger(metrics.memoryUsed)).toBe(true);
      expect(metrics.memoryUsed).toBeGreaterThanOrEqual(0);
      expect(metrics.duration).toBeGreaterThanOrEqual(0);
    });
  });
});
