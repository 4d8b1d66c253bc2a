import { forceGC, heapMemoryProvider } from './memory';

describe('memory', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('heapMemoryProvider', () => {
    it('should report heap-used bytes', () => {
      jest.spyOn(process, 'memoryUsage').mockReturnValue({
        rss: 1,
        heapTotal: 8192,
        heapUsed: 4096,
        external: 0,
        arrayBuffers: 0,
      });

      expect(heapMemoryProvider.currentAllocatedBytes(false)).toBe(4096);
      expect(heapMemoryProvider.currentAllocatedBytes(true)).toBe(4096);
    });

    it('should return a non-negative integer from the real heap', () => {
      const bytes = heapMemoryProvider.currentAllocatedBytes(true);

      expect(Number.isInteger(bytes)).toBe(true);
      expect(bytes).toBeGreaterThan(0);
    });
  });

  describe('forceGC', () => {
    it('should report whether a collection ran', () => {
      expect(forceGC()).toBe(typeof global.gc === 'function');
    });
  });
});
