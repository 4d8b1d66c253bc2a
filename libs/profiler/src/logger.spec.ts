import { childLogger, createLogger, getLogger } from './logger';

function capture() {
  const lines: string[] = [];
  return { lines, destination: { write: (line: string) => lines.push(line) } };
}

describe('logger', () => {
  describe('createLogger', () => {
    it('should write JSON lines with the toolkit name and a level label', () => {
      const { lines, destination } = capture();
      const logger = createLogger({ level: 'info', destination });

      logger.info({ iterations: 3 }, 'benchmark completed');

      const entry = JSON.parse(lines[0]);
      expect(entry).toMatchObject({
        level: 'info',
        name: 'dispatch-perf',
        msg: 'benchmark completed',
        iterations: 3,
      });
      expect(entry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should drop entries below the configured level', () => {
      const { lines, destination } = capture();
      const logger = createLogger({ level: 'warn', destination });

      logger.info('ignored');
      logger.warn('kept');

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0]).msg).toBe('kept');
    });

    it('should take its level from the environment by default', () => {
      expect(createLogger().level).toBe('silent');
    });
  });

  describe('childLogger', () => {
    it('should tag entries with the component', () => {
      const { lines, destination } = capture();
      const parent = createLogger({ level: 'info', destination });

      childLogger('benchmark-runner', parent).info('ready');

      expect(JSON.parse(lines[0])).toMatchObject({ component: 'benchmark-runner', msg: 'ready' });
    });
  });

  describe('getLogger', () => {
    it('should return one shared logger', () => {
      expect(getLogger()).toBe(getLogger());
    });
  });
});
