import { afterEach, describe, expect, it, vi } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  function capture(): { lines: string[]; write: (line: string) => void } {
    const lines: string[] = [];
    return { lines, write: (line) => lines.push(line) };
  }

  function parseLine(line: string | undefined): unknown {
    if (line === undefined) {
      throw new Error('Expected a log line but got undefined');
    }
    return JSON.parse(line);
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('safe JSON serialization', () => {
    it('should handle circular references without throwing', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', write: sink.write });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj['self'] = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(sink.lines).toHaveLength(1);
      expect(parseLine(sink.lines[0])).toMatchObject({
        level: 'info',
        component: 'TestLogger',
        event: 'circular_test',
        originalData: '[unserializable]',
      });
      expect(parseLine(sink.lines[0])).toHaveProperty('serializationError');
    });

    it('should handle BigInt values without throwing', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', write: sink.write });

      logger.info('bigint_test', { value: BigInt(9007199254740991) });

      expect(parseLine(sink.lines[0])).toMatchObject({
        event: 'bigint_test',
        originalData: '[unserializable]',
      });
    });

    it('should output a single newline-terminated JSON line when serialization fails', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', write: sink.write });

      const circularObj: Record<string, unknown> = {};
      circularObj['ref'] = circularObj;
      logger.warn('fallback_fields', circularObj);

      const output = sink.lines[0] ?? '';
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n')).toHaveLength(1);
      expect(parseLine(output)).toMatchObject({
        timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/),
        level: 'warn',
        component: 'TestLogger',
        event: 'fallback_fields',
      });
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          const sink = capture();
          const logger = new Logger({ component: 'PropertyTest', write: sink.write });

          logger.info('fuzz_test', data);

          expect(sink.lines).toHaveLength(1);
          expect(parseLine(sink.lines[0])).toMatchObject({
            level: 'info',
            component: 'PropertyTest',
            event: 'fuzz_test',
          });
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with data', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', write: sink.write });

      logger.info('test_event', { key: 'value' });

      expect(parseLine(sink.lines[0])).toMatchObject({
        level: 'info',
        event: 'test_event',
        data: { key: 'value' },
      });
    });

    it('should omit data when none is given', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', write: sink.write });

      logger.error('bare_event');

      expect(parseLine(sink.lines[0])).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', debugMode: false, write: sink.write });

      logger.debug('debug_event', { key: 'value' });

      expect(sink.lines).toHaveLength(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const sink = capture();
      const logger = new Logger({ component: 'TestLogger', debugMode: true, write: sink.write });

      logger.debug('debug_event');

      expect(parseLine(sink.lines[0])).toMatchObject({ level: 'debug' });
    });

    it('should write to stderr by default', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const logger = new Logger({ component: 'TestLogger' });

      logger.warn('warning_event', { reason: 'test' });

      expect(write).toHaveBeenCalledTimes(1);
      const [chunk] = write.mock.calls[0] ?? [];
      expect(typeof chunk === 'string' ? parseLine(chunk) : undefined).toMatchObject({
        level: 'warn',
        event: 'warning_event',
        data: { reason: 'test' },
      });
    });
  });

  describe('child', () => {
    it('should share mode and sink under a new component name', () => {
      const sink = capture();
      const parent = new Logger({ component: 'parent', debugMode: true, write: sink.write });

      parent.child('child').debug('child_event');

      expect(parseLine(sink.lines[0])).toMatchObject({ component: 'child', event: 'child_event' });
    });
  });
});
