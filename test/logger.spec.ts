import { describe, it, expect } from 'vitest';
import { Logger, LogLevel } from '../src';
import { parseLogLevel } from '../src/logger';

function capture(level: LogLevel, debugMode = false) {
  const output: string[] = [];
  const logger = new Logger({ level, debugMode, sink: line => output.push(line) });
  return { logger, output };
}

describe('Logger', () => {
  it('drops messages below its level', () => {
    const { logger, output } = capture(LogLevel.WARN);
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown', { line: 3 });
    expect(output).toEqual(['[WARN] shown', '[ERROR] also shown {"line":3}']);
  });

  it('prints debug output only in debug mode', () => {
    const { logger, output } = capture(LogLevel.DEBUG);
    logger.debug('hidden');
    logger.setDebugMode(true);
    logger.debug('Parsing stub', { module: 'foo' });
    expect(output).toEqual(['[DEBUG] Parsing stub {"module":"foo"}']);
  });

  it('enables debug mode when the level drops to DEBUG', () => {
    const { logger } = capture(LogLevel.ERROR);
    expect(logger.isDebugEnabled()).toBe(false);
    logger.setLevel(LogLevel.DEBUG);
    expect(logger.isDebugEnabled()).toBe(true);
    expect(logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('parses level names', () => {
    expect(parseLogLevel('info')).toBe(LogLevel.INFO);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('loud')).toBe(undefined);
    expect(parseLogLevel(undefined)).toBe(undefined);
  });
});
