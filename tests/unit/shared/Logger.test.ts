import { describe, it, expect, afterEach, vi } from 'vitest';
import { isLogLevel, Logger } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function captureStderr() {
    return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  }

  it('should skip entries below the minimum level', () => {
    const write = captureStderr();
    const logger = new Logger('codec', 'warn');

    logger.debug('hidden');
    logger.info('hidden');
    expect(write).not.toHaveBeenCalled();

    logger.warn('shown');
    logger.error('shown');
    expect(write).toHaveBeenCalledTimes(2);
  });

  it('should write one JSON line with bigint fields as strings', () => {
    const write = captureStderr();
    new Logger('codec', 'debug').debug('encoded', { numerator: 71n, depth: 2 });

    const line = String(write.mock.calls[0][0]);
    expect(line.endsWith('\n')).toBe(true);
    expect(JSON.parse(line)).toMatchObject({
      level: 'debug',
      context: 'codec',
      message: 'encoded',
      numerator: '71',
      depth: 2,
    });
  });

  it('should log nothing when silent', () => {
    const write = captureStderr();
    new Logger('codec', 'silent').error('hidden');
    expect(write).not.toHaveBeenCalled();
  });

  it('should prefix child contexts', () => {
    const write = captureStderr();
    new Logger('pathfrac', 'info').child('store').info('opened');
    expect(JSON.parse(String(write.mock.calls[0][0])).context).toBe('pathfrac:store');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
