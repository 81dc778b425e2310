import { createLogger, silentLogger } from '../logger';
import { memberBaseName, resolveInside, toPosixPath } from '../path';

describe('createLogger', () => {
  const now = () => new Date('2024-05-06T07:08:09.010Z');

  test('formats lines as time - LEVEL - message', () => {
    const lines: string[] = [];
    const logger = createLogger({ write: (l) => lines.push(l), now });
    logger.info('hello');
    logger.warn('careful');
    logger.error('broken');
    expect(lines).toEqual([
      '2024-05-06T07:08:09.010Z - INFO - hello',
      '2024-05-06T07:08:09.010Z - WARNING - careful',
      '2024-05-06T07:08:09.010Z - ERROR - broken',
    ]);
  });

  test('drops debug unless the level allows it', () => {
    const infoLines: string[] = [];
    createLogger({ write: (l) => infoLines.push(l), now }).debug('hidden');
    expect(infoLines).toEqual([]);

    const debugLines: string[] = [];
    const verbose = createLogger({ level: 'debug', write: (l) => debugLines.push(l), now });
    verbose.debug('shown');
    expect(verbose.level).toBe('debug');
    expect(debugLines).toEqual(['2024-05-06T07:08:09.010Z - DEBUG - shown']);
  });

  test('silentLogger ignores everything', () => {
    expect(() => silentLogger.error('x')).not.toThrow();
  });
});

describe('path helpers', () => {
  test('toPosixPath and memberBaseName', () => {
    expect(toPosixPath('a\\b\\c.yang')).toBe('a/b/c.yang');
    expect(memberBaseName('a/b/v1-c.yang')).toBe('v1-c.yang');
    expect(memberBaseName('v1-c.yang')).toBe('v1-c.yang');
    expect(memberBaseName('dir/v1-x\\foo.yang')).toBe('v1-x\\foo.yang');
  });

  test('resolveInside keeps members under the root', () => {
    expect(resolveInside('/tmp/scratch', 'a/b.yang')).toBe('/tmp/scratch/a/b.yang');
    expect(resolveInside('/tmp/scratch', '/abs/x-y.yang')).toBe('/tmp/scratch/abs/x-y.yang');
    expect(resolveInside('/tmp/scratch', '../x-y.yang')).toBeUndefined();
    expect(resolveInside('/tmp/scratch', 'a/../../x-y.yang')).toBeUndefined();
    expect(resolveInside('/tmp/scratch', '.')).toBeUndefined();
  });
});
