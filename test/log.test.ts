import { describe, expect, it } from 'vitest';
import { createLogger, createMemoryLogger } from '../src/log.js';

const TS = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z /;

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (_lvl, line) => lines.push(line));

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((l) => l.replace(TS, ''))).toEqual(['WARN w', 'ERROR e']);
  });

  it('is quiet when silent', () => {
    const lines: string[] = [];
    const logger = createLogger('silent', (_lvl, line) => lines.push(line));
    logger.error('e');
    expect(lines).toEqual([]);
  });

  it('nests child scopes and formats meta', () => {
    const { logger, lines } = createMemoryLogger();
    const child = logger.child('pipeline').child('m1');

    child.info('processed', { events: 2 });
    child.warn('failed', new Error('boom'));
    child.debug('plain', 'text');

    expect(lines.map((l) => [l.level, l.line.replace(TS, '')])).toEqual([
      ['info', 'INFO [pipeline:m1] processed {"events":2}'],
      ['warn', 'WARN [pipeline:m1] failed boom'],
      ['debug', 'DEBUG [pipeline:m1] plain text'],
    ]);
  });
});
