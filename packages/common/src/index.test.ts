import { describe, expect, it } from 'vitest';
import { createJsonLogger, ensureRequestId, errorMessage, isLogLevel } from './index.js';

describe('createJsonLogger', () => {
  it('writes one JSON line per entry with meta', () => {
    const lines: string[] = [];
    const logger = createJsonLogger({ level: 'info', write: (line) => lines.push(line) });

    logger.info('work_order_created', { work_order_id: 'wo-1' });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({ level: 'info', message: 'work_order_created', meta: { work_order_id: 'wo-1' } });
  });

  it('drops entries above the configured level', () => {
    const lines: string[] = [];
    const logger = createJsonLogger({ level: 'warn', write: (line) => lines.push(line) });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept');

    expect(lines).toHaveLength(2);
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createJsonLogger({ level: 'silent', write: (line) => lines.push(line) });

    logger.error('boom');

    expect(lines).toEqual([]);
  });
});

describe('helpers', () => {
  it('keeps a provided request id and generates one otherwise', () => {
    expect(ensureRequestId('req-1')).toBe('req-1');
    expect(ensureRequestId('')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });

  it('extracts error messages', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});
