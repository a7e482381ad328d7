import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../logger.js';

function sink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const now = () => new Date('2024-05-01T12:00:00.000Z');

describe('createLogger', () => {
  it('writes a timestamped line with its context', () => {
    const out = sink();
    const logger = createLogger({ sink: out, now });

    logger.info('Appended student rows', { table: 'students', rows: 12 });

    expect(out.info).toHaveBeenCalledWith(
      '2024-05-01T12:00:00.000Z INFO  Appended student rows {"table":"students","rows":12}'
    );
  });

  it('drops entries below the level', () => {
    const out = sink();
    const logger = createLogger({ level: 'warn', sink: out, now });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('Nothing to import');

    expect(out.debug).not.toHaveBeenCalled();
    expect(out.info).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledWith('2024-05-01T12:00:00.000Z WARN  Nothing to import');
  });

  it('prefixes child context and prints errors with their stack', () => {
    const out = sink();
    const logger = createLogger({ sink: out, now, context: { service: 'api' } }).child({ router: 'students' });
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at handler (students.ts:1:1)';

    logger.error('API Error', { error });

    expect(out.error).toHaveBeenCalledWith(
      '2024-05-01T12:00:00.000Z ERROR API Error {"service":"api","router":"students","error":"Error: boom\\n    at handler (students.ts:1:1)"}'
    );
  });

  it('falls back to the message when an error has no stack', () => {
    const out = sink();
    const error = new Error('boom');
    error.stack = undefined;

    createLogger({ sink: out, now }).error('API Error', { error });

    expect(out.error).toHaveBeenCalledWith('2024-05-01T12:00:00.000Z ERROR API Error {"error":"boom"}');
  });

  it('writes bigint values as strings', () => {
    const out = sink();

    createLogger({ sink: out, now }).info('Appended student rows', { rows: 12n });

    expect(out.info).toHaveBeenCalledWith('2024-05-01T12:00:00.000Z INFO  Appended student rows {"rows":"12"}');
  });

  it('still logs the line when the context is circular', () => {
    const out = sink();
    const body: Record<string, unknown> = { country: 'Poland' };
    body.self = body;

    createLogger({ sink: out, now }).warn('Odd request', { body });

    expect(out.warn).toHaveBeenCalledTimes(1);
    expect(out.warn.mock.calls[0][0]).toMatch(
      /^2024-05-01T12:00:00\.000Z WARN  Odd request \{"contextError":"Converting circular structure to JSON/
    );
  });
});
