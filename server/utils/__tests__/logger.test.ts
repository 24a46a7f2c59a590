import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../logger';
import { getRunId, runWithContext } from '../runContext';

function lastEntry(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
  const calls = spy.mock.calls;
  return JSON.parse(String(calls[calls.length - 1]?.[0]));
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should write structured JSON with the component', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('merger').warn('Duplicate keys found', { duplicatesRemoved: 2 });

    expect(lastEntry(warn)).toMatchObject({
      level: 'warn',
      message: 'Duplicate keys found',
      component: 'merger',
      duplicatesRemoved: 2,
    });
  });

  it('should redact sensitive fields at any depth', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('sheets-store').warn('Auth failed', {
      token: 'test-secret',
      auth: { private_key: 'test-secret', client_email: 'robot@example.org' },
    });

    expect(lastEntry(warn)).toMatchObject({
      token: '***REDACTED***',
      auth: { private_key: '***REDACTED***', client_email: 'robot@example.org' },
    });
  });

  it('should carry the run id of the surrounding run', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger('ingestion');

    await runWithContext({ runId: 'run-42', source: 'CBIC', startTime: 0 }, async () => {
      await Promise.resolve();
      expect(getRunId()).toBe('run-42');
      log.warn('inside');
    });
    log.warn('outside');

    expect(warn.mock.calls.map(([line]) => JSON.parse(String(line)).runId)).toEqual(['run-42', undefined]);
  });

  it('should merge child context into every line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('ingestion').child({ table: 'fact_series' }).error('Merge failed');

    expect(lastEntry(error)).toMatchObject({ component: 'ingestion', table: 'fact_series' });
  });

  it('should drop lines below LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('quality').warn('hidden');

    expect(warn).not.toHaveBeenCalled();
  });
});
