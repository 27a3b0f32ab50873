import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLog } from '../src/observability/log.js';
import { withEnv } from './helpers/mockEnv.js';

describe('createLog', () => {
  afterEach(() => { vi.restoreAllMocks(); });

  it('prints tagged lines', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'info', JSON_LOGS: 'false' }, () => createLog('facts').info('fetched', { rows: 3 }));
    expect(spy).toHaveBeenCalledWith('[facts] fetched {"rows":3}');
  });

  it('drops lines under the threshold', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'info' }, () => createLog('facts').debug('noise'));
    expect(spy).not.toHaveBeenCalled();
  });

  it('writes redacted JSON lines', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    withEnv({ LOG_LEVEL: 'debug', JSON_LOGS: 'true', LOG_REDACT_LIST: 'test-secret' }, () =>
      createLog('oracle').warn('login failed', { password: 'test-secret' }));
    const line = String(spy.mock.calls[0][0]);
    expect(JSON.parse(line)).toMatchObject({ level: 'warn', tag: 'oracle', msg: 'login failed', password: '[REDACTED]' });
  });
});
