import { redact, safeLogger, setLogLevel } from './safeLogger';

describe('safeLogger redaction', () => {
  afterEach(() => setLogLevel('silent'));

  it('redacts credentials at any depth', () => {
    setLogLevel('info');
    const spy = jest.spyOn(console, 'info').mockImplementation(() => {});
    safeLogger.info('event', {
      username: 'alice',
      password: 'test-password',
      nested: { token: 'test-token', ok: 'fine' },
      list: [{ passwordHash: 'scrypt$x$y' }],
    });
    const payload = spy.mock.calls[0][1];
    expect(spy.mock.calls[0][0]).toBe('event');
    expect(payload.username).toBe('alice');
    expect(payload.password).toBe('[REDACTED]');
    expect(payload.nested.token).toBe('[REDACTED]');
    expect(payload.nested.ok).toBe('fine');
    expect(payload.list[0].passwordHash).toBe('[REDACTED]');
    spy.mockRestore();
  });

  it('reduces errors to name and message', () => {
    expect(redact({ error: new TypeError('boom') })).toEqual({ error: { name: 'TypeError', message: 'boom' } });
  });

  it('drops messages below the threshold', () => {
    setLogLevel('warn');
    const info = jest.spyOn(console, 'info').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    safeLogger.info('quiet');
    safeLogger.warn('loud');
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('loud', {});
    info.mockRestore();
    warn.mockRestore();
  });
});
