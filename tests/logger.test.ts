import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveLogLevel } from '../src/utils/logger.js';

const VALID_ARGS = ['6378', '0', '0', '6378', '0', '1'];

describe('resolveLogLevel', () => {
  it('keeps known pino levels', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('warn')).toBe('warn');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for missing, empty or unknown levels', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });
});

describe('logger configuration', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it.each(['', 'verbose'])('still converts when LOG_LEVEL is %j', async (level) => {
    vi.stubEnv('LOG_LEVEL', level);
    const { runCli } = await import('../src/run.js');
    const { createLogger } = await import('../src/utils/logger.js');

    expect(runCli(VALID_ARGS)).toBe(0);
    expect(createLogger('test').level).toBe('info');
  });

  it('keeps stdout to the three values when debug logging is on', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const stdoutWrite = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const { runCli } = await import('../src/run.js');
    const { createLogger, logDestination } = await import('../src/utils/logger.js');

    expect(createLogger('test').isLevelEnabled('debug')).toBe(true);
    expect(logDestination.fd).toBe(2);

    expect(runCli(VALID_ARGS)).toBe(0);
    expect(vi.mocked(console.log).mock.calls).toEqual([['1'], ['0'], ['0']]);
    expect(stdoutWrite).not.toHaveBeenCalled();
  });

  it('reports an invalid literal once at the default level', async () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const { runCli } = await import('../src/run.js');
    const { createLogger } = await import('../src/utils/logger.js');

    expect(createLogger('test').isLevelEnabled('debug')).toBe(false);
    expect(runCli(['abc', '0', '0', '6378', '0', '1'])).toBe(1);
    expect(vi.mocked(console.error).mock.calls).toEqual([
      ['Error:', 'Invalid number for o_x_km: "abc"'],
    ]);
  });
});
