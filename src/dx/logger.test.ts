import { describe, it, expect, afterEach, vi } from 'vitest';

import { isDebugEnabled, logDebug, setDebugEnabled } from './logger.js';
import { warn } from './warnings.js';

describe('dx logger', () => {
  const prev = process.env.HEADERSTUB_DEBUG;

  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
    if (prev == null) delete process.env.HEADERSTUB_DEBUG;
    else process.env.HEADERSTUB_DEBUG = prev;
  });

  it('is disabled by default', () => {
    delete process.env.HEADERSTUB_DEBUG;
    expect(isDebugEnabled()).toBe(false);
  });

  it('enables via env var', () => {
    process.env.HEADERSTUB_DEBUG = '1';
    expect(isDebugEnabled()).toBe(true);
  });

  it('enables via setter', () => {
    delete process.env.HEADERSTUB_DEBUG;
    setDebugEnabled(true);
    expect(isDebugEnabled()).toBe(true);
  });

  it('prints with the tool prefix only when enabled', () => {
    delete process.env.HEADERSTUB_DEBUG;
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    logDebug('hidden');
    expect(log).not.toHaveBeenCalled();

    setDebugEnabled(true);
    logDebug('shown', 1);
    expect(log).toHaveBeenCalledWith('[headerstub]', 'shown', 1);
  });

  it('formats warnings with code and hint', () => {
    setDebugEnabled(true);
    const err = vi.spyOn(console, 'warn').mockImplementation(() => {});

    warn({ code: 'UNKNOWN_FEATURE', message: 'feature "radar" is not used', hint: 'check --features' });
    expect(err).toHaveBeenCalledWith(
      '[headerstub]',
      'warning(UNKNOWN_FEATURE): feature "radar" is not used Hint: check --features',
    );
  });
});
