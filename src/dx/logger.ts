let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.HEADERSTUB_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically (`--debug`, config, tests).
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log('[headerstub]', ...args);
}

export function logWarn(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.warn('[headerstub]', ...args);
}
