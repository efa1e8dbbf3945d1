import { logWarn } from './logger.js';

export type HeaderstubWarningCode =
  | 'MISSING_DEFAULT_RETURN'
  | 'UNKNOWN_FEATURE'
  | 'VALIDATION_SKIPPED';

export type HeaderstubWarning = {
  code: HeaderstubWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning. Only printed when debug logging is enabled.
 */
export function warn(w: HeaderstubWarning) {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  logWarn(`warning(${w.code}): ${w.message}${hint}`);
}
