import { logDebug } from '../dx/logger.js';
import { parseParameters } from './parseParameters.js';
import type { FunctionSignature } from './parserTypes.js';

const IGNORED_PREFIX = /^\s*(?:static|typedef)/;

// <return type ending in a space or `*`><name> (<params>)
const PROTOTYPE_SHAPE = /^\s*(\S.*[ *])\s*(\w+)\s*\((.*)\)$/;

const EXTERN_PREFIX = /^extern\s+/;

/**
 * Trimmed return type without a leading `extern`, so it can declare `res`.
 */
export function normalizeReturnType(raw: string): string {
  return raw.trim().replace(EXTERN_PREFIX, '');
}

/**
 * Classify one candidate statement. Anything that isn't shaped like a
 * prototype yields `null`; a prototype whose parameters can't be split
 * throws `ParameterParseError`.
 */
export function parsePrototype(candidate: string): FunctionSignature | null {
  if (IGNORED_PREFIX.test(candidate)) {
    logDebug('skipping:', candidate.trim());
    return null;
  }

  const m = candidate.match(PROTOTYPE_SHAPE);
  if (!m) {
    if (candidate.trim()) logDebug('no match:', candidate.trim());
    return null;
  }

  const [, returnType, name, rawParameterText] = m;
  return {
    returnType: normalizeReturnType(returnType),
    name,
    parameters: parseParameters(rawParameterText),
    rawParameterText,
  };
}
