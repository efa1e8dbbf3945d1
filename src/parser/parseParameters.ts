import { ParameterParseError } from '../errors.js';
import type { Parameter, ParameterErrorCode } from './parserTypes.js';

// Type runs up to the last space or `*`, name is the trailing identifier.
const TYPED_NAME = /^(\S.*[ *])\s*(\w+)$/;

function classify(fragment: string): ParameterErrorCode {
  if (/[()[\]]|\.\.\./.test(fragment)) {
    return 'UNSUPPORTED_PARAMETER';
  }
  return 'MALFORMED_PARAMETER';
}

export function parseParameters(paramText: string): Parameter[] {
  if (paramText.trim() === 'void') return [];

  const params: Parameter[] = [];
  for (const piece of paramText.split(',')) {
    const fragment = piece.trim();
    if (!fragment) continue;

    const m = fragment.match(TYPED_NAME);
    if (!m) {
      throw new ParameterParseError(classify(fragment), fragment, paramText);
    }
    params.push({ type: m[1].trim(), name: m[2] });
  }
  return params;
}
