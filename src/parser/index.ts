import { readFileSync } from 'fs';

import { parseCPrototypes } from './parseC.js';
import { parsePrototype } from './parsePrototype.js';
import { sanitize } from './sanitize.js';
import { splitStatements } from './splitStatements.js';
import type { ExtractOptions, FunctionSignature } from './parserTypes.js';

export type { ExtractOptions, ExtractorKind, FunctionSignature, Parameter } from './parserTypes.js';
export { parseParameters } from './parseParameters.js';
export { parsePrototype } from './parsePrototype.js';
export { CODE_SECTION_PLACEHOLDER, sanitize } from './sanitize.js';
export { splitStatements } from './splitStatements.js';

function extractWithRegex(text: string): FunctionSignature[] {
  const out: FunctionSignature[] = [];
  for (const statement of splitStatements(sanitize(text))) {
    const sig = parsePrototype(statement);
    if (sig) out.push(sig);
  }
  return out;
}

/**
 * All function prototypes in one header, in source order.
 *
 * Throws `ParameterParseError` when a prototype's parameter list can't be
 * decomposed; every other unrecognised statement is skipped.
 */
export function extractSignatures(
  text: string,
  options: ExtractOptions = {},
): FunctionSignature[] {
  return options.extractor === 'tree-sitter'
    ? parseCPrototypes(text)
    : extractWithRegex(text);
}

export function extractSignaturesFromFile(
  filePath: string,
  options: ExtractOptions = {},
): FunctionSignature[] {
  return extractSignatures(readFileSync(filePath, 'utf8'), options);
}
