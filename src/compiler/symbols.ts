/**
 * Defined global symbol names from `nm -g --defined-only` output.
 * Archive member headers (`foo.o:`) and blank lines are skipped.
 */
export function parseDefinedSymbols(nmOutput: string): string[] {
  const names: string[] = [];
  for (const line of nmOutput.split(/\r?\n/)) {
    const m = line.match(/^(?:[0-9a-fA-F]+\s+)?([A-Za-z])\s+(\S+)$/);
    if (m && m[1] !== 'U') names.push(m[2]);
  }
  return names;
}

export function missingSymbols(expected: string[], defined: string[]): string[] {
  const have = new Set(defined);
  return expected.filter((name) => !have.has(name));
}
