import { execFileSync } from 'child_process';

import { StubGenerationError } from '../errors.js';
import { which } from '../utils/which.js';
import type { ToolchainInfo } from './compilerTypes.js';

function getVersion(path: string): string {
  try {
    return execFileSync(path, ['--version'], { encoding: 'utf8' })
      .split('\n')[0]
      .trim();
  } catch {
    return 'unknown';
  }
}

function resolveTool(name: string): string | null {
  return name.includes('/') ? name : which(name);
}

/**
 * Locate `<prefix>gcc`, `<prefix>ar` and (optionally) `<prefix>nm`.
 * Without a prefix the host compiler is used: `$CC`, gcc, cc or clang.
 */
export function detectToolchain(prefix = ''): ToolchainInfo {
  const ccCandidates = prefix
    ? [`${prefix}gcc`]
    : [process.env.CC, 'gcc', 'cc', 'clang'].filter((c): c is string => Boolean(c));

  let cc: string | null = null;
  for (const name of ccCandidates) {
    cc = resolveTool(name);
    if (cc) break;
  }
  if (!cc) {
    throw new StubGenerationError(
      'TOOLCHAIN_NOT_FOUND',
      `No C compiler found (tried ${ccCandidates.join(', ')})`,
    );
  }

  const ar = resolveTool(`${prefix}ar`);
  if (!ar) {
    throw new StubGenerationError('TOOLCHAIN_NOT_FOUND', `Archiver not found: ${prefix}ar`);
  }

  return {
    prefix,
    cc,
    ar,
    nm: resolveTool(`${prefix}nm`),
    version: getVersion(cc),
  };
}
