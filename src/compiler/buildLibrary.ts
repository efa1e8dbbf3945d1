import { execFileSync } from 'child_process';
import { mkdirSync } from 'fs';

import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { StubGenerationError } from '../errors.js';
import { buildLibraryCommands } from './buildCommand.js';
import type { LibraryRequest, LibraryResult, ToolchainInfo } from './compilerTypes.js';
import { formatDiagnostics, parseDiagnostics } from './diagnostics.js';
import { missingSymbols, parseDefinedSymbols } from './symbols.js';

// execFileSync errors carry the child's captured output.
function failureOutput(err: unknown): string {
  if (typeof err !== 'object' || err === null) return String(err);
  const stderr = 'stderr' in err ? err.stderr : undefined;
  const stdout = 'stdout' in err ? err.stdout : undefined;
  const out = [stderr, stdout]
    .map((s) => (s == null ? '' : String(s)))
    .filter(Boolean)
    .join('\n');
  return out || (err instanceof Error ? err.message : '');
}

function compile(toolchain: ToolchainInfo, args: string[], sourcePath: string) {
  try {
    logDebug('compile', { cc: toolchain.cc, args });
    execFileSync(toolchain.cc, args, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    const output = failureOutput(err);
    const formatted = formatDiagnostics(parseDiagnostics(output));
    const details = formatted ? `\n\n${formatted}` : output ? `\n\n${output.trim()}` : '';
    throw new StubGenerationError(
      'COMPILATION_FAILED',
      `Stub compilation failed for ${sourcePath}${details}`,
      { output },
    );
  }
}

function archive(toolchain: ToolchainInfo, args: string[], libraryPath: string) {
  try {
    logDebug('archive', { ar: toolchain.ar, args });
    execFileSync(toolchain.ar, args, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] });
  } catch (err) {
    throw new StubGenerationError(
      'ARCHIVE_FAILED',
      `Failed to create archive ${libraryPath}`,
      { output: failureOutput(err) },
    );
  }
}

function listSymbols(nm: string, args: string[], libraryPath: string): string[] {
  try {
    return parseDefinedSymbols(execFileSync(nm, args, { encoding: 'utf8' }));
  } catch (err) {
    throw new StubGenerationError(
      'LIBRARY_VALIDATION_FAILED',
      `Failed to validate stub library ${libraryPath}\n nm output:\n ${failureOutput(err)}`,
    );
  }
}

/**
 * Compile one stub file and archive it as `lib<name>.a`. With `expected`
 * function names and nm available, checks each one is defined in the
 * archive.
 */
export function buildStubLibrary(
  toolchain: ToolchainInfo,
  request: LibraryRequest,
  expected?: string[],
): LibraryResult {
  mkdirSync(request.outDir, { recursive: true });
  const cmds = buildLibraryCommands(request);

  compile(toolchain, cmds.compile, request.sourcePath);
  archive(toolchain, cmds.archive, cmds.libraryPath);

  if (!expected) return { libraryPath: cmds.libraryPath };
  if (!toolchain.nm) {
    warn({
      code: 'VALIDATION_SKIPPED',
      message: `${toolchain.prefix}nm not found; ${cmds.libraryPath} was not checked`,
    });
    return { libraryPath: cmds.libraryPath };
  }

  const definedSymbols = listSymbols(toolchain.nm, cmds.listSymbols, cmds.libraryPath);
  const missing = missingSymbols(expected, definedSymbols);
  if (missing.length) {
    throw new StubGenerationError(
      'LIBRARY_VALIDATION_FAILED',
      `${cmds.libraryPath} is missing ${missing.length} stub(s): ${missing.join(', ')}`,
      { missing },
    );
  }
  return { libraryPath: cmds.libraryPath, definedSymbols };
}
