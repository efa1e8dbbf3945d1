import { resolve } from 'node:path';

import { buildStubLibrary } from '../compiler/buildLibrary.js';
import type { LibraryResult, ToolchainInfo } from '../compiler/compilerTypes.js';
import { detectToolchain } from '../compiler/detectToolchain.js';
import { libraryBaseName } from '../compiler/outputNaming.js';
import type { CompileOptions, HeaderstubConfig } from '../config/configTypes.js';
import type { GenerationReport } from './generatorTypes.js';

/**
 * Compile and archive every stub file in `report`. The toolchain is looked
 * up once, unless the caller already has one.
 */
export function buildLibraries(
  report: GenerationReport,
  config: HeaderstubConfig,
  compile: CompileOptions,
  toolchain: ToolchainInfo = detectToolchain(compile.toolchainPrefix),
): LibraryResult[] {
  const byOutput = new Map(config.targets.map((t) => [t.output, t]));

  return report.targets.map((result) => {
    const target = byOutput.get(result.output) ?? { output: result.output, headers: [] };
    return buildStubLibrary(
      toolchain,
      {
        sourcePath: result.path,
        libraryName: libraryBaseName(target),
        outDir: resolve(config.outDir),
        includeDir: resolve(config.includeDir),
        flags: compile.flags,
      },
      compile.validate ? result.functionNames : undefined,
    );
  });
}
