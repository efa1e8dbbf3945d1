import { basename, join } from 'path';

import type { LibraryCommands, LibraryRequest } from './compilerTypes.js';
import { getStaticLibName } from './outputNaming.js';

export function buildLibraryCommands(request: LibraryRequest): LibraryCommands {
  const objectName = `${basename(request.sourcePath).replace(/\.c$/, '')}.o`;
  const objectPath = join(request.outDir, objectName);
  const libraryPath = join(request.outDir, getStaticLibName(request.libraryName));

  return {
    objectPath,
    libraryPath,
    compile: [
      '-c',
      request.sourcePath,
      '-o',
      objectPath,
      '-I',
      request.includeDir,
      ...request.flags,
    ],
    archive: ['rcs', libraryPath, objectPath],
    listSymbols: ['-g', '--defined-only', libraryPath],
  };
}
