export { buildLibraryCommands } from './buildCommand.js';
export { buildStubLibrary } from './buildLibrary.js';
export { detectToolchain } from './detectToolchain.js';
export { formatDiagnostics, parseDiagnostics, type CompilerDiagnostic } from './diagnostics.js';
export { getStaticLibName, libraryBaseName } from './outputNaming.js';
export { missingSymbols, parseDefinedSymbols } from './symbols.js';
export type { LibraryCommands, LibraryRequest, LibraryResult, ToolchainInfo } from './compilerTypes.js';
