export type ToolchainInfo = {
  /** e.g. `arm-none-eabi-`; empty for the host toolchain. */
  prefix: string;
  cc: string;
  ar: string;
  /** Absent when nm isn't installed; library validation is skipped then. */
  nm: string | null;
  version: string;
};

export type LibraryRequest = {
  /** Generated stub source. */
  sourcePath: string;
  /** Base name; the archive is `lib<libraryName>.a`. */
  libraryName: string;
  outDir: string;
  includeDir: string;
  flags: string[];
};

export type LibraryCommands = {
  objectPath: string;
  libraryPath: string;
  compile: string[];
  archive: string[];
  /** Arguments for nm (defined external symbols only). */
  listSymbols: string[];
};

export type LibraryResult = {
  libraryPath: string;
  /** Present when nm ran. */
  definedSymbols?: string[];
};
