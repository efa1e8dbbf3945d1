import type { ExtractorKind } from '../parser/parserTypes.js';

export type StubTarget = {
  /** Generated file name, written under `outDir`. */
  output: string;
  /** Headers read from `includeDir`, in include/emit order. */
  headers: string[];
  /** Only generated when this feature is enabled. */
  feature?: string;
  /** Archive base name for `--compile` (`lib<library>.a`). */
  library?: string;
};

export type CompileOptions = {
  /** Prepended to gcc/ar/nm, e.g. `arm-none-eabi-`. Empty for the host toolchain. */
  toolchainPrefix: string;
  flags: string[];
  /** Check with nm that every stub ended up in the archive. */
  validate: boolean;
};

export type HeaderstubConfig = {
  includeDir: string;
  outDir: string;
  targets: StubTarget[];
  /** Enabled features; `undefined` enables every feature a target names. */
  features?: string[];
  returnValues: Record<string, string>;
  extraCode: string;
  dependencyCall: string;
  dependencyTrigger: string;
  extractor: ExtractorKind;
  debug: boolean;
  compile?: CompileOptions;
};

/** What a config file may set. `returnValues` merges over the defaults. */
export type HeaderstubUserConfig = Partial<Omit<HeaderstubConfig, 'compile'>> & {
  compile?: Partial<CompileOptions>;
};
