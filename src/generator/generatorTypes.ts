import type { StubTarget } from '../config/configTypes.js';

export type TargetResult = {
  output: string;
  /** Absolute path of the written stub file. */
  path: string;
  stubs: number;
  functionNames: string[];
  /** Return types emitted as uninitialized locals while rendering this target. */
  unhandledTypes: string[];
};

export type GenerationReport = {
  targets: TargetResult[];
  /** Union over all targets, sorted. */
  unhandledTypes: string[];
};

export type GenerateHooks = {
  /** Called before a target's headers are read. */
  onTarget?: (target: StubTarget) => void;
};
