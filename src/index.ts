export {
  extractSignatures,
  extractSignaturesFromFile,
  parseParameters,
  parsePrototype,
  sanitize,
  splitStatements,
  CODE_SECTION_PLACEHOLDER,
  type ExtractOptions,
  type ExtractorKind,
  type FunctionSignature,
  type Parameter,
} from './parser/index.js';
export { emitStub, type EmittedStub, type StubOptions } from './stubs/emitStub.js';
export { renderPreamble } from './stubs/stubFile.js';
export { generateStubs, generateTarget, renderTarget, enabledTargets } from './generator/generate.js';
export { buildLibraries } from './generator/libraries.js';
export * from './compiler/index.js';
export type { GenerationReport, TargetResult, GenerateHooks } from './generator/generatorTypes.js';
export { loadConfig, resolveConfig, CONFIG_FILE_NAME } from './config/config.js';
export { validateConfig } from './config/validateConfig.js';
export { DEFAULT_CONFIG, DEFAULT_RETURN_VALUES, DEFAULT_TARGETS } from './config/defaults.js';
export type { HeaderstubConfig, HeaderstubUserConfig, StubTarget, CompileOptions } from './config/configTypes.js';
export { StubGenerationError, ParameterParseError, ConfigError } from './errors.js';
export { setDebugEnabled } from './dx/logger.js';
