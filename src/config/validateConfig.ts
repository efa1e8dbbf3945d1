import { ConfigError } from '../errors.js';
import type { ExtractorKind } from '../parser/parserTypes.js';
import type { CompileOptions, HeaderstubUserConfig, StubTarget } from './configTypes.js';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((s) => typeof s === 'string');
}

function expectString(v: unknown, key: string): string {
  if (typeof v !== 'string') throw new ConfigError(`"${key}" must be a string`, key);
  return v;
}

function expectStringArray(v: unknown, key: string): string[] {
  if (!isStringArray(v)) throw new ConfigError(`"${key}" must be an array of strings`, key);
  return v;
}

function validateTarget(v: unknown, index: number): StubTarget {
  const key = `targets[${index}]`;
  if (!isRecord(v)) throw new ConfigError(`"${key}" must be an object`, key);

  const target: StubTarget = {
    output: expectString(v.output, `${key}.output`),
    headers: expectStringArray(v.headers, `${key}.headers`),
  };
  if (!target.output) throw new ConfigError(`"${key}.output" must not be empty`, `${key}.output`);
  if (v.feature !== undefined) target.feature = expectString(v.feature, `${key}.feature`);
  if (v.library !== undefined) target.library = expectString(v.library, `${key}.library`);
  return target;
}

function validateReturnValues(v: unknown): Record<string, string> {
  if (!isRecord(v)) throw new ConfigError('"returnValues" must be an object', 'returnValues');
  const out: Record<string, string> = {};
  for (const [type, value] of Object.entries(v)) {
    out[type] = expectString(value, `returnValues.${type}`);
  }
  return out;
}

function validateCompile(v: unknown): Partial<CompileOptions> {
  if (!isRecord(v)) throw new ConfigError('"compile" must be an object', 'compile');
  const out: Partial<CompileOptions> = {};
  if (v.toolchainPrefix !== undefined) {
    out.toolchainPrefix = expectString(v.toolchainPrefix, 'compile.toolchainPrefix');
  }
  if (v.flags !== undefined) out.flags = expectStringArray(v.flags, 'compile.flags');
  if (v.validate !== undefined) {
    if (typeof v.validate !== 'boolean') {
      throw new ConfigError('"compile.validate" must be a boolean', 'compile.validate');
    }
    out.validate = v.validate;
  }
  return out;
}

export function parseExtractor(v: unknown, key = 'extractor'): ExtractorKind {
  if (v === 'regex' || v === 'tree-sitter') return v;
  throw new ConfigError(`"${key}" must be "regex" or "tree-sitter"`, key);
}

/**
 * Check an untrusted config object (from a config file) field by field.
 * Unknown keys are ignored.
 */
export function validateConfig(raw: unknown): HeaderstubUserConfig {
  if (!isRecord(raw)) throw new ConfigError('Config must export an object');

  const cfg: HeaderstubUserConfig = {};
  if (raw.includeDir !== undefined) cfg.includeDir = expectString(raw.includeDir, 'includeDir');
  if (raw.outDir !== undefined) cfg.outDir = expectString(raw.outDir, 'outDir');
  if (raw.targets !== undefined) {
    if (!Array.isArray(raw.targets)) throw new ConfigError('"targets" must be an array', 'targets');
    cfg.targets = raw.targets.map(validateTarget);
  }
  if (raw.features !== undefined) cfg.features = expectStringArray(raw.features, 'features');
  if (raw.returnValues !== undefined) cfg.returnValues = validateReturnValues(raw.returnValues);
  if (raw.extraCode !== undefined) cfg.extraCode = expectString(raw.extraCode, 'extraCode');
  if (raw.dependencyCall !== undefined) {
    cfg.dependencyCall = expectString(raw.dependencyCall, 'dependencyCall');
  }
  if (raw.dependencyTrigger !== undefined) {
    cfg.dependencyTrigger = expectString(raw.dependencyTrigger, 'dependencyTrigger');
  }
  if (raw.extractor !== undefined) cfg.extractor = parseExtractor(raw.extractor);
  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') throw new ConfigError('"debug" must be a boolean', 'debug');
    cfg.debug = raw.debug;
  }
  if (raw.compile !== undefined) cfg.compile = validateCompile(raw.compile);
  return cfg;
}
