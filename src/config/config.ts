import { existsSync, readFileSync } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { ConfigError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import type { CompileOptions, HeaderstubConfig, HeaderstubUserConfig } from './configTypes.js';
import { CORTEX_M4_FLAGS, DEFAULT_COMPILE, DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './validateConfig.js';

export const CONFIG_FILE_NAME = 'headerstub.config.js';

let cached:
  | { loaded: true; key: string; config: HeaderstubUserConfig | null }
  | { loaded: false } = { loaded: false };

async function readConfigFile(p: string): Promise<unknown> {
  if (extname(p) === '.json') {
    try {
      return JSON.parse(readFileSync(p, 'utf8'));
    } catch (err) {
      throw new ConfigError(`Invalid JSON in ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  const mod: unknown = await import(pathToFileURL(resolve(p)).href);
  if (typeof mod === 'object' && mod !== null && 'default' in mod) return mod.default;
  return mod;
}

/**
 * Loads the project config.
 *
 * - `explicitPath` (from `--config`) must exist; `.json` or a `.js` default export
 * - otherwise `headerstub.config.js` in `projectRoot` is optional: missing -> null
 * - `includeDir`/`outDir` are resolved against the file's directory
 * - cached per process
 */
export async function loadConfig(
  projectRoot: string = process.cwd(),
  explicitPath?: string,
): Promise<HeaderstubUserConfig | null> {
  const p = explicitPath ? resolve(projectRoot, explicitPath) : join(projectRoot, CONFIG_FILE_NAME);
  if (cached.loaded && cached.key === p) return cached.config;

  if (!existsSync(p)) {
    if (explicitPath) throw new ConfigError(`Config file not found: ${p}`);
    cached = { loaded: true, key: p, config: null };
    return null;
  }

  const config = validateConfig(await readConfigFile(p));
  // Directories in a config file are relative to the file, not the cwd.
  if (config.includeDir) config.includeDir = resolve(dirname(p), config.includeDir);
  if (config.outDir) config.outDir = resolve(dirname(p), config.outDir);
  cached = { loaded: true, key: p, config };
  logDebug('loaded config', { path: p });
  return config;
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}

function resolveCompile(user: Partial<CompileOptions> | undefined): CompileOptions {
  const toolchainPrefix = user?.toolchainPrefix ?? DEFAULT_COMPILE.toolchainPrefix;
  const embedded = toolchainPrefix.startsWith('arm-none-eabi');
  return {
    toolchainPrefix,
    flags: user?.flags ?? (embedded ? CORTEX_M4_FLAGS : DEFAULT_COMPILE.flags),
    validate: user?.validate ?? DEFAULT_COMPILE.validate,
  };
}

/**
 * Layer defaults < config file < CLI overrides. `returnValues` merge key by
 * key; every other field replaces. `compile` is only set when either layer
 * asks for it.
 */
export function resolveConfig(
  file: HeaderstubUserConfig | null,
  overrides: HeaderstubUserConfig = {},
): HeaderstubConfig {
  const { compile: fileCompile, ...fileRest } = file ?? {};
  const { compile: cliCompile, ...cliRest } = overrides;

  const merged: HeaderstubConfig = {
    ...DEFAULT_CONFIG,
    ...fileRest,
    ...cliRest,
    returnValues: {
      ...DEFAULT_CONFIG.returnValues,
      ...fileRest.returnValues,
      ...cliRest.returnValues,
    },
  };
  if (fileCompile || cliCompile) {
    merged.compile = resolveCompile({ ...fileCompile, ...cliCompile });
  }
  return merged;
}
