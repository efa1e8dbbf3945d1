#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { loadConfig, resolveConfig } from './config/config.js';
import type { HeaderstubUserConfig } from './config/configTypes.js';
import { parseExtractor } from './config/validateConfig.js';
import { setDebugEnabled } from './dx/logger.js';
import { ConfigError, StubGenerationError } from './errors.js';
import { generateStubs } from './generator/generate.js';
import { buildLibraries } from './generator/libraries.js';
import { extractSignaturesFromFile } from './parser/index.js';

const VALUE_FLAGS = ['--include', '--out', '--config', '--features', '--extractor', '--toolchain'];
const BOOL_FLAGS = ['--compile', '--debug', '-h', '--help'];

class UsageError extends Error {
  override name = 'UsageError';
}

function getFlagValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`Missing value for ${name}`);
  }
  return value;
}

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (VALUE_FLAGS.includes(a)) {
      i++;
      continue;
    }
    if (BOOL_FLAGS.includes(a)) continue;
    if (a.startsWith('-')) throw new UsageError(`Unknown option ${a}`);
    out.push(a);
  }
  return out;
}

function usage() {
  console.log(`headerstub

Usage:
	headerstub [options]             generate stub files for every enabled target
	headerstub inspect <header>      print the prototypes found in one header as JSON

Options:
	--include <dir>       header directory (default ./include)
	--out <dir>           output directory (default .)
	--config <file>       config file (.js default export or .json)
	--features <a,b>      enable only these target features
	--extractor <kind>    regex (default) | tree-sitter
	--compile             compile and archive each stub file as lib<name>.a
	--toolchain <prefix>  toolchain prefix for --compile, e.g. arm-none-eabi-
	--debug               verbose logging (same as HEADERSTUB_DEBUG=1)

Notes:
	- Without --config, headerstub.config.js in the working directory is used when present.
	- A prototype whose parameter list can't be parsed aborts the run.
`);
}

function cliOverrides(argv: string[]): HeaderstubUserConfig {
  const overrides: HeaderstubUserConfig = {};

  const includeDir = getFlagValue(argv, '--include');
  if (includeDir) overrides.includeDir = includeDir;
  const outDir = getFlagValue(argv, '--out');
  if (outDir) overrides.outDir = outDir;

  const features = getFlagValue(argv, '--features');
  if (features !== undefined) {
    overrides.features = features.split(',').map((f) => f.trim()).filter(Boolean);
  }

  const extractor = getFlagValue(argv, '--extractor');
  if (extractor !== undefined) overrides.extractor = parseExtractor(extractor, '--extractor');

  if (hasFlag(argv, '--debug')) overrides.debug = true;

  const toolchainPrefix = getFlagValue(argv, '--toolchain');
  if (hasFlag(argv, '--compile') || toolchainPrefix !== undefined) {
    overrides.compile = toolchainPrefix !== undefined ? { toolchainPrefix } : {};
  }
  return overrides;
}

async function runGenerate(argv: string[]): Promise<number> {
  const fileConfig = await loadConfig(process.cwd(), getFlagValue(argv, '--config'));
  const config = resolveConfig(fileConfig, cliOverrides(argv));
  if (config.debug) setDebugEnabled(true);

  const report = generateStubs(config, {
    onTarget: (target) => console.log(`Generating ${target.output}`),
  });

  for (const t of report.targets) {
    console.log(`  ${t.output}: ${t.stubs} stubs`);
  }

  if (config.compile) {
    for (const lib of buildLibraries(report, config, config.compile)) {
      console.log(`Built ${lib.libraryPath}`);
    }
  }

  if (report.unhandledTypes.length) {
    console.warn(
      `No default return value for: ${report.unhandledTypes.join(', ')} ` +
        '(stubs return an uninitialized local; add them to returnValues)',
    );
  }
  return 0;
}

function runInspect(argv: string[], header: string | undefined): number {
  if (!header) throw new UsageError('Missing header file (ex: include/acc_sensor.h)');
  const extractorFlag = getFlagValue(argv, '--extractor');
  const extractor = extractorFlag ? parseExtractor(extractorFlag, '--extractor') : 'regex';
  if (hasFlag(argv, '--debug')) setDebugEnabled(true);

  const signatures = extractSignaturesFromFile(header, { extractor });
  console.log(JSON.stringify(signatures, null, 2));
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  try {
    if (hasFlag(argv, '-h') || hasFlag(argv, '--help')) {
      usage();
      return 0;
    }

    const [cmd, arg] = positionals(argv);
    if (cmd === 'inspect') return runInspect(argv, arg);
    if (cmd !== undefined && cmd !== 'generate') throw new UsageError(`Unknown command ${cmd}`);
    return await runGenerate(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      usage();
      return 2;
    }
    if (err instanceof StubGenerationError || err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('[headerstub] unexpected error', err);
      process.exitCode = 1;
    },
  );
}
