import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import type { HeaderstubConfig, StubTarget } from '../config/configTypes.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import { StubGenerationError } from '../errors.js';
import { extractSignatures } from '../parser/index.js';
import { emitStub, type StubOptions } from '../stubs/emitStub.js';
import { renderPreamble } from '../stubs/stubFile.js';
import type { GenerateHooks, GenerationReport, TargetResult } from './generatorTypes.js';

export type RenderedTarget = {
  content: string;
  functionNames: string[];
  unhandledTypes: string[];
};

function readHeader(includeDir: string, header: string): string {
  const p = join(includeDir, header);
  try {
    return readFileSync(p, 'utf8');
  } catch (err) {
    throw new StubGenerationError(
      'HEADER_READ_FAILED',
      `Failed to read header ${header}: ${err instanceof Error ? err.message : String(err)}`,
      { path: p },
    );
  }
}

function stubOptions(config: HeaderstubConfig): StubOptions {
  return {
    returnValues: config.returnValues,
    dependencyCall: config.dependencyCall,
    dependencyTrigger: config.dependencyTrigger,
  };
}

/**
 * Build one stub file in memory: preamble, then every prototype of every
 * header in header order, then declaration order.
 */
export function renderTarget(target: StubTarget, config: HeaderstubConfig): RenderedTarget {
  const includeDir = resolve(config.includeDir);
  const options = stubOptions(config);

  let content = renderPreamble(target.headers, config.extraCode);
  const functionNames: string[] = [];
  const unhandled = new Set<string>();

  for (const header of target.headers) {
    const text = readHeader(includeDir, header);
    const signatures = extractSignatures(text, { extractor: config.extractor });
    logDebug(`${header}: ${signatures.length} prototypes`);

    for (const sig of signatures) {
      const stub = emitStub(sig, options);
      content += stub.text;
      functionNames.push(sig.name);
      if (stub.unhandledType) {
        if (!unhandled.has(stub.unhandledType)) {
          warn({
            code: 'MISSING_DEFAULT_RETURN',
            message: `no default return value for "${stub.unhandledType}" (${sig.name})`,
            hint: 'add it to returnValues',
          });
        }
        unhandled.add(stub.unhandledType);
      }
    }
  }

  return { content, functionNames, unhandledTypes: [...unhandled] };
}

export function enabledTargets(config: HeaderstubConfig): StubTarget[] {
  if (!config.features) return config.targets;

  const enabled = new Set(config.features);
  const known = new Set(config.targets.flatMap((t) => (t.feature ? [t.feature] : [])));
  for (const f of enabled) {
    if (!known.has(f)) {
      warn({ code: 'UNKNOWN_FEATURE', message: `feature "${f}" is not used by any target` });
    }
  }
  return config.targets.filter((t) => !t.feature || enabled.has(t.feature));
}

export function generateTarget(target: StubTarget, config: HeaderstubConfig): TargetResult {
  const rendered = renderTarget(target, config);
  const outDir = resolve(config.outDir);
  const path = join(outDir, target.output);

  try {
    mkdirSync(outDir, { recursive: true });
    writeFileSync(path, rendered.content);
  } catch (err) {
    throw new StubGenerationError(
      'OUTPUT_WRITE_FAILED',
      `Failed to write stub file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { path },
    );
  }

  return {
    output: target.output,
    path,
    stubs: rendered.functionNames.length,
    functionNames: rendered.functionNames,
    unhandledTypes: rendered.unhandledTypes,
  };
}

/**
 * Write one stub file per enabled target. Stops at the first fatal error;
 * files written before it are left in place.
 */
export function generateStubs(
  config: HeaderstubConfig,
  hooks: GenerateHooks = {},
): GenerationReport {
  const includeDir = resolve(config.includeDir);
  if (!existsSync(includeDir)) {
    throw new StubGenerationError(
      'INCLUDE_DIR_NOT_FOUND',
      `Include directory not found: ${includeDir}`,
      { path: includeDir },
    );
  }

  const targets: TargetResult[] = [];
  for (const target of enabledTargets(config)) {
    hooks.onTarget?.(target);
    targets.push(generateTarget(target, config));
  }

  const unhandledTypes = [...new Set(targets.flatMap((t) => t.unhandledTypes))].sort();
  return { targets, unhandledTypes };
}
