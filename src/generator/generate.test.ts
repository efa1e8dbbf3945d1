import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { resolveConfig } from '../config/config.js';
import type { StubTarget } from '../config/configTypes.js';
import { DEFAULT_EXTRA_CODE } from '../config/defaults.js';
import { ParameterParseError, StubGenerationError } from '../errors.js';
import { enabledTargets, generateStubs } from './generate.js';

const includeDir = fileURLToPath(new URL('../../examples/include', import.meta.url));
const brokenDir = fileURLToPath(new URL('../../examples/broken', import.meta.url));

const TARGETS: StubTarget[] = [
  { output: 'tsn_stubs.c', headers: ['tsn_definitions.h', 'tsn_sensor.h', 'tsn_config.h'] },
  { output: 'tsn_version_stubs.c', feature: 'version', headers: ['tsn_version.h'] },
];

const dirs: string[] = [];
function tempDir() {
  const dir = mkdtempSync(join(tmpdir(), 'headerstub-gen-'));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

describe('generateStubs', () => {
  it('writes one file per target in header then declaration order', () => {
    const outDir = tempDir();
    const config = resolveConfig(null, { includeDir, outDir, targets: TARGETS });
    const seen: string[] = [];

    const report = generateStubs(config, { onTarget: (t) => seen.push(t.output) });

    expect(seen).toEqual(['tsn_stubs.c', 'tsn_version_stubs.c']);
    expect(report.targets.map((t) => [t.output, t.stubs])).toEqual([
      ['tsn_stubs.c', 10],
      ['tsn_version_stubs.c', 2],
    ]);
    expect(report.targets[0].functionNames).toEqual([
      'tsn_sensor_create',
      'tsn_sensor_destroy',
      'tsn_sensor_measure',
      'tsn_sensor_temperature_get',
      'tsn_sensor_mode_get',
      'tsn_config_create',
      'tsn_config_destroy',
      'tsn_config_rate_set',
      'tsn_config_rate_get',
      'tsn_config_log',
    ]);
    expect(report.targets[0].path).toBe(join(outDir, 'tsn_stubs.c'));
    expect(report.unhandledTypes).toEqual(['tsn_mode_t']);
  });

  it('renders includes, the extra code and each stub', () => {
    const outDir = tempDir();
    generateStubs(resolveConfig(null, { includeDir, outDir, targets: TARGETS }));

    const content = readFileSync(join(outDir, 'tsn_stubs.c'), 'utf8');
    const preamble =
      '#include "tsn_definitions.h"\n#include "tsn_sensor.h"\n#include "tsn_config.h"\n' +
      DEFAULT_EXTRA_CODE +
      '\n';
    expect(content.startsWith(preamble)).toBe(true);
    expect(content).toContain(
      'tsn_config_t * tsn_config_create(void)\n{\n' +
        '  fake_external_dependencies("dummy", 1.0 + 2.0*I);\n' +
        '  tsn_config_t *res = NULL;\n' +
        '  return res;\n}\n\n',
    );
    expect(content).toContain(
      'uint16_t tsn_config_rate_get(const tsn_config_t *config)\n{\n' +
        '  (void) config;\n' +
        '  uint16_t res = 0;\n' +
        '  return res;\n}\n\n',
    );
    expect(content.endsWith('void tsn_config_log(const tsn_config_t *config)\n{\n  (void) config;\n}\n\n')).toBe(
      true,
    );

    const version = readFileSync(join(outDir, 'tsn_version_stubs.c'), 'utf8');
    expect(version).toBe(
      '#include "tsn_version.h"\n' +
        DEFAULT_EXTRA_CODE +
        '\n' +
        'const char * tsn_version_get(void)\n{\n  const char *res = NULL;\n  return res;\n}\n\n' +
        'uint32_t tsn_version_get_hex(void)\n{\n  uint32_t res = 0;\n  return res;\n}\n\n',
    );
  });

  it('uses configured return values over the uninitialized fallback', () => {
    const outDir = tempDir();
    const report = generateStubs(
      resolveConfig(null, {
        includeDir,
        outDir,
        targets: [TARGETS[0]],
        returnValues: { tsn_mode_t: 'TSN_MODE_ACTIVE' },
      }),
    );
    expect(report.unhandledTypes).toEqual([]);
    expect(readFileSync(join(outDir, 'tsn_stubs.c'), 'utf8')).toContain(
      '  tsn_mode_t res = TSN_MODE_ACTIVE;\n',
    );
  });

  it('is deterministic', () => {
    const a = tempDir();
    const b = tempDir();
    generateStubs(resolveConfig(null, { includeDir, outDir: a, targets: TARGETS }));
    generateStubs(resolveConfig(null, { includeDir, outDir: b, targets: TARGETS }));
    expect(readFileSync(join(a, 'tsn_stubs.c'), 'utf8')).toBe(
      readFileSync(join(b, 'tsn_stubs.c'), 'utf8'),
    );
  });

  it('produces the same stubs with the tree-sitter extractor', () => {
    const outDir = tempDir();
    const report = generateStubs(
      resolveConfig(null, { includeDir, outDir, targets: TARGETS, extractor: 'tree-sitter' }),
    );
    expect(report.targets[0].functionNames).toHaveLength(10);
    expect(report.targets[1].functionNames).toEqual(['tsn_version_get', 'tsn_version_get_hex']);
  });

  it('aborts on an unparsable parameter list without writing the target', () => {
    const outDir = tempDir();
    const config = resolveConfig(null, {
      includeDir: brokenDir,
      outDir,
      targets: [{ output: 'bad_stubs.c', headers: ['bad_params.h'] }],
    });

    expect(() => generateStubs(config)).toThrowError(ParameterParseError);
    expect(existsSync(join(outDir, 'bad_stubs.c'))).toBe(false);
  });

  it('fails when the include directory is missing', () => {
    const missing = join(tempDir(), 'nope');
    let err: unknown;
    try {
      generateStubs(resolveConfig(null, { includeDir: missing, targets: TARGETS }));
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(StubGenerationError);
    expect(err).toMatchObject({
      code: 'INCLUDE_DIR_NOT_FOUND',
      message: `Include directory not found: ${missing}`,
    });
  });

  it('fails on a missing header', () => {
    const config = resolveConfig(null, {
      includeDir,
      outDir: tempDir(),
      targets: [{ output: 'x_stubs.c', headers: ['missing.h'] }],
    });
    let err: unknown;
    try {
      generateStubs(config);
    } catch (e) {
      err = e;
    }
    expect(err).toMatchObject({ code: 'HEADER_READ_FAILED' });
    expect(err instanceof Error && err.message.startsWith('Failed to read header missing.h: ')).toBe(true);
  });

  it('fails when the output directory is a file', () => {
    const dir = tempDir();
    const outDir = join(dir, 'file');
    writeFileSync(outDir, 'x');
    let err: unknown;
    try {
      generateStubs(resolveConfig(null, { includeDir, outDir, targets: [TARGETS[1]] }));
    } catch (e) {
      err = e;
    }
    expect(err).toMatchObject({ code: 'OUTPUT_WRITE_FAILED' });
  });
});

describe('enabledTargets', () => {
  it('keeps every target when no features are configured', () => {
    expect(enabledTargets(resolveConfig(null, { targets: TARGETS }))).toEqual(TARGETS);
  });

  it('drops targets whose feature is off', () => {
    expect(enabledTargets(resolveConfig(null, { targets: TARGETS, features: [] }))).toEqual([
      TARGETS[0],
    ]);
    expect(
      enabledTargets(resolveConfig(null, { targets: TARGETS, features: ['version'] })),
    ).toEqual(TARGETS);
  });
});
