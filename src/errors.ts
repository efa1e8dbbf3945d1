import type { ParameterErrorCode } from './parser/parserTypes.js';

export type StubGenerationErrorCode =
  | ParameterErrorCode
  | 'INCLUDE_DIR_NOT_FOUND'
  | 'HEADER_READ_FAILED'
  | 'OUTPUT_WRITE_FAILED'
  | 'TOOLCHAIN_NOT_FOUND'
  | 'COMPILATION_FAILED'
  | 'ARCHIVE_FAILED'
  | 'LIBRARY_VALIDATION_FAILED';

export class StubGenerationError extends Error {
  override name = 'StubGenerationError';
  readonly code: StubGenerationErrorCode;
  readonly details?: unknown;

  constructor(code: StubGenerationErrorCode, message: string, details?: unknown) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

/**
 * A declaration that looks like a prototype but has a parameter we can't
 * decompose into type + name. Always fatal: the stub wouldn't compile.
 */
export class ParameterParseError extends StubGenerationError {
  override name = 'ParameterParseError';
  readonly fragment: string;
  readonly parameterList: string;

  constructor(code: ParameterErrorCode, fragment: string, parameterList: string) {
    super(
      code,
      `Couldn't parse parameter "${fragment}" in parameter list "${parameterList}"`,
      { fragment, parameterList },
    );
    this.fragment = fragment;
    this.parameterList = parameterList;
  }
}

export class ConfigError extends Error {
  override name = 'ConfigError';
  readonly key?: string;

  constructor(message: string, key?: string) {
    super(message);
    this.key = key;
  }
}
