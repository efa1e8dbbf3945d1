export type Parameter = {
  type: string;
  name: string;
};

export type FunctionSignature = {
  /** Includes any trailing `*`, e.g. `acc_processing_t *`. */
  returnType: string;
  name: string;
  parameters: Parameter[];
  /** Parameter list exactly as written between the parentheses. */
  rawParameterText: string;
};

export type ExtractorKind = 'regex' | 'tree-sitter';

export type ExtractOptions = {
  extractor?: ExtractorKind;
};

export type ParameterErrorCode = 'MALFORMED_PARAMETER' | 'UNSUPPORTED_PARAMETER';
