import type { FunctionSignature } from '../parser/parserTypes.js';

export type StubOptions = {
  /** Return-type spelling -> literal placed in `res`. */
  returnValues: Record<string, string>;
  /** Statement added to stubs whose name contains `dependencyTrigger`. */
  dependencyCall: string;
  dependencyTrigger: string;
};

export type EmittedStub = {
  text: string;
  /** Set when the return type had no literal and isn't a pointer. */
  unhandledType?: string;
};

function returnLines(returnType: string, options: StubOptions): EmittedStub {
  if (Object.hasOwn(options.returnValues, returnType)) {
    const value = options.returnValues[returnType];
    return { text: `  ${returnType} res = ${value};\n  return res;\n` };
  }
  if (returnType.includes('*')) {
    const sep = returnType.endsWith('*') ? '' : ' ';
    return { text: `  ${returnType}${sep}res = NULL;\n  return res;\n` };
  }
  // Uninitialized on purpose; reported so the table can be extended.
  return {
    text: `  ${returnType} res;\n  return res;\n`,
    unhandledType: returnType,
  };
}

/**
 * Render a definition that discards every parameter and returns a
 * placeholder of the right type.
 */
export function emitStub(sig: FunctionSignature, options: StubOptions): EmittedStub {
  let text = `${sig.returnType} ${sig.name}(${sig.rawParameterText})\n{\n`;

  for (const p of sig.parameters) {
    text += `  (void) ${p.name};\n`;
  }

  if (options.dependencyTrigger && sig.name.includes(options.dependencyTrigger)) {
    text += `  ${options.dependencyCall}\n`;
  }

  let unhandledType: string | undefined;
  if (sig.returnType !== 'void') {
    const ret = returnLines(sig.returnType, options);
    text += ret.text;
    unhandledType = ret.unhandledType;
  }

  text += '}\n\n';
  return unhandledType ? { text, unhandledType } : { text };
}
