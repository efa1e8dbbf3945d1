import { describe, it, expect } from 'vitest';

import { ParameterParseError } from '../errors.js';
import { parseParameters } from './parseParameters.js';
import { parsePrototype } from './parsePrototype.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('parseParameters', () => {
  it('treats a lone void as no parameters', () => {
    expect(parseParameters('void')).toEqual([]);
    expect(parseParameters(' void ')).toEqual([]);
  });

  it('returns nothing for an empty list', () => {
    expect(parseParameters('')).toEqual([]);
  });

  it('splits type and name at the last space', () => {
    expect(parseParameters('int a, char *b')).toEqual([
      { type: 'int', name: 'a' },
      { type: 'char *', name: 'b' },
    ]);
    expect(parseParameters('const acc_config_t *config, uint16_t   rate')).toEqual([
      { type: 'const acc_config_t *', name: 'config' },
      { type: 'uint16_t', name: 'rate' },
    ]);
  });

  it('throws on a type without a name', () => {
    const err = thrown(() => parseParameters('int'));
    expect(err).toBeInstanceOf(ParameterParseError);
    expect(err).toMatchObject({
      code: 'MALFORMED_PARAMETER',
      fragment: 'int',
      parameterList: 'int',
      message: 'Couldn\'t parse parameter "int" in parameter list "int"',
    });
  });

  it('splits glued and multi-level pointers after the last star', () => {
    expect(parseParameters('char*b, char **argv, const char * const *names')).toEqual([
      { type: 'char*', name: 'b' },
      { type: 'char **', name: 'argv' },
      { type: 'const char * const *', name: 'names' },
    ]);
  });

  it('flags function pointers, varargs and arrays as unsupported', () => {
    for (const list of ['void (*cb)(int)', 'const char *fmt, ...', 'uint16_t data[4]']) {
      expect(thrown(() => parseParameters(list))).toMatchObject({
        code: 'UNSUPPORTED_PARAMETER',
      });
    }
  });
});

describe('parsePrototype', () => {
  it('decomposes a prototype', () => {
    expect(parsePrototype('int foo(int a, char *b)')).toEqual({
      returnType: 'int',
      name: 'foo',
      parameters: [
        { type: 'int', name: 'a' },
        { type: 'char *', name: 'b' },
      ],
      rawParameterText: 'int a, char *b',
    });
  });

  it('keeps multi-word and pointer return types', () => {
    expect(parsePrototype('unsigned char *read_bytes(void)')).toMatchObject({
      returnType: 'unsigned char *',
      name: 'read_bytes',
      parameters: [],
      rawParameterText: 'void',
    });
    expect(parsePrototype('char* dup_name(void)')?.returnType).toBe('char*');
  });

  it('accepts double pointer returns and a space before the parameter list', () => {
    expect(parsePrototype('char **names_get(void)')).toEqual({
      returnType: 'char **',
      name: 'names_get',
      parameters: [],
      rawParameterText: 'void',
    });
    expect(parsePrototype('int foo (int a)')).toEqual({
      returnType: 'int',
      name: 'foo',
      parameters: [{ type: 'int', name: 'a' }],
      rawParameterText: 'int a',
    });
  });

  it('drops a leading extern from the return type', () => {
    expect(parsePrototype('extern void g(int a)')?.returnType).toBe('void');
    expect(parsePrototype('  extern const char *name_get(void)')?.returnType).toBe('const char *');
  });

  it('does not mistake a function pointer variable for a prototype', () => {
    expect(parsePrototype('  void (*handler)(int)')).toBeNull();
  });

  it('trims leading whitespace off the return type', () => {
    expect(parsePrototype('   float get_temp(void)')?.returnType).toBe('float');
  });

  it('skips static and typedef statements', () => {
    expect(parsePrototype('static int helper(int x)')).toBeNull();
    expect(parsePrototype('  typedef int (*cb_t)(int x)')).toBeNull();
    expect(parsePrototype('typedef struct  ##CODE_SECTION##  t')).toBeNull();
  });

  it('returns null for anything not shaped like a prototype', () => {
    expect(parsePrototype('uint32_t counter')).toBeNull();
    expect(parsePrototype('struct acc_handle')).toBeNull();
    expect(parsePrototype('')).toBeNull();
    expect(parsePrototype('   ')).toBeNull();
  });

  it('propagates a broken parameter list', () => {
    expect(() => parsePrototype('int broken(int)')).toThrowError(ParameterParseError);
  });
});
