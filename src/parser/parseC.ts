import type Parser from 'tree-sitter';

import { ParameterParseError } from '../errors.js';
import { getParser } from './loadParser.js';
import { normalizeReturnType } from './parsePrototype.js';
import type { FunctionSignature, Parameter } from './parserTypes.js';

type SyntaxNode = Parser.SyntaxNode;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// Walks pointer/parenthesized declarators down to the innermost one.
function innermost(node: SyntaxNode, stopAt: string): SyntaxNode | null {
  let cur: SyntaxNode | null = node;
  while (cur && cur.type !== stopAt) {
    cur = cur.childForFieldName('declarator');
  }
  return cur;
}

function isStatic(decl: SyntaxNode): boolean {
  return decl.namedChildren.some(
    (c) => c.type === 'storage_class_specifier' && c.text === 'static',
  );
}

function parseParameterList(
  source: string,
  list: SyntaxNode,
  rawParameterText: string,
): Parameter[] {
  const params: Parameter[] = [];
  for (const p of list.namedChildren) {
    if (p.type === 'comment') continue;

    if (p.type === 'variadic_parameter') {
      throw new ParameterParseError('UNSUPPORTED_PARAMETER', p.text, rawParameterText);
    }
    if (p.type !== 'parameter_declaration') {
      throw new ParameterParseError('MALFORMED_PARAMETER', collapse(p.text), rawParameterText);
    }

    const declarator = p.childForFieldName('declarator');
    if (!declarator) {
      if (collapse(p.text) === 'void' && list.namedChildren.length === 1) return [];
      throw new ParameterParseError('MALFORMED_PARAMETER', collapse(p.text), rawParameterText);
    }

    if (innermost(declarator, 'function_declarator') || innermost(declarator, 'array_declarator')) {
      throw new ParameterParseError('UNSUPPORTED_PARAMETER', collapse(p.text), rawParameterText);
    }

    const name = innermost(declarator, 'identifier');
    if (!name) {
      throw new ParameterParseError('MALFORMED_PARAMETER', collapse(p.text), rawParameterText);
    }
    params.push({
      type: collapse(source.slice(p.startIndex, name.startIndex)),
      name: name.text,
    });
  }
  return params;
}

function toSignature(source: string, decl: SyntaxNode): FunctionSignature | null {
  const declarator = decl.childForFieldName('declarator');
  if (!declarator) return null;

  const fn = innermost(declarator, 'function_declarator');
  if (!fn) return null;

  const nameNode = fn.childForFieldName('declarator');
  const list = fn.childForFieldName('parameters');
  if (!nameNode || nameNode.type !== 'identifier' || !list) return null;

  const rawParameterText = source.slice(list.startIndex + 1, list.endIndex - 1);
  return {
    returnType: normalizeReturnType(collapse(source.slice(decl.startIndex, nameNode.startIndex))),
    name: nameNode.text,
    parameters: parseParameterList(source, list, rawParameterText),
    rawParameterText,
  };
}

/**
 * Syntax-tree based alternative to the regex extractor. Handles what the
 * regex pipeline can't (return type on its own line, comments inside the
 * parameter list) and reports the same `FunctionSignature` shape.
 */
export function parseCPrototypes(source: string): FunctionSignature[] {
  const tree = getParser().parse(source);
  const out: FunctionSignature[] = [];

  function visit(node: SyntaxNode) {
    if (node.type === 'declaration') {
      if (isStatic(node)) return;
      const sig = toSignature(source, node);
      if (sig) out.push(sig);
      return;
    }
    // Bodies, typedefs and struct members never hold prototypes we stub.
    if (
      node.type === 'function_definition' ||
      node.type === 'type_definition' ||
      node.type === 'struct_specifier' ||
      node.type === 'enum_specifier'
    ) {
      return;
    }
    for (const child of node.namedChildren) visit(child);
  }

  visit(tree.rootNode);
  return out;
}
