import Parser from 'tree-sitter';
import C from 'tree-sitter-c';

let shared: Parser | null = null;

export function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(C);
  return parser;
}

/** One parser per process; grammar loading isn't free. */
export function getParser(): Parser {
  shared ??= createParser();
  return shared;
}
