/** Token left in place of every collapsed `{ ... }` block. */
export const CODE_SECTION_PLACEHOLDER = '##CODE_SECTION##';

// Line comment, block comment, char literal, string literal. Whichever starts
// first wins, so a `//` inside a string is consumed as part of the string.
const COMMENT_OR_LITERAL =
  /\/\/.*?$|\/\*.*?\*\/|'(?:\\.|[^\\'])*'|"(?:\\.|[^\\"])*"/gms;

const PREPROCESSOR_LINE = /^\s*#.*?$/gm;

// Innermost block first: no `{` between the braces.
const INNERMOST_BLOCK = /\{[^{]*?\}/g;

function newlinesOnly(s: string): string {
  return '\n'.repeat(s.split('\n').length - 1);
}

/**
 * Replace comments with their newlines; leave string and char literals as-is.
 */
export function blankComments(raw: string): string {
  return raw.replace(COMMENT_OR_LITERAL, (match) =>
    match.startsWith('/') ? newlinesOnly(match) : match,
  );
}

export function stripPreprocessor(text: string): string {
  return text.replace(PREPROCESSOR_LINE, '\n');
}

export function collapseBlocks(text: string): string {
  let out = text;
  for (;;) {
    const next = out.replace(INNERMOST_BLOCK, ` ${CODE_SECTION_PLACEHOLDER} `);
    if (next === out) return out;
    out = next;
  }
}

/**
 * Reduce raw header text to statement-like residue: comments blanked,
 * preprocessor lines emptied, braced bodies collapsed outward-in.
 *
 * This is a tolerant pass over a consistent header dialect, not a C lexer.
 * An unbalanced `{` survives and the statement around it simply won't parse.
 * Braces inside string or char literals are collapsed like any other brace.
 */
export function sanitize(raw: string): string {
  return collapseBlocks(stripPreprocessor(blankComments(raw)));
}
