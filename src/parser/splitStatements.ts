/**
 * Flatten sanitized text onto one line and cut it at every `;`.
 *
 * The fragment after the final `;` is kept (usually empty or whitespace);
 * the prototype parser treats it as a non-match.
 */
export function splitStatements(sanitized: string): string[] {
  return sanitized.replace(/[\r\n]/g, '').split(';');
}
