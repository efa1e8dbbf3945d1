/**
 * Includes for every source header (in order) followed by the auxiliary
 * code block and a blank line.
 */
export function renderPreamble(headers: string[], extraCode: string): string {
  const includes = headers.map((h) => `#include "${h}"\n`).join('');
  return `${includes}${extraCode}\n`;
}
