export type CompilerDiagnostic = {
  file?: string;
  line?: number;
  col?: number;
  severity: 'error' | 'warning' | 'note';
  message: string;
  raw: string;
};

function isSeverity(s: string): s is CompilerDiagnostic['severity'] {
  return s === 'error' || s === 'warning' || s === 'note';
}

/**
 * gcc/clang: `path:line:col: error: message`, or without a column for some
 * driver/linker messages.
 */
export function parseDiagnostics(text: string): CompilerDiagnostic[] {
  const out: CompilerDiagnostic[] = [];
  const withCol = /^(.*?):(\d+):(\d+):\s*(warning|error|note):\s*(.*)$/;
  const bare = /^(?:.*?:\s*)?(warning|error|note):\s*(.*)$/;

  for (const l of text.split(/\r?\n/)) {
    const m = l.match(withCol);
    if (m) {
      const severity = m[4];
      if (isSeverity(severity)) {
        out.push({
          file: m[1],
          line: Number(m[2]),
          col: Number(m[3]),
          severity,
          message: m[5],
          raw: l,
        });
      }
      continue;
    }

    const m2 = l.match(bare);
    const severity = m2?.[1];
    if (m2 && severity !== undefined && isSeverity(severity)) {
      out.push({ severity, message: m2[2], raw: l });
    }
  }

  return out;
}

export function formatDiagnostics(diags: CompilerDiagnostic[]): string {
  const lines: string[] = [];
  for (const d of diags) {
    const loc = d.file && d.line != null ? `${d.file}:${d.line}:${d.col ?? 0}` : d.file ?? '';
    const head = loc ? `${loc} - ${d.severity}` : d.severity;
    const msg = d.message ? `: ${d.message}` : '';
    lines.push(`${head}${msg}`);
  }
  return lines.join('\n');
}
