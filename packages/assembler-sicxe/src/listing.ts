import { toHex } from './literals.js';
import type { AssembledRecord, AssemblerDiagnostic, SymbolEntry } from './types.js';

// Directives listed without an address column.
const UNADDRESSED = new Set(['START', 'END', 'BASE', 'NOBASE']);

const DIAGNOSTIC_INDENT = ' '.repeat(7);

export function formatObjectCode(bytes: readonly number[]): string {
  return bytes.map((byte) => toHex(byte & 0xff, 2)).join('');
}

export function formatListingLine(record: AssembledRecord): string {
  const { label, mnemonic, operandText } = record.statement;
  const address = UNADDRESSED.has(mnemonic.toUpperCase()) ? '' : toHex(record.address, 5);
  return `${address.padEnd(7)}${(label ?? '').padEnd(9)}${mnemonic.padEnd(8)}${operandText.padEnd(12)}${formatObjectCode(record.bytes)}`.trimEnd();
}

function formatDiagnostic(diag: AssemblerDiagnostic): string {
  return `${DIAGNOSTIC_INDENT}*** ${diag.numericCode} ${diag.message}`;
}

export function formatListing(records: readonly AssembledRecord[], diagnostics: readonly AssemblerDiagnostic[]): string {
  const lines: string[] = [];
  const listedLines = new Set<number>();

  for (const record of records) {
    lines.push(formatListingLine(record));
    listedLines.add(record.lineNumber);
    for (const diag of diagnostics) {
      if (diag.line === record.lineNumber) {
        lines.push(formatDiagnostic(diag));
      }
    }
  }

  // Fatal diagnostics and errors on lines that never reached pass 2.
  for (const diag of diagnostics) {
    if (!listedLines.has(diag.line)) {
      lines.push(formatDiagnostic(diag));
    }
  }

  return lines.join('\n');
}

export function formatSymbolTable(symbols: readonly SymbolEntry[]): string {
  const sorted = [...symbols].sort((a, b) => {
    if (a.address !== b.address) {
      return a.address - b.address;
    }
    return a.name.localeCompare(b.name);
  });
  return sorted.map((entry) => `${entry.name.padStart(10, ' ')}: ${toHex(entry.address, 5)}`).join('\n');
}
