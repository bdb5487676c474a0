import { getErrorCatalogEntry, type AssemblerErrorCode } from './error-catalog.js';
import { formatErrorMessage } from './errors.js';
import type { AssemblerDiagnostic } from './types.js';

export class ErrorReporter {
  private readonly entries: AssemblerDiagnostic[] = [];

  constructor(private readonly file: string) {}

  report(line: number, code: AssemblerErrorCode, detail?: string): void {
    const entry = getErrorCatalogEntry(code);
    this.entries.push({
      severity: entry.severity,
      code,
      numericCode: entry.numericCode,
      message: formatErrorMessage(code, detail),
      file: this.file,
      line
    });
  }

  // Fatal conditions are always reported as severity `fatal`, whatever the code.
  reportFatal(line: number, code: AssemblerErrorCode, detail?: string): void {
    const entry = getErrorCatalogEntry(code);
    this.entries.push({
      severity: 'fatal',
      code,
      numericCode: entry.numericCode,
      message: formatErrorMessage(code, detail),
      file: this.file,
      line
    });
  }

  codesForLine(line: number): AssemblerErrorCode[] {
    return this.entries.filter((diag) => diag.line === line).map((diag) => diag.code);
  }

  diagnostics(): AssemblerDiagnostic[] {
    return [...this.entries];
  }

  hasErrors(): boolean {
    return this.entries.length > 0;
  }
}
