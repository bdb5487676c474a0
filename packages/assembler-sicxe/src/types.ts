import type { AssemblerErrorCode, DiagnosticSeverity, NumericErrorCode } from './error-catalog.js';

export type { DiagnosticSeverity } from './error-catalog.js';

export interface AssembleOptions {
  filename?: string;
  // Treat a program without START or END as malformed.
  requireBounds?: boolean;
}

// One statement as handed over by the lexer.
export interface SourceRecord {
  lineNumber: number;
  label?: string;
  mnemonic: string;
  operandText: string;
}

export interface AssemblerDiagnostic {
  severity: DiagnosticSeverity;
  code: AssemblerErrorCode;
  numericCode: NumericErrorCode;
  message: string;
  file: string;
  line: number;
}

export interface SymbolEntry {
  name: string;
  address: number;
  line: number;
}

export interface LineLayout {
  address: number;
  length: number;
  // False when pass 1 could not size the line; pass 2 emits nothing for it.
  sized: boolean;
  // Statements after END.
  ignored: boolean;
}

export type AssemblyPhase = 'idle' | 'pass1-running' | 'pass1-complete' | 'pass2-running' | 'done' | 'failed';

export type AddressingMode = 'immediate' | 'simple' | 'indirect';

export type TargetAddressing = 'pc-relative' | 'base-relative' | 'absolute' | 'extended';

export interface AddressingFlags {
  n: boolean;
  i: boolean;
  x: boolean;
  b: boolean;
  p: boolean;
  e: boolean;
}

export interface AddressingDecision {
  mode: AddressingMode;
  indexed: boolean;
  addressing: TargetAddressing;
  flags: AddressingFlags;
  // Signed displacement, absolute address or immediate constant.
  value: number;
  // `value` as packed into the field (two's complement for negative displacements).
  field: number;
  width: 12 | 20;
}

export interface RegisterOperands {
  r1: number;
  r2: number;
}

export interface AssembledRecord {
  lineNumber: number;
  address: number;
  bytes: number[];
  diagnostics: AssemblerErrorCode[];
  statement: SourceRecord;
}

export interface AssembleResult {
  ok: boolean;
  phase: AssemblyPhase;
  programName?: string;
  origin: number;
  entry: number;
  length: number;
  records: AssembledRecord[];
  symbols: SymbolEntry[];
  diagnostics: AssemblerDiagnostic[];
}

export interface SourceAssembleResult extends AssembleResult {
  lst: string;
  sym: string;
}
