// Error codes reported by the assembler, one per detected condition.
export type AssemblerErrorCode =
  | 'UNKNOWN_MNEMONIC'
  | 'INVALID_OPERAND'
  | 'INVALID_RESERVE_OPERAND'
  | 'SVC_OPERAND_OUT_OF_RANGE'
  | 'REGISTER_OUT_OF_RANGE'
  | 'OPERAND_OUT_OF_RANGE'
  | 'NO_BASE_DECLARED'
  | 'ADDRESSING_MODE_UNAVAILABLE'
  | 'INDEXED_WITH_IMMEDIATE_OR_INDIRECT'
  | 'DUPLICATE_SYMBOL'
  | 'UNDEFINED_SYMBOL'
  | 'VALUE_OUT_OF_RANGE'
  | 'PROGRAM_BOUNDS';

export type NumericErrorCode = `E${string}`;

export type DiagnosticSeverity = 'error' | 'fatal';

export interface ErrorCatalogEntry {
  code: AssemblerErrorCode;
  numericCode: NumericErrorCode;
  message: string;
  severity: DiagnosticSeverity;
}

export interface UnknownErrorCatalogEntry {
  numericCode: NumericErrorCode;
  message: string;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { code: 'UNKNOWN_MNEMONIC', numericCode: 'E01', message: 'Unknown mnemonic', severity: 'error' },
  { code: 'INVALID_OPERAND', numericCode: 'E02', message: 'Invalid operand', severity: 'error' },
  {
    code: 'INVALID_RESERVE_OPERAND',
    numericCode: 'E03',
    message: 'RESB/RESW do not support character operands',
    severity: 'error'
  },
  {
    code: 'SVC_OPERAND_OUT_OF_RANGE',
    numericCode: 'E04',
    message: 'SVC operand n must be of format 0 <= n < 16',
    severity: 'error'
  },
  {
    code: 'REGISTER_OUT_OF_RANGE',
    numericCode: 'E05',
    message: 'Operands r1,r2 must be of format 0 <= r1,r2 < 16',
    severity: 'error'
  },
  {
    code: 'OPERAND_OUT_OF_RANGE',
    numericCode: 'E06',
    message: 'Operand n must be of format 0 < n < 17 and operand r must be of format 0 <= r < 16',
    severity: 'error'
  },
  {
    code: 'NO_BASE_DECLARED',
    numericCode: 'E07',
    message: 'No BASE declared for base relative addressing',
    severity: 'error'
  },
  {
    code: 'ADDRESSING_MODE_UNAVAILABLE',
    numericCode: 'E08',
    message: 'Cannot use PC or Base relative addressing',
    severity: 'error'
  },
  {
    code: 'INDEXED_WITH_IMMEDIATE_OR_INDIRECT',
    numericCode: 'E09',
    message: 'Indexed addressing is used with Immediate or Indirect addressing',
    severity: 'error'
  },
  { code: 'DUPLICATE_SYMBOL', numericCode: 'E10', message: 'Duplicate symbol', severity: 'error' },
  { code: 'UNDEFINED_SYMBOL', numericCode: 'E11', message: 'Undefined symbol', severity: 'error' },
  { code: 'VALUE_OUT_OF_RANGE', numericCode: 'E12', message: 'Value out of range', severity: 'error' },

  { code: 'PROGRAM_BOUNDS', numericCode: 'E90', message: 'Malformed program bounds', severity: 'fatal' }
];

const UNKNOWN_ENTRY: UnknownErrorCatalogEntry = { numericCode: 'E99', message: 'UNKNOWN' };

const BY_CODE = new Map<AssemblerErrorCode, ErrorCatalogEntry>(ERROR_CATALOG.map((entry) => [entry.code, entry]));

export function getErrorCatalogEntry(code: AssemblerErrorCode): ErrorCatalogEntry {
  const entry = BY_CODE.get(code);
  if (entry) {
    return entry;
  }
  return { code, numericCode: UNKNOWN_ENTRY.numericCode, message: code, severity: 'error' };
}

export function getUnknownErrorCatalogEntry(): UnknownErrorCatalogEntry {
  return UNKNOWN_ENTRY;
}
