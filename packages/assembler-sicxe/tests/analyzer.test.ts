import { describe, expect, it } from 'vitest';

import {
  analyzeMemoryOperand,
  analyzeRegisterOperands,
  isFailure,
  lookupInstruction,
  parseOperand,
  SymbolTable,
  type AddressingDecision,
  type Format2Spec,
  type Format3Spec,
  type Format4Spec,
  type Outcome
} from '../src/index.js';

interface AnalyzeOptions {
  mnemonic?: string;
  address?: number;
  base?: number;
  symbols?: Record<string, number>;
}

function memorySpec(mnemonic: string): Format3Spec | Format4Spec {
  const spec = lookupInstruction(mnemonic);
  if (isFailure(spec) || (spec.value.kind !== 'format3' && spec.value.kind !== 'format4')) {
    throw new Error(`${mnemonic} is not a memory instruction`);
  }
  return spec.value;
}

function registerSpec(mnemonic: string): Format2Spec {
  const spec = lookupInstruction(mnemonic);
  if (isFailure(spec) || spec.value.kind !== 'format2') {
    throw new Error(`${mnemonic} is not a register instruction`);
  }
  return spec.value;
}

function analyze(operandText: string, options: AnalyzeOptions = {}): Outcome<AddressingDecision> {
  const table = new SymbolTable();
  for (const [name, address] of Object.entries(options.symbols ?? {})) {
    table.define(name, address, 1);
  }
  table.seal();
  return analyzeMemoryOperand({
    spec: memorySpec(options.mnemonic ?? 'LDA'),
    operandText,
    address: options.address ?? 0,
    symbols: table,
    base: options.base
  });
}

function decisionOf(outcome: Outcome<AddressingDecision>): AddressingDecision {
  if (isFailure(outcome)) {
    throw new Error(`unexpected ${outcome.error}: ${outcome.detail ?? ''}`);
  }
  return outcome.value;
}

function errorOf<T>(outcome: Outcome<T>): string | undefined {
  return isFailure(outcome) ? outcome.error : undefined;
}

describe('parseOperand', () => {
  it('detects prefixes and the index suffix', () => {
    expect(parseOperand('#LENGTH')).toEqual({ value: { mode: 'immediate', indexed: false, expression: 'LENGTH' } });
    expect(parseOperand('@RETADR')).toEqual({ value: { mode: 'indirect', indexed: false, expression: 'RETADR' } });
    expect(parseOperand('BUFFER,X')).toEqual({ value: { mode: 'simple', indexed: true, expression: 'BUFFER' } });
  });

  it('rejects indexing combined with immediate or indirect mode', () => {
    expect(errorOf(parseOperand('#BUFFER,X'))).toBe('INDEXED_WITH_IMMEDIATE_OR_INDIRECT');
    expect(errorOf(parseOperand('@BUFFER,X'))).toBe('INDEXED_WITH_IMMEDIATE_OR_INDIRECT');
  });

  it('rejects empty operands', () => {
    expect(errorOf(parseOperand('   '))).toBe('INVALID_OPERAND');
    expect(errorOf(parseOperand('#'))).toBe('INVALID_OPERAND');
  });
});

describe('analyzeMemoryOperand', () => {
  it('prefers pc-relative addressing for nearby targets', () => {
    const decision = decisionOf(analyze('ALPHA', { symbols: { ALPHA: 0x30 } }));
    expect(decision).toEqual({
      mode: 'simple',
      indexed: false,
      addressing: 'pc-relative',
      flags: { n: true, i: true, x: false, b: false, p: true, e: false },
      value: 0x2d,
      field: 0x2d,
      width: 12
    });
  });

  it('packs negative displacements as 12-bit two\'s complement', () => {
    const decision = decisionOf(analyze('LOOP', { address: 0x20, symbols: { LOOP: 0x10 } }));
    expect(decision.value).toBe(-0x13);
    expect(decision.field).toBe(0xfed);
  });

  it('accepts the pc-relative boundaries and nothing beyond them', () => {
    expect(decisionOf(analyze('*+2050')).value).toBe(2047);
    expect(decisionOf(analyze('TARGET', { address: 3000, symbols: { TARGET: 955 } })).value).toBe(-2048);
    expect(errorOf(analyze('*+2051'))).toBe('NO_BASE_DECLARED');
    expect(errorOf(analyze('TARGET', { address: 3000, symbols: { TARGET: 954 } }))).toBe('NO_BASE_DECLARED');
  });

  it('falls back to base-relative addressing when a base is declared', () => {
    const decision = decisionOf(analyze('TABLE,X', { symbols: { TABLE: 0x2051 }, base: 0x2000 }));
    expect(decision.addressing).toBe('base-relative');
    expect(decision.flags).toEqual({ n: true, i: true, x: true, b: true, p: false, e: false });
    expect(decision.field).toBe(0x51);
  });

  it('picks pc-relative when both modes are in range', () => {
    expect(decisionOf(analyze('NEAR', { symbols: { NEAR: 0x10 }, base: 0 })).addressing).toBe('pc-relative');
  });

  it('fails when neither pc-relative nor base-relative fits', () => {
    expect(errorOf(analyze('FAR', { symbols: { FAR: 0x5000 }, base: 0x1000 }))).toBe('ADDRESSING_MODE_UNAVAILABLE');
    expect(errorOf(analyze('BELOW', { address: 0x3000, symbols: { BELOW: 0x10 }, base: 0x2000 }))).toBe(
      'ADDRESSING_MODE_UNAVAILABLE'
    );
  });

  it('places immediate constants directly in the field', () => {
    const decision = decisionOf(analyze('#3'));
    expect(decision.addressing).toBe('absolute');
    expect(decision.flags).toEqual({ n: false, i: true, x: false, b: false, p: false, e: false });
    expect(decision.field).toBe(3);
    expect(errorOf(analyze('#4096'))).toBe('VALUE_OUT_OF_RANGE');
  });

  it('treats plain and indirect numeric operands as addresses', () => {
    const simple = decisionOf(analyze('100'));
    expect(simple.addressing).toBe('pc-relative');
    expect(simple.field).toBe(97);

    const indirect = decisionOf(analyze('@100', { mnemonic: 'J' }));
    expect(indirect.addressing).toBe('pc-relative');
    expect(indirect.flags).toEqual({ n: true, i: false, x: false, b: false, p: true, e: false });

    const based = decisionOf(analyze('5000', { base: 4096 }));
    expect(based.addressing).toBe('base-relative');
    expect(based.field).toBe(904);
    expect(errorOf(analyze('5000'))).toBe('NO_BASE_DECLARED');
  });

  it('addresses immediate symbols pc-relative', () => {
    const decision = decisionOf(analyze('#LENGTH', { symbols: { LENGTH: 0x33 } }));
    expect(decision.addressing).toBe('pc-relative');
    expect(decision.flags.i).toBe(true);
    expect(decision.flags.n).toBe(false);
    expect(decision.value).toBe(0x30);
  });

  it('sets only n for indirect addressing', () => {
    const decision = decisionOf(analyze('@RETADR', { mnemonic: 'J', symbols: { RETADR: 0x30 } }));
    expect(decision.flags).toEqual({ n: true, i: false, x: false, b: false, p: true, e: false });
  });

  it('uses the absolute 20-bit field for format 4', () => {
    const decision = decisionOf(analyze('RDREC', { mnemonic: '+JSUB', address: 0x6, symbols: { RDREC: 0x1036 } }));
    expect(decision).toEqual({
      mode: 'simple',
      indexed: false,
      addressing: 'extended',
      flags: { n: true, i: true, x: false, b: false, p: false, e: true },
      value: 0x1036,
      field: 0x1036,
      width: 20
    });
    expect(decisionOf(analyze('#4096', { mnemonic: '+LDT' })).field).toBe(4096);
    expect(errorOf(analyze('#1048576', { mnemonic: '+LDT' }))).toBe('VALUE_OUT_OF_RANGE');
  });

  it('never produces an indexed decision with immediate or indirect flags', () => {
    expect(errorOf(analyze('#TABLE,X', { symbols: { TABLE: 3 } }))).toBe('INDEXED_WITH_IMMEDIATE_OR_INDIRECT');
    expect(errorOf(analyze('@TABLE,X', { mnemonic: '+LDA', symbols: { TABLE: 3 } }))).toBe(
      'INDEXED_WITH_IMMEDIATE_OR_INDIRECT'
    );
  });

  it('reports undefined symbols', () => {
    expect(analyze('MISSING')).toEqual({ error: 'UNDEFINED_SYMBOL', detail: 'MISSING' });
  });

  it('encodes RSUB without an operand and rejects one', () => {
    const decision = decisionOf(analyze('', { mnemonic: 'RSUB' }));
    expect(decision.flags).toEqual({ n: true, i: true, x: false, b: false, p: false, e: false });
    expect(decision.field).toBe(0);
    expect(errorOf(analyze('ALPHA', { mnemonic: 'RSUB', symbols: { ALPHA: 0 } }))).toBe('INVALID_OPERAND');
  });
});

describe('analyzeRegisterOperands', () => {
  it('reads register pairs by name or number', () => {
    expect(analyzeRegisterOperands(registerSpec('RMO'), 'A,S')).toEqual({ value: { r1: 0, r2: 4 } });
    expect(analyzeRegisterOperands(registerSpec('ADDR'), '3,15')).toEqual({ value: { r1: 3, r2: 15 } });
    expect(analyzeRegisterOperands(registerSpec('CLEAR'), 'X')).toEqual({ value: { r1: 1, r2: 0 } });
  });

  it('rejects registers outside 0..15', () => {
    expect(errorOf(analyzeRegisterOperands(registerSpec('RMO'), '16,A'))).toBe('REGISTER_OUT_OF_RANGE');
    expect(errorOf(analyzeRegisterOperands(registerSpec('COMPR'), 'A,-1'))).toBe('REGISTER_OUT_OF_RANGE');
    expect(errorOf(analyzeRegisterOperands(registerSpec('TIXR'), '20'))).toBe('REGISTER_OUT_OF_RANGE');
  });

  it('encodes shift counts as n - 1 with the asymmetric bounds', () => {
    expect(analyzeRegisterOperands(registerSpec('SHIFTL'), 'T,4')).toEqual({ value: { r1: 5, r2: 3 } });
    expect(analyzeRegisterOperands(registerSpec('SHIFTR'), '0,16')).toEqual({ value: { r1: 0, r2: 15 } });
    expect(errorOf(analyzeRegisterOperands(registerSpec('SHIFTL'), 'A,0'))).toBe('OPERAND_OUT_OF_RANGE');
    expect(errorOf(analyzeRegisterOperands(registerSpec('SHIFTL'), 'A,17'))).toBe('OPERAND_OUT_OF_RANGE');
    expect(errorOf(analyzeRegisterOperands(registerSpec('SHIFTL'), '16,1'))).toBe('OPERAND_OUT_OF_RANGE');
  });

  it('checks the SVC interrupt number', () => {
    expect(analyzeRegisterOperands(registerSpec('SVC'), '15')).toEqual({ value: { r1: 15, r2: 0 } });
    expect(analyzeRegisterOperands(registerSpec('SVC'), '0')).toEqual({ value: { r1: 0, r2: 0 } });
    expect(errorOf(analyzeRegisterOperands(registerSpec('SVC'), '16'))).toBe('SVC_OPERAND_OUT_OF_RANGE');
    expect(errorOf(analyzeRegisterOperands(registerSpec('SVC'), 'A'))).toBe('INVALID_OPERAND');
  });

  it('rejects unknown registers and wrong operand counts', () => {
    expect(analyzeRegisterOperands(registerSpec('COMPR'), 'A,Q')).toEqual({
      error: 'INVALID_OPERAND',
      detail: 'unknown register Q'
    });
    expect(errorOf(analyzeRegisterOperands(registerSpec('RMO'), 'A'))).toBe('INVALID_OPERAND');
    expect(errorOf(analyzeRegisterOperands(registerSpec('CLEAR'), ''))).toBe('INVALID_OPERAND');
  });
});
