import { fail, isFailure, type Outcome } from './errors.js';
import { evaluateExpression } from './expression.js';
import { lookupRegister, type Format2Spec, type Format3Spec, type Format4Spec } from './instruction-table.js';
import { toHex } from './literals.js';
import { MAX_ADDRESS } from './location-counter.js';
import type { ReadonlySymbolTable } from './symbol-table.js';
import type { AddressingDecision, AddressingFlags, AddressingMode, RegisterOperands } from './types.js';

export const PC_RELATIVE_MIN = -2048;
export const PC_RELATIVE_MAX = 2047;
export const BASE_RELATIVE_MAX = 4095;

export interface ParsedOperand {
  mode: AddressingMode;
  indexed: boolean;
  expression: string;
}

export interface MemoryOperandContext {
  spec: Format3Spec | Format4Spec;
  operandText: string;
  // Address of the instruction itself; pc-relative offsets are taken from the next one.
  address: number;
  symbols: ReadonlySymbolTable;
  base: number | undefined;
}

const INDEX_SUFFIX = /,\s*X$/;

export function parseOperand(text: string): Outcome<ParsedOperand> {
  let body = text.trim();
  if (body.length === 0) {
    return fail('INVALID_OPERAND', 'missing operand');
  }

  let mode: AddressingMode = 'simple';
  if (body.startsWith('#')) {
    mode = 'immediate';
    body = body.slice(1);
  } else if (body.startsWith('@')) {
    mode = 'indirect';
    body = body.slice(1);
  }

  const indexed = INDEX_SUFFIX.test(body);
  if (indexed) {
    body = body.replace(INDEX_SUFFIX, '');
  }

  if (indexed && mode !== 'simple') {
    return fail('INDEXED_WITH_IMMEDIATE_OR_INDIRECT', text.trim());
  }

  const expression = body.trim();
  if (expression.length === 0) {
    return fail('INVALID_OPERAND', text.trim());
  }

  return { value: { mode, indexed, expression } };
}

function modeFlags(mode: AddressingMode, indexed: boolean, extended: boolean): AddressingFlags {
  return {
    n: mode !== 'immediate',
    i: mode !== 'indirect',
    x: indexed,
    b: false,
    p: false,
    e: extended
  };
}

export function analyzeMemoryOperand(ctx: MemoryOperandContext): Outcome<AddressingDecision> {
  const extended = ctx.spec.kind === 'format4';

  if (ctx.spec.operands === 'none') {
    if (ctx.operandText.trim().length > 0) {
      return fail('INVALID_OPERAND', `${ctx.spec.mnemonic} takes no operand`);
    }
    return {
      value: {
        mode: 'simple',
        indexed: false,
        addressing: extended ? 'extended' : 'absolute',
        flags: modeFlags('simple', false, extended),
        value: 0,
        field: 0,
        width: extended ? 20 : 12
      }
    };
  }

  const parsed = parseOperand(ctx.operandText);
  if (isFailure(parsed)) {
    return parsed;
  }
  const { mode, indexed, expression } = parsed.value;

  const evaluated = evaluateExpression(expression, {
    resolveSymbol: (name) => ctx.symbols.resolve(name),
    currentAddress: ctx.address
  });
  if (isFailure(evaluated)) {
    return evaluated;
  }
  const target = evaluated.value.value;
  const flags = modeFlags(mode, indexed, extended);

  if (extended) {
    if (target < 0 || target > MAX_ADDRESS) {
      return fail('VALUE_OUT_OF_RANGE', `${expression} does not fit 20 bits`);
    }
    return { value: { mode, indexed, addressing: 'extended', flags, value: target, field: target, width: 20 } };
  }

  // Only `#constant` bypasses the relative cascade; `LDA 100` and `@100` are addresses.
  if (mode === 'immediate' && evaluated.value.relativeTerms === 0) {
    if (target < 0 || target > BASE_RELATIVE_MAX) {
      return fail('VALUE_OUT_OF_RANGE', `${expression} does not fit 12 bits`);
    }
    return { value: { mode, indexed, addressing: 'absolute', flags, value: target, field: target, width: 12 } };
  }

  const pcDisplacement = target - (ctx.address + 3);
  if (pcDisplacement >= PC_RELATIVE_MIN && pcDisplacement <= PC_RELATIVE_MAX) {
    return {
      value: {
        mode,
        indexed,
        addressing: 'pc-relative',
        flags: { ...flags, p: true },
        value: pcDisplacement,
        field: pcDisplacement & 0xfff,
        width: 12
      }
    };
  }

  if (ctx.base === undefined) {
    return fail('NO_BASE_DECLARED', `target ${toHex(target, 5)} is out of PC relative range`);
  }

  const baseDisplacement = target - ctx.base;
  if (baseDisplacement >= 0 && baseDisplacement <= BASE_RELATIVE_MAX) {
    return {
      value: {
        mode,
        indexed,
        addressing: 'base-relative',
        flags: { ...flags, b: true },
        value: baseDisplacement,
        field: baseDisplacement,
        width: 12
      }
    };
  }

  return fail('ADDRESSING_MODE_UNAVAILABLE', `target ${toHex(target, 5)}, base ${toHex(ctx.base, 5)}`);
}

function parseInteger(text: string): number | undefined {
  const trimmed = text.trim();
  if (!/^-?[0-9]+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

function parseRegister(text: string): Outcome<number> {
  const named = lookupRegister(text);
  if (named !== undefined) {
    return { value: named };
  }
  const numeric = parseInteger(text);
  if (numeric !== undefined) {
    return { value: numeric };
  }
  return fail('INVALID_OPERAND', `unknown register ${text.trim()}`);
}

function isNibble(value: number): boolean {
  return value >= 0 && value < 16;
}

export function analyzeRegisterOperands(spec: Format2Spec, operandText: string): Outcome<RegisterOperands> {
  const parts = operandText.trim().length > 0 ? operandText.split(',').map((part) => part.trim()) : [];
  const expected = spec.operands === 'rr' || spec.operands === 'rn' ? 2 : 1;
  if (parts.length !== expected) {
    return fail('INVALID_OPERAND', `${spec.mnemonic} expects ${expected} operand(s)`);
  }
  const first = parts[0] ?? '';
  const second = parts[1] ?? '';

  switch (spec.operands) {
    case 'n': {
      const n = parseInteger(first);
      if (n === undefined) {
        return fail('INVALID_OPERAND', `${spec.mnemonic} requires a numeric operand`);
      }
      if (!isNibble(n)) {
        return fail('SVC_OPERAND_OUT_OF_RANGE', `${n}`);
      }
      return { value: { r1: n, r2: 0 } };
    }
    case 'r': {
      const r = parseRegister(first);
      if (isFailure(r)) {
        return r;
      }
      if (!isNibble(r.value)) {
        return fail('REGISTER_OUT_OF_RANGE', `${r.value}`);
      }
      return { value: { r1: r.value, r2: 0 } };
    }
    case 'rr': {
      const r1 = parseRegister(first);
      if (isFailure(r1)) {
        return r1;
      }
      const r2 = parseRegister(second);
      if (isFailure(r2)) {
        return r2;
      }
      if (!isNibble(r1.value) || !isNibble(r2.value)) {
        return fail('REGISTER_OUT_OF_RANGE', `${r1.value},${r2.value}`);
      }
      return { value: { r1: r1.value, r2: r2.value } };
    }
    case 'rn': {
      const r = parseRegister(first);
      if (isFailure(r)) {
        return r;
      }
      const n = parseInteger(second);
      if (n === undefined) {
        return fail('INVALID_OPERAND', `${spec.mnemonic} requires a numeric shift count`);
      }
      if (!(n > 0 && n < 17 && isNibble(r.value))) {
        return fail('OPERAND_OUT_OF_RANGE', `${r.value},${n}`);
      }
      // The hardware field holds n - 1.
      return { value: { r1: r.value, r2: n - 1 } };
    }
  }
}
