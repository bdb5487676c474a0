import { analyzeMemoryOperand, analyzeRegisterOperands } from './analyzer.js';
import { transition, type AssemblyContext } from './context.js';
import { encodeFormat1, encodeFormat2, encodeFormat3, encodeFormat4, encodeWord } from './encoder.js';
import { AssemblyStateError, fail, isFailure, type Outcome } from './errors.js';
import { evaluateExpression, type ExpressionValue } from './expression.js';
import { lookupInstruction, WORD_SIZE, type DirectiveName } from './instruction-table.js';
import { decodeByteLiteral, literalKind, toHex } from './literals.js';
import type { AssembledRecord, LineLayout, SourceRecord } from './types.js';

const WORD_MIN = -0x800000;
const WORD_MAX = 0xffffff;

function evaluateOperand(ctx: AssemblyContext, text: string, address: number): Outcome<ExpressionValue> {
  if (text.trim().length === 0) {
    return fail('INVALID_OPERAND', 'missing operand');
  }
  return evaluateExpression(text.trim(), {
    resolveSymbol: (name) => ctx.symbols.resolve(name),
    currentAddress: address
  });
}

// X'..' and C'..' words are right-justified in three bytes.
function wordFromLiteral(text: string): Outcome<number[]> {
  const bytes = decodeByteLiteral(text);
  if (isFailure(bytes)) {
    return bytes;
  }
  if (bytes.value.length > WORD_SIZE) {
    return fail('VALUE_OUT_OF_RANGE', `WORD literal ${text.trim()} is longer than ${WORD_SIZE} bytes`);
  }
  return { value: [...new Array<number>(WORD_SIZE - bytes.value.length).fill(0), ...bytes.value] };
}

function applyDirective(
  ctx: AssemblyContext,
  directive: DirectiveName,
  record: SourceRecord,
  layout: LineLayout
): Outcome<number[]> {
  switch (directive) {
    case 'START':
    case 'RESB':
    case 'RESW':
      return { value: [] };
    case 'END': {
      if (record.operandText.trim().length === 0) {
        return { value: [] };
      }
      const entry = evaluateOperand(ctx, record.operandText, layout.address);
      if (isFailure(entry)) {
        return entry;
      }
      ctx.entry = entry.value.value;
      return { value: [] };
    }
    case 'BASE': {
      const base = evaluateOperand(ctx, record.operandText, layout.address);
      if (isFailure(base)) {
        return base;
      }
      ctx.base = base.value.value;
      return { value: [] };
    }
    case 'NOBASE':
      ctx.base = undefined;
      return { value: [] };
    case 'BYTE':
      return decodeByteLiteral(record.operandText);
    case 'WORD': {
      const kind = literalKind(record.operandText);
      if (kind === 'character' || kind === 'hex') {
        return wordFromLiteral(record.operandText);
      }
      const word = evaluateOperand(ctx, record.operandText, layout.address);
      if (isFailure(word)) {
        return word;
      }
      if (word.value.value < WORD_MIN || word.value.value > WORD_MAX) {
        return fail('VALUE_OUT_OF_RANGE', `WORD constant ${word.value.value} does not fit 24 bits`);
      }
      return { value: encodeWord(word.value.value) };
    }
  }
}

export function encodeStatement(ctx: AssemblyContext, record: SourceRecord, layout: LineLayout): Outcome<number[]> {
  const lookup = lookupInstruction(record.mnemonic);
  if (isFailure(lookup)) {
    throw new AssemblyStateError(`line ${record.lineNumber}: ${record.mnemonic} was sized in pass 1 but is unknown in pass 2`);
  }
  const spec = lookup.value;

  switch (spec.kind) {
    case 'format1':
      if (record.operandText.trim().length > 0) {
        return fail('INVALID_OPERAND', `${spec.mnemonic} takes no operand`);
      }
      return { value: encodeFormat1(spec) };
    case 'format2': {
      const registers = analyzeRegisterOperands(spec, record.operandText);
      if (isFailure(registers)) {
        return registers;
      }
      return { value: encodeFormat2(spec, registers.value) };
    }
    case 'format3':
    case 'format4': {
      const decision = analyzeMemoryOperand({
        spec,
        operandText: record.operandText,
        address: layout.address,
        symbols: ctx.symbols,
        base: ctx.base
      });
      if (isFailure(decision)) {
        return decision;
      }
      return { value: spec.kind === 'format3' ? encodeFormat3(spec, decision.value) : encodeFormat4(spec, decision.value) };
    }
    case 'directive':
      return applyDirective(ctx, spec.directive, record, layout);
  }
}

/**
 * Pass 2: walks the records again from the origin, encoding every sized statement against the
 * completed symbol table. A failing line is reported and left without bytes.
 */
export function runPass2(ctx: AssemblyContext, records: readonly SourceRecord[]): AssembledRecord[] {
  transition(ctx, 'pass1-complete', 'pass2-running');
  if (records.length !== ctx.layouts.length) {
    throw new AssemblyStateError(`pass 2 received ${records.length} records, pass 1 laid out ${ctx.layouts.length}`);
  }

  ctx.location.reset(ctx.origin);
  ctx.base = undefined;

  const output: AssembledRecord[] = [];
  for (let index = 0; index < records.length; index += 1) {
    const record = records[index];
    const layout = ctx.layouts[index];
    if (!record || !layout) {
      throw new AssemblyStateError(`missing record or layout at index ${index}`);
    }
    if (layout.ignored) {
      continue;
    }
    if (ctx.location.current !== layout.address) {
      throw new AssemblyStateError(
        `line ${record.lineNumber}: pass 2 address ${toHex(ctx.location.current, 5)} differs from pass 1 address ${toHex(layout.address, 5)}`
      );
    }

    let bytes: number[] = [];
    if (layout.sized) {
      const encoded = encodeStatement(ctx, record, layout);
      if (isFailure(encoded)) {
        ctx.reporter.report(record.lineNumber, encoded.error, encoded.detail);
      } else {
        bytes = encoded.value;
      }
    }
    if (bytes.length > 0 && bytes.length !== layout.length) {
      throw new AssemblyStateError(`line ${record.lineNumber}: encoded ${bytes.length} bytes, pass 1 reserved ${layout.length}`);
    }

    output.push({
      lineNumber: record.lineNumber,
      address: layout.address,
      bytes,
      diagnostics: ctx.reporter.codesForLine(record.lineNumber),
      statement: record
    });
    ctx.location.advance(layout.length, record.lineNumber);
  }

  ctx.entry ??= ctx.origin;
  transition(ctx, 'pass2-running', 'done');
  return output;
}
