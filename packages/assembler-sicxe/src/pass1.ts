import { transition, type AssemblyContext } from './context.js';
import { AssemblerError, isFailure, type Outcome } from './errors.js';
import { instructionLength, lookupInstruction, WORD_SIZE, type InstructionSpec } from './instruction-table.js';
import { decodeByteLiteral, parseHexAddress, parseReserveCount } from './literals.js';
import { MAX_ADDRESS } from './location-counter.js';
import type { SourceRecord } from './types.js';

/**
 * Number of bytes a statement occupies. Depends only on the mnemonic and the operand syntax,
 * so both passes arrive at the same value.
 */
export function sizeStatement(spec: InstructionSpec, record: SourceRecord): Outcome<number> {
  if (spec.kind !== 'directive') {
    return { value: instructionLength(spec) };
  }

  switch (spec.directive) {
    case 'START':
    case 'END':
    case 'BASE':
    case 'NOBASE':
      return { value: 0 };
    case 'RESB':
      return parseReserveCount(record.operandText);
    case 'RESW': {
      const count = parseReserveCount(record.operandText);
      if (isFailure(count)) {
        return count;
      }
      return { value: count.value * WORD_SIZE };
    }
    case 'BYTE': {
      const bytes = decodeByteLiteral(record.operandText);
      if (isFailure(bytes)) {
        return bytes;
      }
      return { value: bytes.value.length };
    }
    case 'WORD':
      return { value: WORD_SIZE };
  }
}

function applyStart(ctx: AssemblyContext, record: SourceRecord, statementsSeen: number, sawStart: boolean): void {
  if (sawStart) {
    throw new AssemblerError('PROGRAM_BOUNDS', 'START appears more than once', record.lineNumber);
  }
  if (statementsSeen > 0) {
    throw new AssemblerError('PROGRAM_BOUNDS', 'START must be the first statement', record.lineNumber);
  }
  const operand = record.operandText.trim();
  const origin = operand.length === 0 ? 0 : parseHexAddress(operand);
  if (origin === undefined || origin > MAX_ADDRESS) {
    throw new AssemblerError('PROGRAM_BOUNDS', `invalid START address ${operand}`, record.lineNumber);
  }
  ctx.location.reset(origin);
  ctx.origin = origin;
  ctx.programName = record.label;
}

/**
 * Pass 1: assigns an address to every statement, defines labels and sizes each line.
 * Throws AssemblerError only for malformed program bounds.
 */
export function runPass1(ctx: AssemblyContext, records: readonly SourceRecord[]): void {
  transition(ctx, 'idle', 'pass1-running');

  let statementsSeen = 0;
  let sawStart = false;
  let ended = false;

  for (const record of records) {
    if (ended) {
      ctx.layouts.push({ address: ctx.location.current, length: 0, sized: false, ignored: true });
      continue;
    }

    const lookup = lookupInstruction(record.mnemonic);
    if (!isFailure(lookup) && lookup.value.kind === 'directive' && lookup.value.directive === 'START') {
      applyStart(ctx, record, statementsSeen, sawStart);
      sawStart = true;
    }
    statementsSeen += 1;

    const address = ctx.location.current;
    if (record.label !== undefined && record.label.length > 0) {
      const defined = ctx.symbols.define(record.label, address, record.lineNumber);
      if (isFailure(defined)) {
        ctx.reporter.report(record.lineNumber, defined.error, defined.detail);
      }
    }

    if (isFailure(lookup)) {
      ctx.reporter.report(record.lineNumber, lookup.error, lookup.detail);
      ctx.layouts.push({ address, length: 0, sized: false, ignored: false });
      continue;
    }

    const size = sizeStatement(lookup.value, record);
    if (isFailure(size)) {
      ctx.reporter.report(record.lineNumber, size.error, size.detail);
      ctx.layouts.push({ address, length: 0, sized: false, ignored: false });
      continue;
    }

    ctx.layouts.push({ address, length: size.value, sized: true, ignored: false });
    ctx.location.advance(size.value, record.lineNumber);

    if (lookup.value.kind === 'directive' && lookup.value.directive === 'END') {
      ended = true;
    }
  }

  if (ctx.options.requireBounds) {
    if (!sawStart) {
      throw new AssemblerError('PROGRAM_BOUNDS', 'missing START', records[0]?.lineNumber ?? 0);
    }
    if (!ended) {
      throw new AssemblerError('PROGRAM_BOUNDS', 'missing END', records[records.length - 1]?.lineNumber ?? 0);
    }
  }

  ctx.programEnd = ctx.location.current;
  ctx.symbols.seal();
  transition(ctx, 'pass1-running', 'pass1-complete');
}
