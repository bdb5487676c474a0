import { createAssemblyContext } from './context.js';
import { AssemblerError } from './errors.js';
import { splitSourceLines } from './lexer.js';
import { formatListing, formatSymbolTable } from './listing.js';
import { runPass1 } from './pass1.js';
import { runPass2 } from './pass2.js';
import type { AssembleOptions, AssembleResult, AssembledRecord, SourceAssembleResult, SourceRecord } from './types.js';

/**
 * Assembles already-split statements. Per-line errors are collected and the rest of the
 * program still assembles; a fatal bounds error ends the run with phase `failed` and no records.
 */
export function assembleRecords(records: readonly SourceRecord[], options: AssembleOptions = {}): AssembleResult {
  const ctx = createAssemblyContext(options);
  let output: AssembledRecord[] = [];

  try {
    runPass1(ctx, records);
    output = runPass2(ctx, records);
  } catch (error) {
    if (!(error instanceof AssemblerError)) {
      throw error;
    }
    ctx.reporter.reportFatal(error.line ?? 0, error.code, error.detail);
    ctx.phase = 'failed';
    output = [];
  }

  const diagnostics = ctx.reporter.diagnostics();
  const failed = ctx.phase === 'failed';

  return {
    ok: !failed && diagnostics.length === 0,
    phase: ctx.phase,
    programName: ctx.programName,
    origin: ctx.origin,
    entry: ctx.entry ?? ctx.origin,
    length: failed ? 0 : ctx.programEnd - ctx.origin,
    records: output,
    symbols: ctx.symbols.entries(),
    diagnostics
  };
}

export function assemble(source: string, options: AssembleOptions = {}): SourceAssembleResult {
  const result = assembleRecords(splitSourceLines(source), options);
  return {
    ...result,
    lst: formatListing(result.records, result.diagnostics),
    sym: formatSymbolTable(result.symbols)
  };
}
