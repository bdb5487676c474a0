import { AssemblyStateError } from './errors.js';
import { LocationCounter } from './location-counter.js';
import { ErrorReporter } from './reporter.js';
import { SymbolTable } from './symbol-table.js';
import type { AssembleOptions, AssemblyPhase, LineLayout } from './types.js';

/**
 * Everything one assembly run owns. A fresh context is created per run, so independent
 * programs can be assembled side by side.
 */
export interface AssemblyContext {
  phase: AssemblyPhase;
  readonly options: AssembleOptions;
  readonly symbols: SymbolTable;
  readonly location: LocationCounter;
  readonly reporter: ErrorReporter;
  // One entry per source record, filled by pass 1.
  readonly layouts: LineLayout[];
  origin: number;
  programEnd: number;
  programName?: string;
  entry?: number;
  base?: number;
}

export function createAssemblyContext(options: AssembleOptions = {}): AssemblyContext {
  return {
    phase: 'idle',
    options,
    symbols: new SymbolTable(),
    location: new LocationCounter(0),
    reporter: new ErrorReporter(options.filename ?? '<memory>'),
    layouts: [],
    origin: 0,
    programEnd: 0
  };
}

export function transition(ctx: AssemblyContext, from: AssemblyPhase, to: AssemblyPhase): void {
  if (ctx.phase !== from) {
    throw new AssemblyStateError(`Cannot enter ${to} from ${ctx.phase}; expected ${from}`);
  }
  ctx.phase = to;
}
