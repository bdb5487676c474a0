import { AssemblyStateError, fail, type Outcome } from './errors.js';
import type { SymbolEntry } from './types.js';

/**
 * Read-only view handed to pass 2. Resolving an unknown name yields `UNDEFINED_SYMBOL`.
 */
export interface ReadonlySymbolTable {
  resolve(name: string): Outcome<number>;
  has(name: string): boolean;
  entries(): SymbolEntry[];
}

/**
 * Label name to address binding for one assembly run.
 * Names are case-sensitive. The first definition of a name wins; the table is sealed once
 * pass 1 has finished.
 */
export class SymbolTable implements ReadonlySymbolTable {
  private readonly table = new Map<string, SymbolEntry>();

  private sealed = false;

  define(name: string, address: number, line: number): Outcome<SymbolEntry> {
    if (this.sealed) {
      throw new AssemblyStateError(`Symbol table is sealed; cannot define ${name}`);
    }
    const existing = this.table.get(name);
    if (existing) {
      return fail('DUPLICATE_SYMBOL', `${name} (first defined on line ${existing.line})`);
    }
    const entry: SymbolEntry = { name, address, line };
    this.table.set(name, entry);
    return { value: entry };
  }

  resolve(name: string): Outcome<number> {
    const entry = this.table.get(name);
    if (!entry) {
      return fail('UNDEFINED_SYMBOL', name);
    }
    return { value: entry.address };
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  entries(): SymbolEntry[] {
    return [...this.table.values()].sort((a, b) => {
      if (a.address !== b.address) {
        return a.address - b.address;
      }
      return a.name.localeCompare(b.name);
    });
  }
}
