import { AssemblerError } from './errors.js';
import { toHex } from './literals.js';

// SIC/XE addresses are 20 bits wide.
export const MAX_ADDRESS = 0xfffff;

export class LocationCounter {
  private address: number;

  constructor(origin = 0) {
    this.address = origin;
  }

  get current(): number {
    return this.address;
  }

  reset(origin: number): void {
    if (!Number.isInteger(origin) || origin < 0 || origin > MAX_ADDRESS) {
      throw new AssemblerError('PROGRAM_BOUNDS', `origin ${toHex(origin, 5)} outside the address space`);
    }
    this.address = origin;
  }

  // The counter may sit one past the last byte, so MAX_ADDRESS + 1 is a valid end.
  advance(length: number, line?: number): number {
    const next = this.address + length;
    if (next > MAX_ADDRESS + 1) {
      throw new AssemblerError('PROGRAM_BOUNDS', `location counter overflows 20-bit address space at ${toHex(this.address, 5)}`, line);
    }
    this.address = next;
    return next;
  }
}
