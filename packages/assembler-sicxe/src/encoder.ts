import type { Format1Spec, Format2Spec, Format3Spec, Format4Spec } from './instruction-table.js';
import type { AddressingDecision, AddressingFlags, RegisterOperands } from './types.js';

function bit(flag: boolean, shift: number): number {
  return flag ? 1 << shift : 0;
}

// Opcode byte with its low two bits replaced by n and i.
export function packOpcode(opcode: number, flags: Pick<AddressingFlags, 'n' | 'i'>): number {
  return (opcode & 0xfc) | bit(flags.n, 1) | bit(flags.i, 0);
}

// x, b, p, e occupy the top nibble of the second byte.
export function packFlagNibble(flags: AddressingFlags): number {
  return bit(flags.x, 7) | bit(flags.b, 6) | bit(flags.p, 5) | bit(flags.e, 4);
}

export function encodeFormat1(spec: Format1Spec): number[] {
  return [spec.opcode & 0xff];
}

export function encodeFormat2(spec: Format2Spec, registers: RegisterOperands): number[] {
  return [spec.opcode & 0xff, ((registers.r1 & 0x0f) << 4) | (registers.r2 & 0x0f)];
}

export function encodeFormat3(spec: Format3Spec, decision: AddressingDecision): number[] {
  const field = decision.field & 0xfff;
  return [
    packOpcode(spec.opcode, decision.flags),
    packFlagNibble(decision.flags) | (field >>> 8),
    field & 0xff
  ];
}

export function encodeFormat4(spec: Format4Spec, decision: AddressingDecision): number[] {
  const field = decision.field & 0xfffff;
  return [
    packOpcode(spec.opcode, decision.flags),
    packFlagNibble(decision.flags) | (field >>> 16),
    (field >>> 8) & 0xff,
    field & 0xff
  ];
}

// WORD constants are 24-bit two's complement, most significant byte first.
export function encodeWord(value: number): number[] {
  const word = value & 0xffffff;
  return [(word >>> 16) & 0xff, (word >>> 8) & 0xff, word & 0xff];
}
