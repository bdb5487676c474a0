import instructionData from './instructions.json' with { type: 'json' };

import { fail, type Outcome } from './errors.js';

export type DirectiveName = 'START' | 'END' | 'BASE' | 'NOBASE' | 'RESB' | 'RESW' | 'BYTE' | 'WORD';

// Format 2 operand shapes: `r`, `r1,r2`, `r,n` and `n` (SVC).
export type RegisterOperandShape = 'r' | 'rr' | 'rn' | 'n';

export type MemoryOperandShape = 'memory' | 'none';

export interface Format1Spec {
  kind: 'format1';
  mnemonic: string;
  opcode: number;
}

export interface Format2Spec {
  kind: 'format2';
  mnemonic: string;
  opcode: number;
  operands: RegisterOperandShape;
}

export interface Format3Spec {
  kind: 'format3';
  mnemonic: string;
  opcode: number;
  operands: MemoryOperandShape;
}

export interface Format4Spec {
  kind: 'format4';
  mnemonic: string;
  opcode: number;
  operands: MemoryOperandShape;
}

export interface DirectiveSpec {
  kind: 'directive';
  directive: DirectiveName;
}

export type InstructionSpec = Format1Spec | Format2Spec | Format3Spec | Format4Spec | DirectiveSpec;

export const WORD_SIZE = 3;

export const EXTENDED_PREFIX = '+';

export const REGISTERS = new Map<string, number>([
  ['A', 0],
  ['X', 1],
  ['L', 2],
  ['B', 3],
  ['S', 4],
  ['T', 5],
  ['F', 6],
  ['PC', 8],
  ['SW', 9]
]);

const DIRECTIVES: readonly DirectiveName[] = ['START', 'END', 'BASE', 'NOBASE', 'RESB', 'RESW', 'BYTE', 'WORD'];

type MachineSpec = Format1Spec | Format2Spec | Format3Spec;

function toRegisterShape(value: string): RegisterOperandShape | undefined {
  switch (value) {
    case 'r':
    case 'rr':
    case 'rn':
    case 'n':
      return value;
    default:
      return undefined;
  }
}

function toMachineSpec(entry: { mnemonic: string; format: number; opcode: string; operands: string }): MachineSpec {
  const opcode = Number.parseInt(entry.opcode, 16);
  if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) {
    throw new Error(`Invalid opcode for ${entry.mnemonic}: ${entry.opcode}`);
  }
  if (entry.format === 1 && entry.operands === 'none') {
    return { kind: 'format1', mnemonic: entry.mnemonic, opcode };
  }
  if (entry.format === 2) {
    const operands = toRegisterShape(entry.operands);
    if (operands) {
      return { kind: 'format2', mnemonic: entry.mnemonic, opcode, operands };
    }
  }
  if (entry.format === 3 && (entry.operands === 'm' || entry.operands === 'none')) {
    return {
      kind: 'format3',
      mnemonic: entry.mnemonic,
      opcode,
      operands: entry.operands === 'm' ? 'memory' : 'none'
    };
  }
  throw new Error(`Invalid instruction table entry: ${entry.mnemonic}`);
}

const MACHINE_INSTRUCTIONS = new Map<string, MachineSpec>(
  instructionData.instructions.map((entry) => [entry.mnemonic, toMachineSpec(entry)])
);

export const SICXE_MNEMONICS: readonly string[] = [...MACHINE_INSTRUCTIONS.keys()];

function isDirective(name: string): name is DirectiveName {
  return DIRECTIVES.some((directive) => directive === name);
}

export function isExtended(mnemonic: string): boolean {
  return mnemonic.startsWith(EXTENDED_PREFIX);
}

export function lookupInstruction(mnemonic: string): Outcome<InstructionSpec> {
  const upper = mnemonic.trim().toUpperCase();
  const extended = isExtended(upper);
  const name = extended ? upper.slice(EXTENDED_PREFIX.length) : upper;

  if (!extended && isDirective(name)) {
    return { value: { kind: 'directive', directive: name } };
  }

  const spec = MACHINE_INSTRUCTIONS.get(name);
  if (!spec) {
    return fail('UNKNOWN_MNEMONIC', mnemonic);
  }
  if (!extended) {
    return { value: spec };
  }
  if (spec.kind !== 'format3') {
    return fail('UNKNOWN_MNEMONIC', mnemonic);
  }
  return { value: { ...spec, kind: 'format4' } };
}

export function instructionLength(spec: Format1Spec | Format2Spec | Format3Spec | Format4Spec): number {
  switch (spec.kind) {
    case 'format1':
      return 1;
    case 'format2':
      return 2;
    case 'format3':
      return 3;
    case 'format4':
      return 4;
  }
}

export function lookupRegister(name: string): number | undefined {
  return REGISTERS.get(name.trim().toUpperCase());
}
