import { fail, type Outcome } from './errors.js';

export type LiteralKind = 'character' | 'hex' | 'decimal';

export function literalKind(text: string): LiteralKind | undefined {
  const trimmed = text.trim();
  if (/^C'.*'$/i.test(trimmed)) {
    return 'character';
  }
  if (/^X'.*'$/i.test(trimmed)) {
    return 'hex';
  }
  if (/^[0-9]+$/.test(trimmed)) {
    return 'decimal';
  }
  return undefined;
}

function quotedBody(text: string): string {
  const trimmed = text.trim();
  return trimmed.slice(2, -1);
}

// C'EOF' -> [0x45, 0x4f, 0x46]
export function decodeCharacterLiteral(text: string): Outcome<number[]> {
  const body = quotedBody(text);
  if (body.length === 0) {
    return fail('INVALID_OPERAND', `empty character literal ${text}`);
  }
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i += 1) {
    const code = body.charCodeAt(i);
    if (code > 0xff) {
      return fail('INVALID_OPERAND', `character out of byte range in ${text}`);
    }
    bytes.push(code);
  }
  return { value: bytes };
}

// X'F1' -> [0xf1]; the digit count must be even.
export function decodeHexLiteral(text: string): Outcome<number[]> {
  const body = quotedBody(text);
  if (body.length === 0 || body.length % 2 !== 0 || !/^[0-9A-F]+$/i.test(body)) {
    return fail('INVALID_OPERAND', `malformed hex literal ${text}`);
  }
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i += 2) {
    bytes.push(Number.parseInt(body.slice(i, i + 2), 16));
  }
  return { value: bytes };
}

export function decodeByteLiteral(text: string): Outcome<number[]> {
  switch (literalKind(text)) {
    case 'character':
      return decodeCharacterLiteral(text);
    case 'hex':
      return decodeHexLiteral(text);
    case 'decimal': {
      const value = Number.parseInt(text.trim(), 10);
      if (value > 0xff) {
        return fail('VALUE_OUT_OF_RANGE', `BYTE constant ${value} exceeds 255`);
      }
      return { value: [value] };
    }
    default:
      return fail('INVALID_OPERAND', `BYTE requires C'..', X'..' or a decimal constant: ${text}`);
  }
}

// Repeat count of RESB/RESW: decimal, or hexadecimal written as X'..'.
export function parseReserveCount(text: string): Outcome<number> {
  const kind = literalKind(text);
  if (kind === 'decimal') {
    return { value: Number.parseInt(text.trim(), 10) };
  }
  if (kind === 'hex') {
    const body = quotedBody(text);
    if (body.length > 0 && /^[0-9A-F]+$/i.test(body)) {
      return { value: Number.parseInt(body, 16) };
    }
  }
  return fail('INVALID_RESERVE_OPERAND', text.trim().length > 0 ? text.trim() : 'missing count');
}

// START operands are hexadecimal addresses without a prefix.
export function parseHexAddress(text: string): number | undefined {
  const trimmed = text.trim();
  if (!/^[0-9A-F]+$/i.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 16);
}

export function toHex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}
