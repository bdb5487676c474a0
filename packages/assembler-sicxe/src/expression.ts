import type { AssemblerErrorCode } from './error-catalog.js';
import { fail, isFailure, type Outcome } from './errors.js';

export interface ExpressionContext {
  resolveSymbol: (name: string) => Outcome<number>;
  currentAddress: number;
}

/**
 * Result of an operand expression. `relativeTerms` counts address terms (symbols and `*`):
 * 0 means an absolute constant, 1 an address inside the program.
 */
export interface ExpressionValue {
  value: number;
  relativeTerms: number;
}

interface Token {
  kind: 'number' | 'identifier' | 'operator' | 'lparen' | 'rparen' | 'eof';
  value: string;
  column: number;
}

class ExpressionError extends Error {
  readonly code: AssemblerErrorCode;

  readonly column: number;

  constructor(code: AssemblerErrorCode, message: string, column: number) {
    super(message);
    this.code = code;
    this.column = column;
  }
}

function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < input.length) {
    const ch = input[i] ?? '';
    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === '(') {
      tokens.push({ kind: 'lparen', value: ch, column: i + 1 });
      i += 1;
      continue;
    }
    if (ch === ')') {
      tokens.push({ kind: 'rparen', value: ch, column: i + 1 });
      i += 1;
      continue;
    }

    if ('+-*/'.includes(ch)) {
      tokens.push({ kind: 'operator', value: ch, column: i + 1 });
      i += 1;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      let j = i;
      while (j < input.length && /[0-9A-Za-z]/.test(input[j] ?? '')) {
        j += 1;
      }
      const raw = input.slice(i, j);
      if (!/^[0-9]+$/.test(raw)) {
        throw new ExpressionError('INVALID_OPERAND', `Invalid number literal: ${raw}`, i + 1);
      }
      tokens.push({ kind: 'number', value: raw, column: i + 1 });
      i = j;
      continue;
    }

    if (isIdentifierStart(ch)) {
      let j = i + 1;
      while (j < input.length && isIdentifierPart(input[j] ?? '')) {
        j += 1;
      }
      tokens.push({ kind: 'identifier', value: input.slice(i, j), column: i + 1 });
      i = j;
      continue;
    }

    throw new ExpressionError('INVALID_OPERAND', `Unexpected character: ${ch}`, i + 1);
  }

  tokens.push({ kind: 'eof', value: '', column: input.length + 1 });
  return tokens;
}

const PRECEDENCE = new Map<string, number>([
  ['+', 1],
  ['-', 1],
  ['*', 2],
  ['/', 2]
]);

class Parser {
  private readonly tokens: Token[];

  private readonly ctx: ExpressionContext;

  private index = 0;

  constructor(tokens: Token[], ctx: ExpressionContext) {
    this.tokens = tokens;
    this.ctx = ctx;
  }

  parse(): ExpressionValue {
    const value = this.parseBinary(1);
    const token = this.peek();
    if (token.kind !== 'eof') {
      throw new ExpressionError('INVALID_OPERAND', `Unexpected token: ${token.value}`, token.column);
    }
    return value;
  }

  private parseBinary(minPrec: number): ExpressionValue {
    let left = this.parseUnary();

    while (true) {
      const token = this.peek();
      if (token.kind !== 'operator') {
        break;
      }
      const prec = PRECEDENCE.get(token.value);
      if (prec === undefined || prec < minPrec) {
        break;
      }
      this.next();
      const right = this.parseBinary(prec + 1);
      left = this.applyBinary(token, left, right);
    }

    return left;
  }

  private parseUnary(): ExpressionValue {
    const token = this.peek();
    if (token.kind === 'operator' && (token.value === '+' || token.value === '-')) {
      this.next();
      const operand = this.parseUnary();
      if (token.value === '+') {
        return operand;
      }
      return { value: 0 - operand.value, relativeTerms: 0 - operand.relativeTerms };
    }

    return this.parsePrimary();
  }

  private parsePrimary(): ExpressionValue {
    const token = this.next();
    if (token.kind === 'number') {
      return { value: Number.parseInt(token.value, 10), relativeTerms: 0 };
    }
    // `*` in operand position is the location counter.
    if (token.kind === 'operator' && token.value === '*') {
      return { value: this.ctx.currentAddress, relativeTerms: 1 };
    }
    if (token.kind === 'identifier') {
      const resolved = this.ctx.resolveSymbol(token.value);
      if (isFailure(resolved)) {
        throw new ExpressionError(resolved.error, resolved.detail ?? token.value, token.column);
      }
      return { value: resolved.value, relativeTerms: 1 };
    }
    if (token.kind === 'lparen') {
      const value = this.parseBinary(1);
      const closer = this.next();
      if (closer.kind !== 'rparen') {
        throw new ExpressionError('INVALID_OPERAND', 'Missing closing parenthesis', closer.column);
      }
      return value;
    }
    throw new ExpressionError('INVALID_OPERAND', `Unexpected token: ${token.value || 'end of operand'}`, token.column);
  }

  private applyBinary(token: Token, left: ExpressionValue, right: ExpressionValue): ExpressionValue {
    switch (token.value) {
      case '+':
        return { value: left.value + right.value, relativeTerms: left.relativeTerms + right.relativeTerms };
      case '-':
        return { value: left.value - right.value, relativeTerms: left.relativeTerms - right.relativeTerms };
      case '*':
      case '/':
        if (left.relativeTerms !== 0 || right.relativeTerms !== 0) {
          throw new ExpressionError('INVALID_OPERAND', `Relative term used with ${token.value}`, token.column);
        }
        if (token.value === '*') {
          return { value: left.value * right.value, relativeTerms: 0 };
        }
        if (right.value === 0) {
          throw new ExpressionError('INVALID_OPERAND', 'Division by zero', token.column);
        }
        return { value: Math.trunc(left.value / right.value), relativeTerms: 0 };
      default:
        throw new ExpressionError('INVALID_OPERAND', `Unsupported operator: ${token.value}`, token.column);
    }
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1] ?? { kind: 'eof', value: '', column: 1 };
  }

  private next(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }
}

export function evaluateExpression(text: string, ctx: ExpressionContext): Outcome<ExpressionValue> {
  try {
    const tokens = tokenize(text);
    const parser = new Parser(tokens, ctx);
    const result = parser.parse();
    if (result.relativeTerms !== 0 && result.relativeTerms !== 1) {
      return fail('INVALID_OPERAND', `Expression is neither absolute nor a program address: ${text}`);
    }
    return { value: result };
  } catch (error) {
    if (error instanceof ExpressionError) {
      return fail(error.code, error.message);
    }
    throw error;
  }
}
