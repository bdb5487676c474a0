import type { SourceRecord } from './types.js';

export const COMMENT_PREFIX = '.';

export function isCommentLine(text: string): boolean {
  return text.trimStart().startsWith(COMMENT_PREFIX);
}

// Whitespace-separated tokens; quoted text such as C'EOF X' stays in one token.
export function splitTokens(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuote = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i] ?? '';
    if (ch === "'") {
      inQuote = !inQuote;
      current += ch;
      continue;
    }
    if (!inQuote && /\s/.test(ch)) {
      if (current.length > 0) {
        tokens.push(current);
        current = '';
      }
      continue;
    }
    current += ch;
  }

  if (current.length > 0) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Splits one source line into a record. A line that starts in column 1 carries a label,
 * unless it holds a single token, which is always the mnemonic. Tokens after the operand
 * are a comment.
 */
export function parseSourceLine(text: string, lineNumber: number): SourceRecord | undefined {
  if (text.trim().length === 0 || isCommentLine(text)) {
    return undefined;
  }

  const tokens = splitTokens(text);
  const first = tokens[0] ?? '';
  if (tokens.length === 1) {
    return { lineNumber, mnemonic: first, operandText: '' };
  }

  const hasLabel = /^\S/.test(text);
  if (hasLabel) {
    return {
      lineNumber,
      label: first,
      mnemonic: tokens[1] ?? '',
      operandText: tokens[2] ?? ''
    };
  }
  return { lineNumber, mnemonic: first, operandText: tokens[1] ?? '' };
}

export function splitSourceLines(source: string): SourceRecord[] {
  const records: SourceRecord[] = [];
  const lines = source.replace(/\r\n?/g, '\n').split('\n');
  for (let idx = 0; idx < lines.length; idx += 1) {
    const record = parseSourceLine(lines[idx] ?? '', idx + 1);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
