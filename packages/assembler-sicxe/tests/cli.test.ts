import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCli } from '../src/cli.js';

describe('sicxe-asm cli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes LST/SYM and returns 0 on success', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'sicxe-'));
    try {
      const input = path.join(tempDir, 'prog.asm');
      const outLst = path.join(tempDir, 'out.lst');
      const outSym = path.join(tempDir, 'out.sym');

      writeFileSync(input, 'PROG     START   0\nLOOP     J       LOOP\n         END     LOOP\n', 'utf8');

      const code = runCli(['-i', input, '--lst', outLst, '--sym', outSym, '--strict']);
      expect(code).toBe(0);
      expect(readFileSync(outLst, 'utf8')).toBe(
        ['       PROG     START   0', '00000  LOOP     J       LOOP        3F2FFD', '                END     LOOP', ''].join('\n')
      );
      expect(readFileSync(outSym, 'utf8')).toBe('      LOOP: 00000\n      PROG: 00000\n');
      expect(console.log).toHaveBeenCalledWith('  ENTRY: 00000');
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('returns 1 and reports diagnostics when assembly fails', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'sicxe-'));
    try {
      const input = path.join(tempDir, 'bad.asm');
      const outLst = path.join(tempDir, 'bad.lst');
      const outSym = path.join(tempDir, 'bad.sym');
      writeFileSync(input, '         LDA     NOWHERE\n', 'utf8');

      const code = runCli(['-i', input, '--lst', outLst, '--sym', outSym]);
      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(`${input}:1: [E11] Undefined symbol: NOWHERE`);
      expect(readFileSync(outLst, 'utf8')).toBe(
        ['00000           LDA     NOWHERE', '       *** E11 Undefined symbol: NOWHERE', ''].join('\n')
      );
      expect(existsSync(outSym)).toBe(false);
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('returns 1 without an input file', () => {
    expect(runCli([])).toBe(1);
    expect(console.log).toHaveBeenCalledWith(
      'Usage: sicxe-asm -i <input.asm> [--lst out.lst] [--sym out.sym] [--strict] [--format summary|listing]'
    );
  });

  it('returns 1 when the input cannot be read', () => {
    const tempDir = mkdtempSync(path.join(os.tmpdir(), 'sicxe-'));
    try {
      const missing = path.join(tempDir, 'missing.asm');
      expect(runCli(['-i', missing])).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        `sicxe-asm: ${missing}: ENOENT: no such file or directory, open '${missing}' (E99)`
      );
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('prints usage and returns 0 for --help', () => {
    expect(runCli(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });
});
