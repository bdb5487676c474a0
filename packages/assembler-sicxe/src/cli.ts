#!/usr/bin/env node
import path from 'node:path';
import { mkdirSync, readFileSync, realpathSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { assemble } from './assembler.js';
import { asDisplayError } from './errors.js';
import { toHex } from './literals.js';
import type { SourceAssembleResult } from './types.js';

type OutputFormat = 'summary' | 'listing';

interface CliOptions {
  input?: string;
  lst?: string;
  sym?: string;
  requireBounds: boolean;
  format: OutputFormat;
  help: boolean;
}

interface OutputPaths {
  lst: string;
  sym: string;
}

const USAGE = 'Usage: sicxe-asm -i <input.asm> [--lst out.lst] [--sym out.sym] [--strict] [--format summary|listing]';

const VALUE_FLAGS = new Map<string, 'input' | 'lst' | 'sym'>([
  ['-i', 'input'],
  ['--input', 'input'],
  ['--lst', 'lst'],
  ['--sym', 'sym']
]);

function parseArgs(args: readonly string[]): CliOptions {
  const opts: CliOptions = { format: 'summary', requireBounds: false, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const key = VALUE_FLAGS.get(token);
    if (key !== undefined) {
      opts[key] = args[i + 1];
      i += 1;
    } else if (token === '--strict') {
      opts.requireBounds = true;
    } else if (token === '-h' || token === '--help') {
      opts.help = true;
    } else if (token === '--format') {
      const next = args[i + 1];
      if (next === 'listing' || next === 'summary') {
        opts.format = next;
        i += 1;
      }
    }
  }
  return opts;
}

// Without explicit paths, outputs land in ./dist named after the source file.
function resolveOutputs(inputPath: string, opts: CliOptions): OutputPaths {
  const base = path.basename(inputPath, path.extname(inputPath));
  return {
    lst: path.resolve(process.cwd(), opts.lst ?? path.join('dist', `${base}.lst`)),
    sym: path.resolve(process.cwd(), opts.sym ?? path.join('dist', `${base}.sym`))
  };
}

function writeText(file: string, text: string): void {
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, `${text}\n`, 'utf8');
}

function printSummary(inputPath: string, outputs: OutputPaths, result: SourceAssembleResult): void {
  console.log(`Assembled ${inputPath}`);
  console.log(`  LST: ${outputs.lst}`);
  console.log(`  SYM: ${outputs.sym}`);
  console.log(`  PROGRAM: ${result.programName ?? '(unnamed)'}`);
  console.log(`  ORIGIN: ${toHex(result.origin, 5)}`);
  console.log(`  LENGTH: ${toHex(result.length, 5)}`);
  console.log(`  ENTRY: ${toHex(result.entry, 5)}`);
}

export function runCli(argv: readonly string[]): number {
  const opts = parseArgs(argv);
  if (opts.help || opts.input === undefined) {
    console.log(USAGE);
    return opts.help ? 0 : 1;
  }

  const inputPath = path.resolve(process.cwd(), opts.input);
  const outputs = resolveOutputs(inputPath, opts);

  let result: SourceAssembleResult;
  try {
    result = assemble(readFileSync(inputPath, 'utf8'), { filename: inputPath, requireBounds: opts.requireBounds });
  } catch (error) {
    console.error(`sicxe-asm: ${inputPath}: ${asDisplayError(error)}`);
    return 1;
  }

  // The listing carries diagnostics inline, so it is written for failed runs too.
  writeText(outputs.lst, result.lst);

  if (!result.ok) {
    for (const diag of result.diagnostics) {
      console.error(`${diag.file}:${diag.line}: [${diag.numericCode}] ${diag.message}`);
    }
    return 1;
  }

  writeText(outputs.sym, result.sym);
  if (opts.format === 'listing') {
    console.log(result.lst);
  } else {
    printSummary(inputPath, outputs, result);
  }
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) {
    return false;
  }
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exit(runCli(process.argv.slice(2)));
}
