#!/usr/bin/env node
/**
 * CLI script to trampoline self tail-recursive functions in a source file
 * Usage: npx tsx scripts/tailrec.ts <file> [options]
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { run } from '../src/cli/index.js';

const code = run(process.argv.slice(2), {
  readFile: (path) => readFileSync(resolve(process.cwd(), path), 'utf-8'),
  writeFile: (path, data) => writeFileSync(resolve(process.cwd(), path), data),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
});
process.exit(code);
