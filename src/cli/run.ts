/**
 * Command-line driver
 *
 * Argument handling and output for scripts/tailrec.ts. File access and the
 * console go through `CliIO` so the driver runs without touching the process.
 */

import { extname } from 'node:path';
import { transformSource, type SourceTransformResult } from '../transform/index.js';

export type Format = 'ts' | 'js' | 'report' | 'json';

export interface CliIO {
  readFile(path: string): string;
  writeFile(path: string, data: string): void;
  /** Results */
  stdout(line: string): void;
  /** Progress, warnings and errors */
  stderr(line: string): void;
}

export interface CliOptions {
  filePath: string;
  format: Format | undefined;
  outPath: string | undefined;
  tag: string | undefined;
  methodCalls: boolean;
  jsx: boolean;
  functions: string[];
}

const USAGE = [
  'Usage: npx tsx scripts/tailrec.ts <file> [options]',
  '',
  'Functions carrying the @tailrec doc tag are transformed.',
  '',
  'Options:',
  '  --function=<name>   Also transform this function (repeatable)',
  '  --tag=<tag>         Doc tag that selects functions (default: tailrec)',
  '  --format=ts         Print the transformed module with TypeScript syntax',
  '  --format=js         Print the transformed module as JavaScript',
  '  --format=report     Print a per-function summary',
  '  --format=json       Print the summary as JSON',
  '  --out=<file>        Write the output to a file instead of stdout',
  '  --no-method-calls   Do not treat receiver.name(...) as a self call',
  '  --jsx               Enable JSX syntax',
];

/**
 * Parse `--flag=value` arguments; returns an error message for bad input
 */
export function parseArguments(args: readonly string[]): CliOptions | string {
  const options: CliOptions = {
    filePath: '',
    format: undefined,
    outPath: undefined,
    tag: undefined,
    methodCalls: true,
    jsx: false,
    functions: [],
  };

  for (const arg of args) {
    if (arg.startsWith('--function=')) {
      options.functions.push(arg.slice('--function='.length));
    } else if (arg.startsWith('--tag=')) {
      options.tag = arg.slice('--tag='.length);
    } else if (arg.startsWith('--format=')) {
      const value = arg.slice('--format='.length);
      if (value !== 'ts' && value !== 'js' && value !== 'report' && value !== 'json') {
        return `Unknown format '${value}'`;
      }
      options.format = value;
    } else if (arg.startsWith('--out=')) {
      options.outPath = arg.slice('--out='.length);
    } else if (arg === '--no-method-calls') {
      options.methodCalls = false;
    } else if (arg === '--jsx') {
      options.jsx = true;
    } else if (!arg.startsWith('-')) {
      options.filePath = arg;
    }
  }

  if (!options.filePath) {
    return 'No file path provided';
  }
  return options;
}

/**
 * Run the CLI and return the process exit code
 */
export function run(args: readonly string[], io: CliIO): number {
  if (args.length === 0) {
    USAGE.forEach((line) => io.stdout(line));
    return 1;
  }

  const options = parseArguments(args);
  if (typeof options === 'string') {
    io.stderr(`Error: ${options}`);
    return 1;
  }
  const { filePath, outPath } = options;

  let source: string;
  try {
    source = io.readFile(filePath);
  } catch (err) {
    io.stderr(`Error: Could not read file '${filePath}': ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const extension = extname(filePath);
  const typescript = extension !== '.js' && extension !== '.mjs' && extension !== '.cjs' && extension !== '.jsx';
  const format: Format = options.format ?? (typescript ? 'ts' : 'js');

  io.stderr(`Transforming ${filePath}...`);
  const result = transformSource(source, {
    filename: filePath,
    typescript,
    jsx: options.jsx || extension === '.jsx' || extension === '.tsx',
    functions: options.functions,
    tag: options.tag,
    methodCalls: options.methodCalls,
    types: format !== 'js',
  });

  if (result.errors.length > 0) {
    io.stderr('Parse errors:');
    for (const err of result.errors) {
      io.stderr(`  ${err.line}:${err.column} ${err.message}`);
    }
    return 1;
  }

  summarize(result, io);

  const output = render(result, format);
  if (outPath) {
    io.writeFile(outPath, `${output}\n`);
    io.stderr(`Wrote ${outPath}`);
  } else {
    io.stdout(output);
  }

  return result.functions.some((f) => f.error) ? 1 : 0;
}

export function render(result: SourceTransformResult, format: Format): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toJSON(result), null, 2);
    case 'report':
      return formatReport(result);
    default:
      return result.code;
  }
}

function summarize(result: SourceTransformResult, io: CliIO): void {
  if (result.functions.length === 0) {
    io.stderr('No functions selected (tag one with @tailrec or pass --function=<name>)');
    return;
  }
  for (const outcome of result.functions) {
    if (outcome.error) {
      io.stderr(`  ${outcome.error.message}`);
    } else if (outcome.report && outcome.report.nonTailSelfCalls > 0) {
      io.stderr(
        `  ${outcome.name}: warning: ${outcome.report.nonTailSelfCalls} self call(s) outside tail position still grow the stack`
      );
    }
  }
}

function formatReport(result: SourceTransformResult): string {
  const lines: string[] = [];
  for (const { name, report, error } of result.functions) {
    if (error) {
      lines.push(`${name}: skipped (${error.code})`);
    } else if (report?.alreadyTransformed) {
      lines.push(`${name}: already trampolined`);
    } else if (report) {
      lines.push(
        `${name}: ${report.continues} tail call(s), ${report.returns} return value(s), ${report.nonTailSelfCalls} non-tail self call(s)`
      );
    }
  }
  return lines.join('\n');
}

function toJSON(result: SourceTransformResult): object {
  return {
    functions: result.functions.map(({ name, report, error }) => ({
      name,
      ...(report ? { report } : {}),
      ...(error ? { error: { code: error.code, message: error.message } } : {}),
    })),
  };
}
