/**
 * JavaScript/TypeScript parser wrapper
 *
 * Uses @babel/parser to parse source code into a Babel AST
 */

import { parse as babelParse, type ParserOptions, type ParserPlugin } from '@babel/parser';
import * as t from '@babel/types';

export interface ParseOptions {
  /** Source filename (for error messages) */
  filename?: string;
  /** Enable TypeScript syntax (default: true) */
  typescript?: boolean;
  /** Enable JSX parsing */
  jsx?: boolean;
  /** Source type */
  sourceType?: 'script' | 'module' | 'unambiguous';
}

export interface ParseResult {
  /** The parsed AST */
  ast: t.File;
  /** Any parsing errors */
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

const BASE_PLUGINS: ParserPlugin[] = [
  'classProperties',
  'classPrivateProperties',
  'classPrivateMethods',
  'classStaticBlock',
  'decoratorAutoAccessors',
  'explicitResourceManagement',
  'importAttributes',
  'topLevelAwait',
];

/**
 * Parse source code into an AST
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const plugins: ParserPlugin[] = [...BASE_PLUGINS, ['decorators', { decoratorsBeforeExport: true }]];

  if (options.typescript ?? true) {
    plugins.push('typescript');
  }
  if (options.jsx) {
    plugins.push('jsx');
  }

  const parserOptions: ParserOptions = {
    sourceType: options.sourceType ?? 'unambiguous',
    sourceFilename: options.filename,
    errorRecovery: true, // Continue parsing after errors
    plugins,
  };

  try {
    const ast = babelParse(source, parserOptions);

    // Recovered errors are SyntaxError instances; the typings only promise the codes
    const errors: ParseError[] = ast.errors.map((err) => {
      const loc = 'loc' in err ? readLocation(err.loc) : undefined;
      return {
        message: 'message' in err && typeof err.message === 'string' ? err.message : err.reasonCode,
        line: loc?.line ?? 0,
        column: loc?.column ?? 0,
      };
    });

    return { ast, errors };
  } catch (error) {
    // Unrecoverable syntax errors still throw with errorRecovery enabled
    if (error instanceof SyntaxError) {
      const loc = 'loc' in error ? readLocation(error.loc) : undefined;
      return {
        ast: t.file(t.program([])),
        errors: [
          {
            message: error.message,
            line: loc?.line ?? 0,
            column: loc?.column ?? 0,
          },
        ],
      };
    }
    throw error;
  }
}

/**
 * Parse a single expression
 */
export function parseExpression(source: string, options: ParseOptions = {}): t.Expression {
  const result = parse(`(${source})`, options);
  const stmt = result.ast.program.body[0];
  if (result.errors.length === 0 && stmt && stmt.type === 'ExpressionStatement') {
    return stmt.expression;
  }
  throw new Error(`Failed to parse expression: ${source}`);
}

function readLocation(value: unknown): { line: number; column: number } | undefined {
  if (
    typeof value === 'object' &&
    value !== null &&
    'line' in value &&
    'column' in value &&
    typeof value.line === 'number' &&
    typeof value.column === 'number'
  ) {
    return { line: value.line, column: value.column };
  }
  return undefined;
}
