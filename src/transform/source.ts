/**
 * Module-level transformation
 *
 * Rewrites every function of a source file that carries the `@tailrec` doc
 * tag (or is named in the options) and prints the file again.
 */

import type * as t from '@babel/types';
import type { FunctionNode, TransformOptions } from '../types/index.js';
import { findFunctions, parse, type DiscoveredFunction, type ParseError, type ParseOptions } from '../parser/index.js';
import { emitFile } from '../output/index.js';
import { TransformError } from './errors.js';
import { transformWithReport, type TransformReport } from './transform.js';

export interface SourceTransformOptions extends TransformOptions, ParseOptions {
  /** Doc tag that selects functions, without the `@` (default: `tailrec`) */
  tag?: string;
  /** Functions to transform by name, in addition to tagged ones */
  functions?: readonly string[];
  /** Keep TypeScript syntax in the output (default: true) */
  types?: boolean;
}

export interface FunctionOutcome {
  readonly name: string;
  readonly report?: TransformReport;
  readonly error?: TransformError;
}

export interface SourceTransformResult {
  /** Printed module, or the input unchanged when it did not parse */
  code: string;
  /** One entry per selected function, in source order */
  functions: FunctionOutcome[];
  errors: ParseError[];
}

export function transformSource(source: string, options: SourceTransformOptions = {}): SourceTransformResult {
  const { ast, errors } = parse(source, options);
  if (errors.length > 0) {
    return { code: source, functions: [], errors };
  }

  const requested = new Set(options.functions ?? []);
  const selected = findFunctions(ast, { tag: options.tag }).filter(
    (found) => found.tagged || requested.has(found.def.name)
  );

  // Innermost first: an enclosing function copies its body when transformed
  const outcomes = [...selected].reverse().map((found) => transformInPlace(found, options));

  return {
    code: emitFile(ast, { types: options.types }),
    functions: outcomes.reverse(),
    errors: [],
  };
}

function transformInPlace(found: DiscoveredFunction, options: TransformOptions): FunctionOutcome {
  const { name } = found.def;
  try {
    const { def, report } = transformWithReport(found.def, options);
    replaceFunction(found.def.node, def.node);
    return { name, report };
  } catch (error) {
    if (error instanceof TransformError) {
      return { name, error };
    }
    throw error;
  }
}

/**
 * Splice the rewritten parameters and body into the node the parent holds
 */
function replaceFunction(target: FunctionNode, replacement: FunctionNode): void {
  if (target === replacement) {
    return;
  }
  const body: t.BlockStatement | t.Expression = replacement.body;
  Object.assign(target, { params: replacement.params, body });
  if (target.type === 'ArrowFunctionExpression') {
    target.expression = body.type !== 'BlockStatement';
  }
}
