/**
 * Function discovery
 *
 * Finds the functions of a module that can be trampolined and reads the
 * `@tailrec` doc tag that requests the transformation.
 */

import * as t from '@babel/types';
import type { FunctionDef, FunctionNode } from '../types/index.js';
import { TransformError } from '../transform/errors.js';
import { parse, type ParseOptions } from './parser.js';

export const DEFAULT_TAG = 'tailrec';

export interface DiscoveredFunction {
  readonly def: FunctionDef;
  /** Whether a leading doc comment carries the tag */
  readonly tagged: boolean;
}

export interface FindOptions {
  /** Doc tag without the `@` (default: `tailrec`) */
  tag?: string;
}

export interface ParseFunctionOptions extends ParseOptions, FindOptions {
  /** Function to select; the first function found when omitted */
  name?: string;
}

/**
 * Collect every named function in a file, in source order
 */
export function findFunctions(file: t.File, options: FindOptions = {}): DiscoveredFunction[] {
  const pattern = tagPattern(options.tag ?? DEFAULT_TAG);
  const inherited = new WeakSet<t.Node>();
  const found: DiscoveredFunction[] = [];

  const isTagged = (node: t.Node): boolean =>
    inherited.has(node) || (node.leadingComments ?? []).some((c) => pattern.test(c.value));

  t.traverseFast(file.program, (node) => {
    switch (node.type) {
      case 'ExportNamedDeclaration':
      case 'ExportDefaultDeclaration':
        // Comments before `export` belong to the exported declaration
        if (node.declaration && isTagged(node)) {
          inherited.add(node.declaration);
        }
        break;

      case 'FunctionDeclaration':
        if (node.id) {
          found.push({ def: { name: node.id.name, node }, tagged: isTagged(node) });
        }
        break;

      case 'VariableDeclaration': {
        const tagged = isTagged(node);
        for (const declarator of node.declarations) {
          const init = declarator.init;
          if (t.isIdentifier(declarator.id) && (t.isArrowFunctionExpression(init) || t.isFunctionExpression(init))) {
            found.push({ def: { name: bindingName(init, declarator.id.name), node: init }, tagged });
          }
        }
        break;
      }

      case 'ClassMethod':
      case 'ObjectMethod': {
        const name = staticKey(node.key, node.computed);
        if (name !== null) {
          found.push({ def: { name, node }, tagged: isTagged(node) });
        }
        break;
      }

      case 'ObjectProperty': {
        const name = staticKey(node.key, node.computed);
        const value = node.value;
        if (name !== null && (t.isArrowFunctionExpression(value) || t.isFunctionExpression(value))) {
          // A named function expression still calls itself directly through its id
          const property = !(t.isFunctionExpression(value) && value.id);
          found.push({ def: { name: bindingName(value, name), node: value, property }, tagged: isTagged(node) });
        }
        break;
      }

      default:
        break;
    }
  });

  return found;
}

/**
 * Parse source and return one function definition
 */
export function parseFunction(source: string, options: ParseFunctionOptions = {}): FunctionDef {
  const { ast, errors } = parse(source, options);
  const first = errors[0];
  if (first) {
    throw new TransformError('parse', `${first.message} (${first.line}:${first.column})`, options.name);
  }

  const functions = findFunctions(ast, options);
  const match = options.name === undefined ? functions[0] : functions.find((f) => f.def.name === options.name);
  if (!match) {
    throw new TransformError('not-found', 'no matching function in source', options.name);
  }
  return match.def;
}

/**
 * A named function expression refers to itself by its own id
 */
function bindingName(node: FunctionNode, fallback: string): string {
  return t.isFunctionExpression(node) && node.id ? node.id.name : fallback;
}

function staticKey(key: t.Node, computed: boolean): string | null {
  if (t.isIdentifier(key) && !computed) {
    return key.name;
  }
  if (t.isStringLiteral(key)) {
    return key.value;
  }
  return null;
}

function tagPattern(tag: string): RegExp {
  const escaped = tag.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`@${escaped}(?![\\w-])`);
}
