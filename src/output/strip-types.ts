/**
 * TypeScript syntax removal
 *
 * Runs Babel's TypeScript transform over a copy of the tree, so that type
 * annotations, modifiers, type-only declarations, enums and namespaces come
 * out as plain JavaScript.
 */

import { transformFromAstSync } from '@babel/core';
import typescriptPlugin from '@babel/plugin-transform-typescript';
import * as t from '@babel/types';
import type { FunctionNode } from '../types/index.js';

export function stripTypes(file: t.File): t.File {
  const result = transformFromAstSync(file, undefined, {
    ast: true,
    code: false,
    babelrc: false,
    configFile: false,
    plugins: [[typescriptPlugin, { allowDeclareFields: true }]],
  });
  if (!result?.ast) {
    throw new Error('TypeScript removal returned no tree');
  }
  return result.ast;
}

/**
 * Strip one function; methods are wrapped in a class or object literal so
 * their modifiers are handled like anywhere else
 */
export function stripFunctionTypes(node: FunctionNode): FunctionNode {
  const stripped = stripTypes(t.file(t.program([wrap(node)])));
  const functions: FunctionNode[] = [];
  t.traverseFast(stripped.program, (current) => {
    if (isFunctionNode(current)) {
      functions.push(current);
    }
  });

  const [first] = functions;
  if (!first) {
    throw new Error('TypeScript removal dropped the function');
  }
  return first;
}

function wrap(node: FunctionNode): t.Statement {
  switch (node.type) {
    case 'FunctionDeclaration':
      return node;
    case 'ClassMethod':
      return t.expressionStatement(t.classExpression(null, null, t.classBody([node])));
    case 'ObjectMethod':
      return t.expressionStatement(t.objectExpression([node]));
    default:
      return t.expressionStatement(node);
  }
}

function isFunctionNode(node: t.Node): node is FunctionNode {
  return (
    t.isFunctionDeclaration(node) ||
    t.isFunctionExpression(node) ||
    t.isArrowFunctionExpression(node) ||
    t.isObjectMethod(node) ||
    t.isClassMethod(node)
  );
}
