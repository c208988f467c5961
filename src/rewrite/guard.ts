/**
 * Idempotence guard
 *
 * Nodes produced by the rewriter are registered as opaque so that any later
 * traversal of the same tree leaves them as they are. Functions that already
 * have the trampolined shape are recognised structurally, which also covers
 * output that was printed and parsed again.
 */

import * as t from '@babel/types';
import type { FunctionDef } from '../types/index.js';

const opaqueNodes = new WeakSet<t.Node>();

export function markOpaque<T extends t.Node>(node: T): T {
  opaqueNodes.add(node);
  return node;
}

export function isOpaque(node: t.Node): boolean {
  return opaqueNodes.has(node);
}

/**
 * Whether a function body already drives an inner step function in a loop
 *
 * Matches: an optional local type alias, `const step = (...) => ...`,
 * `let acc = [...]`, then `for (;;) { const a = step(acc); ... }`.
 */
export function isTrampolined(def: FunctionDef): boolean {
  const { body } = def.node;
  if (!t.isBlockStatement(body)) {
    return false;
  }
  if (isOpaque(body)) {
    return true;
  }

  const statements = body.body.filter((stmt) => !t.isTSTypeAliasDeclaration(stmt));
  if (statements.length !== 3) {
    return false;
  }
  const [stepDecl, stateDecl, loop] = statements;

  const step = singleDeclarator(stepDecl, 'const');
  if (!step || !t.isIdentifier(step.id) || !t.isArrowFunctionExpression(step.init)) {
    return false;
  }
  const state = singleDeclarator(stateDecl, 'let');
  if (!state || !t.isIdentifier(state.id) || !t.isArrayExpression(state.init)) {
    return false;
  }
  if (!t.isForStatement(loop) || loop.test || !t.isBlockStatement(loop.body)) {
    return false;
  }

  const call = singleDeclarator(loop.body.body[0], 'const')?.init;
  return (
    t.isCallExpression(call) &&
    t.isIdentifier(call.callee, { name: step.id.name }) &&
    call.arguments.length === 1 &&
    t.isIdentifier(call.arguments[0], { name: state.id.name })
  );
}

function singleDeclarator(
  stmt: t.Statement | undefined,
  kind: t.VariableDeclaration['kind']
): t.VariableDeclarator | undefined {
  if (!t.isVariableDeclaration(stmt, { kind }) || stmt.declarations.length !== 1) {
    return undefined;
  }
  return stmt.declarations[0];
}
