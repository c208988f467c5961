/**
 * Shared test helpers
 */

import * as t from '@babel/types';
import { transformSource, type FunctionDef } from '../src/index.js';

/**
 * Narrow a node or fail the test
 */
export function expectNode<T extends t.Node>(
  node: t.Node | null | undefined,
  guard: (node: t.Node) => node is T
): T {
  if (!node || !guard(node)) {
    throw new Error(`Unexpected node: ${node ? node.type : String(node)}`);
  }
  return node;
}

/**
 * Evaluate a JavaScript module body and return one of its bindings
 */
export function evaluate(code: string, name: string): Function {
  const factory = new Function(`${code}\nreturn ${name};`);
  const value: unknown = factory();
  if (typeof value !== 'function') {
    throw new Error(`${name} is not a function`);
  }
  return value;
}

/**
 * Transform the named function of a JavaScript source and evaluate the module
 */
export function evaluateTransformed(source: string, name: string, binding = name): Function {
  const { code, functions, errors } = transformSource(source, { functions: [name], types: false });
  if (errors.length > 0 || functions.some((f) => f.error)) {
    throw new Error(`transform failed for ${name}`);
  }
  return evaluate(code, binding);
}

/**
 * The statements of a trampolined function's outer body
 */
export function outerStatements(def: FunctionDef): t.Statement[] {
  return expectNode(def.node.body, t.isBlockStatement).body;
}

/**
 * The inner step function of a trampolined function
 */
export function innerStep(def: FunctionDef): t.ArrowFunctionExpression {
  for (const stmt of outerStatements(def)) {
    if (t.isVariableDeclaration(stmt, { kind: 'const' })) {
      const init = stmt.declarations[0]?.init;
      if (t.isArrowFunctionExpression(init)) {
        return init;
      }
    }
  }
  throw new Error(`${def.name} has no step function`);
}

/**
 * Statements of the inner step function's block body
 */
export function innerStatements(def: FunctionDef): t.Statement[] {
  return expectNode(innerStep(def).body, t.isBlockStatement).body;
}

export interface ActionView {
  kind: string;
  /** `state` of a continue action, `value` of a return action */
  payload: t.Node;
}

/**
 * Read `{ kind, state }` / `{ kind, value }` action objects
 */
export function readAction(node: t.Node | null | undefined): ActionView {
  const object = expectNode(node, t.isObjectExpression);
  const [kind, payload] = object.properties;
  const kindProp = expectNode(kind, t.isObjectProperty);
  const payloadProp = expectNode(payload, t.isObjectProperty);
  return {
    kind: expectNode(kindProp.value, t.isStringLiteral).value,
    payload: payloadProp.value,
  };
}

/**
 * Read the action returned by a return statement
 */
export function returnedAction(stmt: t.Statement | undefined): ActionView {
  return readAction(expectNode(stmt, t.isReturnStatement).argument);
}
