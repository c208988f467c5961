/**
 * Expression tree types
 *
 * A discriminated union view over Babel nodes. The rewriter switches on
 * `kind` instead of on the many Babel node types.
 */

import type * as t from '@babel/types';
import type { FunctionNode } from './function.js';

export type CallArgument = t.CallExpression['arguments'][number];

export type ExpressionTree =
  | CallTree
  | MethodCallTree
  | MatchTree
  | ConditionalTree
  | BlockTree
  | ReturnTree
  | OpaqueTree
  | OtherTree;

/** `name(args)` */
export interface CallTree {
  readonly kind: 'call';
  readonly node: t.CallExpression;
  readonly callee: string;
  readonly args: readonly CallArgument[];
}

/** `receiver.method(args)` with a statically known method name */
export interface MethodCallTree {
  readonly kind: 'method-call';
  readonly node: t.CallExpression;
  readonly receiver: t.Expression | t.Super;
  readonly method: string;
  readonly args: readonly CallArgument[];
}

/** `switch` statement; each case is one arm */
export interface MatchTree {
  readonly kind: 'match';
  readonly node: t.SwitchStatement;
  readonly scrutinee: t.Expression;
  readonly arms: readonly t.SwitchCase[];
}

export interface ConditionalTree {
  readonly kind: 'conditional';
  readonly node: t.IfStatement | t.ConditionalExpression;
  readonly test: t.Expression;
}

export interface BlockTree {
  readonly kind: 'block';
  readonly node: t.BlockStatement | FunctionNode;
  readonly statements: readonly t.Statement[];
  /** Concise arrow body */
  readonly trailing: t.Expression | null;
}

export interface ReturnTree {
  readonly kind: 'return';
  readonly node: t.ReturnStatement;
  readonly argument: t.Expression | null;
}

/** Already rewritten; passed through untouched */
export interface OpaqueTree {
  readonly kind: 'opaque';
  readonly node: t.Node;
}

export interface OtherTree {
  readonly kind: 'other';
  readonly node: t.Node;
}

/**
 * Per-transformation rewrite settings
 */
export interface RewriteContext {
  /** Name of the function being transformed */
  readonly functionName: string;
  /** Recognise `name(...)` as a self call */
  readonly directCalls: boolean;
  /** Recognise `receiver.name(...)` as a self call */
  readonly methodCalls: boolean;
  /** Close a body that can complete normally with `Return(undefined)` */
  readonly closeFallthrough: boolean;
}

/**
 * Counters collected while rewriting one function
 */
export interface RewriteStats {
  /** Self tail calls turned into Continue */
  continues: number;
  /** Tail values wrapped as Return */
  returns: number;
}
