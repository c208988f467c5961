/**
 * Tail-position rewriter
 *
 * Finds every tail position of a function body and replaces the expression
 * there with an action: `Continue` with the argument tuple of a self tail
 * call, or `Return` with any other value. Rewritten nodes are opaque, so
 * rewriting a body twice gives the same tree as rewriting it once.
 */

import * as t from '@babel/types';
import type { CallArgument, ExpressionTree, FunctionNode, RewriteContext, RewriteStats } from '../types/index.js';
import { continueAction, returnAction, unit } from './actions.js';
import { classify, classifyBody } from './classify.js';
import { completesNormally } from './completion.js';

export class TailCallRewriter {
  readonly stats: RewriteStats = { continues: 0, returns: 0 };

  constructor(private readonly context: RewriteContext) {}

  /**
   * Rewrite the body of `fn` in place and return it
   */
  rewriteBody(fn: FunctionNode): t.BlockStatement | t.Expression {
    const body = classifyBody(fn);

    if (body.trailing) {
      return this.rewriteTail(body.trailing, true);
    }

    this.rewriteStatements(body.statements, true);
    const block = t.isBlockStatement(body.node) ? body.node : t.blockStatement([...body.statements]);

    // Falling off the end yields undefined
    if (this.context.closeFallthrough && completesNormally(block.body)) {
      block.body.push(t.returnStatement(this.wrapReturn(unit())));
    }
    return block;
  }

  /**
   * Rewrite an expression in tail position. `tailCalls` is false where a
   * self call must still return to its caller (inside `try`).
   */
  rewriteTail(expr: t.Expression, tailCalls: boolean): t.Expression {
    const tree = classify(expr);

    switch (tree.kind) {
      case 'opaque':
        return expr;

      case 'call':
      case 'method-call':
        if (tailCalls && isSelfCall(tree, this.context)) {
          return this.wrapContinue(tree.args) ?? this.wrapReturn(expr);
        }
        return this.wrapReturn(expr);

      case 'conditional':
        if (t.isConditionalExpression(tree.node)) {
          tree.node.consequent = this.rewriteTail(tree.node.consequent, tailCalls);
          tree.node.alternate = this.rewriteTail(tree.node.alternate, tailCalls);
          return tree.node;
        }
        return this.wrapReturn(expr);

      default:
        return this.wrapReturn(expr);
    }
  }

  private rewriteStatements(statements: readonly t.Statement[], tailCalls: boolean): void {
    for (const stmt of statements) {
      this.rewriteStatement(stmt, tailCalls);
    }
  }

  private rewriteStatement(stmt: t.Statement, tailCalls: boolean): void {
    const tree = classify(stmt);

    switch (tree.kind) {
      case 'return':
        tree.node.argument = tree.argument ? this.rewriteTail(tree.argument, tailCalls) : this.wrapReturn(unit());
        break;

      case 'block':
        this.rewriteStatements(tree.statements, tailCalls);
        break;

      case 'conditional':
        if (t.isIfStatement(tree.node)) {
          this.rewriteStatement(tree.node.consequent, tailCalls);
          if (tree.node.alternate) {
            this.rewriteStatement(tree.node.alternate, tailCalls);
          }
        }
        break;

      case 'match':
        for (const arm of tree.arms) {
          this.rewriteStatements(arm.consequent, tailCalls);
        }
        break;

      case 'opaque':
        break;

      default:
        this.rewriteNested(stmt, tailCalls);
    }
  }

  /**
   * Statements that only matter for the `return`s they contain
   */
  private rewriteNested(stmt: t.Statement, tailCalls: boolean): void {
    switch (stmt.type) {
      case 'ForStatement':
      case 'ForInStatement':
      case 'ForOfStatement':
      case 'WhileStatement':
      case 'DoWhileStatement':
      case 'LabeledStatement':
      case 'WithStatement':
        this.rewriteStatement(stmt.body, tailCalls);
        break;

      case 'TryStatement':
        // The handler or finalizer has to run after a call in the protected block
        this.rewriteStatements(stmt.block.body, false);
        if (stmt.handler) {
          this.rewriteStatements(stmt.handler.body.body, tailCalls && !stmt.finalizer);
        }
        if (stmt.finalizer) {
          this.rewriteStatements(stmt.finalizer.body, tailCalls);
        }
        break;

      default:
        // Expression statements, declarations and nested functions hold no tail position
        break;
    }
  }

  private wrapContinue(args: readonly CallArgument[]): t.Expression | null {
    if (!args.every((arg): arg is t.Expression | t.SpreadElement => t.isExpression(arg) || t.isSpreadElement(arg))) {
      return null;
    }
    this.stats.continues++;
    return continueAction(args);
  }

  private wrapReturn(value: t.Expression): t.Expression {
    this.stats.returns++;
    return returnAction(value);
  }
}

export function isSelfCall(tree: ExpressionTree, context: RewriteContext): boolean {
  switch (tree.kind) {
    case 'call':
      return context.directCalls && tree.callee === context.functionName;
    case 'method-call':
      return context.methodCalls && tree.method === context.functionName;
    default:
      return false;
  }
}

/**
 * Self calls that remain ordinary calls: those outside tail position
 */
export function findSelfCalls(root: t.Node, context: RewriteContext): t.CallExpression[] {
  const calls: t.CallExpression[] = [];
  t.traverseFast(root, (node) => {
    if (t.isCallExpression(node) && isSelfCall(classify(node), context)) {
      calls.push(node);
    }
  });
  return calls;
}
