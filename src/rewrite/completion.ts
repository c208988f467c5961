/**
 * Normal-completion analysis
 *
 * Decides whether control can reach the end of a statement list. The answer
 * is conservative: `true` unless every path provably leaves by `return` or
 * `throw`.
 */

import * as t from '@babel/types';

export function completesNormally(statements: readonly t.Statement[]): boolean {
  return statements.every(canComplete);
}

function canComplete(stmt: t.Statement): boolean {
  switch (stmt.type) {
    case 'ReturnStatement':
    case 'ThrowStatement':
      return false;

    case 'BlockStatement':
      return completesNormally(stmt.body);

    case 'IfStatement':
      return !stmt.alternate || canComplete(stmt.consequent) || canComplete(stmt.alternate);

    case 'SwitchStatement': {
      // Cases fall through, so every entry passes the last clause
      const last = stmt.cases[stmt.cases.length - 1];
      const hasDefault = stmt.cases.some((c) => c.test == null);
      if (!last || !hasDefault || containsJump(stmt, 'BreakStatement')) {
        return true;
      }
      return completesNormally(last.consequent);
    }

    case 'WhileStatement':
    case 'ForStatement':
      return !isAlwaysTrue(stmt.test) || containsJump(stmt.body, 'BreakStatement');

    case 'DoWhileStatement':
      if (containsJump(stmt.body, 'BreakStatement')) {
        return true;
      }
      if (isAlwaysTrue(stmt.test)) {
        return false;
      }
      return canComplete(stmt.body) || containsJump(stmt.body, 'ContinueStatement');

    case 'LabeledStatement':
      return canComplete(stmt.body) || containsJump(stmt.body, 'BreakStatement');

    case 'TryStatement':
      if (stmt.finalizer && !completesNormally(stmt.finalizer.body)) {
        return false;
      }
      return completesNormally(stmt.block.body) || (stmt.handler != null && completesNormally(stmt.handler.body.body));

    default:
      return true;
  }
}

/** `for (;;)` and `while (true)` */
function isAlwaysTrue(test: t.Expression | null | undefined): boolean {
  return test == null || t.isBooleanLiteral(test, { value: true });
}

/**
 * Whether a jump statement occurs anywhere below `node`, nested functions
 * excluded
 */
function containsJump(node: t.Node, type: 'BreakStatement' | 'ContinueStatement'): boolean {
  let found = false;
  t.traverse(node, (inner, ancestors) => {
    if (inner.type === type && !ancestors.some((a) => t.isFunction(a.node))) {
      found = true;
    }
  });
  return found;
}
