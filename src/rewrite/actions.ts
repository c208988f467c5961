/**
 * Builders for the two action forms of a step function's result
 */

import * as t from '@babel/types';
import { ACTION_CONTINUE, ACTION_RETURN } from '../types/index.js';
import { markOpaque } from './guard.js';

/**
 * `{ kind: 'continue', state: [...args] }`
 */
export function continueAction(args: readonly (t.Expression | t.SpreadElement)[]): t.ObjectExpression {
  return markOpaque(
    t.objectExpression([
      t.objectProperty(t.identifier('kind'), t.stringLiteral(ACTION_CONTINUE)),
      t.objectProperty(t.identifier('state'), t.arrayExpression([...args])),
    ])
  );
}

/**
 * `{ kind: 'return', value }`
 */
export function returnAction(value: t.Expression): t.ObjectExpression {
  return markOpaque(
    t.objectExpression([
      t.objectProperty(t.identifier('kind'), t.stringLiteral(ACTION_RETURN)),
      t.objectProperty(t.identifier('value'), value),
    ])
  );
}

/**
 * `void 0`, the value of a bare `return`
 */
export function unit(): t.Expression {
  return t.unaryExpression('void', t.numericLiteral(0));
}
