/**
 * Expression classification
 *
 * Maps Babel nodes onto the expression tree variants the rewriter handles.
 */

import * as t from '@babel/types';
import type { BlockTree, ExpressionTree, FunctionNode } from '../types/index.js';
import { isOpaque } from './guard.js';

export function classify(node: t.Node): ExpressionTree {
  if (isOpaque(node)) {
    return { kind: 'opaque', node };
  }

  switch (node.type) {
    case 'CallExpression': {
      const { callee } = node;
      if (t.isIdentifier(callee)) {
        return { kind: 'call', node, callee: callee.name, args: node.arguments };
      }
      if (t.isMemberExpression(callee)) {
        const method = propertyName(callee);
        if (method !== null) {
          return { kind: 'method-call', node, receiver: callee.object, method, args: node.arguments };
        }
      }
      return { kind: 'other', node };
    }

    case 'SwitchStatement':
      return { kind: 'match', node, scrutinee: node.discriminant, arms: node.cases };

    case 'IfStatement':
    case 'ConditionalExpression':
      return { kind: 'conditional', node, test: node.test };

    case 'BlockStatement':
      return { kind: 'block', node, statements: node.body, trailing: null };

    case 'ReturnStatement':
      return { kind: 'return', node, argument: node.argument ?? null };

    default:
      return { kind: 'other', node };
  }
}

/**
 * View a function body as a block; a concise arrow body is its trailing
 * expression
 */
export function classifyBody(fn: FunctionNode): BlockTree {
  const { body } = fn;
  if (t.isBlockStatement(body)) {
    return { kind: 'block', node: body, statements: body.body, trailing: null };
  }
  return { kind: 'block', node: fn, statements: [], trailing: body };
}

function propertyName(member: t.MemberExpression): string | null {
  const { property } = member;
  if (!member.computed && t.isIdentifier(property)) {
    return property.name;
  }
  if (member.computed && t.isStringLiteral(property)) {
    return property.value;
  }
  return null;
}
