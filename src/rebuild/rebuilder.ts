/**
 * Function rebuilder
 *
 * Assembles the trampolined function: a local `Action` result type, an
 * inner step function taking the argument tuple, and the outer function with
 * the original signature driving the step function in a loop.
 */

import * as t from '@babel/types';
import {
  ACTION_CONTINUE,
  ACTION_RETURN,
  type FunctionDef,
  type FunctionSignature,
  type TransformOptions,
} from '../types/index.js';
import { splitSignature } from '../signature/index.js';
import { markOpaque } from '../rewrite/index.js';
import { TransformError } from '../transform/errors.js';
import { NameAllocator } from './names.js';

type OuterParameter = t.Identifier | t.AssignmentPattern | t.RestElement;

interface GeneratedNames {
  inner: string;
  state: string;
  action: string;
  actionType: string;
}

/**
 * Build the trampolined form of `def` around an already rewritten body
 */
export function rebuildFunction(
  def: FunctionDef,
  signature: FunctionSignature,
  body: t.BlockStatement | t.Expression,
  options: Required<TransformOptions>
): FunctionDef {
  const allocator = new NameAllocator(def.node, [def.name]);
  const names: GeneratedNames = {
    inner: allocator.allocate(`${def.name}${options.innerSuffix}`),
    state: allocator.allocate(options.stateName),
    action: allocator.allocate(options.actionName),
    actionType: allocator.allocate(options.actionTypeName),
  };

  const { patterns, types, returnType } = splitSignature(signature);
  const typed = signature.annotated;
  const stateType = (): t.TSType => t.tsTupleType(types.map((type) => t.cloneNode(type)));
  const { params, initial } = outerParameters(def, allocator);

  const statements: t.Statement[] = [];
  if (typed) {
    statements.push(actionTypeAlias(names.actionType));
  }

  // const fInner = ([a, b]: [A, B]): Action<[A, B], R> => body;
  const innerParam = t.arrayPattern([...patterns]);
  const inner = t.arrowFunctionExpression([innerParam], body);
  if (typed) {
    innerParam.typeAnnotation = t.tsTypeAnnotation(stateType());
    inner.returnType = t.tsTypeAnnotation(
      t.tsTypeReference(t.identifier(names.actionType), t.tsTypeParameterInstantiation([stateType(), returnType]))
    );
  }
  statements.push(t.variableDeclaration('const', [t.variableDeclarator(t.identifier(names.inner), inner)]));

  // let state: [A, B] = [a, b];
  const stateId = t.identifier(names.state);
  if (typed) {
    stateId.typeAnnotation = t.tsTypeAnnotation(stateType());
  }
  statements.push(t.variableDeclaration('let', [t.variableDeclarator(stateId, t.arrayExpression(initial))]));
  statements.push(driveLoop(names));

  // Directives are illegal under the step function's destructuring parameter
  const directives = t.isBlockStatement(body) ? body.directives.splice(0) : [];

  const node = t.cloneNode(def.node, false);
  node.params = params;
  node.body = markOpaque(t.blockStatement(statements, directives));
  if (t.isArrowFunctionExpression(node)) {
    node.expression = false;
  }
  return { ...def, node };
}

/**
 * for (;;) {
 *   const action = fInner(state);
 *   if (action.kind === 'return') {
 *     return action.value;
 *   }
 *   state = action.state;
 * }
 */
function driveLoop(names: GeneratedNames): t.ForStatement {
  const field = (name: string): t.MemberExpression => t.memberExpression(t.identifier(names.action), t.identifier(name));

  return t.forStatement(
    null,
    null,
    null,
    t.blockStatement([
      t.variableDeclaration('const', [
        t.variableDeclarator(
          t.identifier(names.action),
          t.callExpression(t.identifier(names.inner), [t.identifier(names.state)])
        ),
      ]),
      t.ifStatement(
        t.binaryExpression('===', field('kind'), t.stringLiteral(ACTION_RETURN)),
        t.blockStatement([t.returnStatement(field('value'))])
      ),
      t.expressionStatement(t.assignmentExpression('=', t.identifier(names.state), field('state'))),
    ])
  );
}

/**
 * type Action<C, R> = { kind: 'continue'; state: C } | { kind: 'return'; value: R };
 */
function actionTypeAlias(name: string): t.TSTypeAliasDeclaration {
  const variant = (kind: string, field: string, parameter: string): t.TSTypeLiteral =>
    t.tsTypeLiteral([
      t.tsPropertySignature(t.identifier('kind'), t.tsTypeAnnotation(t.tsLiteralType(t.stringLiteral(kind)))),
      t.tsPropertySignature(t.identifier(field), t.tsTypeAnnotation(t.tsTypeReference(t.identifier(parameter)))),
    ]);

  return t.tsTypeAliasDeclaration(
    t.identifier(name),
    t.tsTypeParameterDeclaration([t.tsTypeParameter(null, null, 'C'), t.tsTypeParameter(null, null, 'R')]),
    t.tsUnionType([variant(ACTION_CONTINUE, 'state', 'C'), variant(ACTION_RETURN, 'value', 'R')])
  );
}

/**
 * Outer parameter list and the initial accumulator
 *
 * Destructuring parameters get a fresh name in the outer signature (same
 * type, same default); their patterns live on in the step function.
 */
function outerParameters(
  def: FunctionDef,
  allocator: NameAllocator
): { params: OuterParameter[]; initial: (t.Expression | t.SpreadElement)[] } {
  const params: OuterParameter[] = [];
  const initial: (t.Expression | t.SpreadElement)[] = [];
  let index = 0;

  const rename = (pattern: t.Node): t.Identifier => {
    const id = t.identifier(allocator.allocate(`arg${index}`));
    if (t.isObjectPattern(pattern) || t.isArrayPattern(pattern)) {
      id.typeAnnotation = pattern.typeAnnotation ?? null;
      id.optional = t.isArrayPattern(pattern) ? pattern.optional ?? null : null;
    }
    return id;
  };

  for (const param of def.node.params) {
    switch (param.type) {
      case 'Identifier':
        params.push(param);
        if (param.name !== 'this') {
          initial.push(t.identifier(param.name));
        }
        break;

      case 'ObjectPattern':
      case 'ArrayPattern': {
        const id = rename(param);
        params.push(id);
        initial.push(t.identifier(id.name));
        break;
      }

      case 'AssignmentPattern': {
        const left = t.isIdentifier(param.left) ? param.left : rename(param.left);
        params.push(left === param.left ? param : t.assignmentPattern(left, param.right));
        initial.push(t.identifier(left.name));
        break;
      }

      case 'RestElement': {
        const argument = t.isIdentifier(param.argument) ? param.argument : rename(param.argument);
        const rest = argument === param.argument ? param : t.restElement(argument);
        if (rest !== param) {
          rest.typeAnnotation = param.typeAnnotation ?? null;
        }
        params.push(rest);
        initial.push(t.spreadElement(t.identifier(argument.name)));
        break;
      }

      default:
        throw new TransformError('parameter', `unsupported parameter kind ${param.type}`, def.name);
    }
    index++;
  }

  return { params, initial };
}
