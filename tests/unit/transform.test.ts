/**
 * Tests for the transform driver and the function rebuilder
 */

import { describe, it, expect } from 'vitest';
import * as t from '@babel/types';
import {
  TransformError,
  emitFunction,
  isTrampolined,
  parseFunction,
  transform,
  transformWithReport,
} from '../../src/index.js';
import { expectNode, innerStatements, innerStep, outerStatements, readAction, returnedAction } from '../helpers.js';

const SUM_TO = `
function sumTo(n: number, acc: number): number {
  if (n === 0) {
    return acc;
  }
  return sumTo(n - 1, acc + n);
}
`;

function transformed(source: string, name?: string) {
  return transform(parseFunction(source, { name }));
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TransformError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('transform', () => {
  describe('rebuilt function', () => {
    it('should keep the outer signature and drive a step function in a loop', () => {
      const def = transformed(SUM_TO);
      const node = expectNode(def.node, t.isFunctionDeclaration);

      expect(def.name).toBe('sumTo');
      expect(node.id?.name).toBe('sumTo');
      expect(node.params.map((p) => expectNode(p, t.isIdentifier).name)).toEqual(['n', 'acc']);
      expect(expectNode(node.returnType, t.isTSTypeAnnotation).typeAnnotation.type).toBe('TSNumberKeyword');
      expect(outerStatements(def).map((s) => s.type)).toEqual([
        'TSTypeAliasDeclaration',
        'VariableDeclaration',
        'VariableDeclaration',
        'ForStatement',
      ]);
    });

    it('should print the step function, accumulator and loop', () => {
      const code = emitFunction(transformed(SUM_TO));

      expect(code).toContain(
        'const sumToInner = ([n, acc]: [number, number]): Action<[number, number], number> => {'
      );
      expect(code).toContain('let state: [number, number] = [n, acc];');
      expect(code).toContain('for (;;) {');
      expect(code).toContain('const action = sumToInner(state);');
      expect(code).toContain('return action.value;');
      expect(code).toContain('state = action.state;');
    });

    it('should declare the local result type with both variants', () => {
      const alias = expectNode(outerStatements(transformed(SUM_TO))[0], t.isTSTypeAliasDeclaration);
      const union = expectNode(alias.typeAnnotation, t.isTSUnionType);

      expect(alias.id.name).toBe('Action');
      expect(alias.typeParameters?.params.map((p) => p.name)).toEqual(['C', 'R']);
      expect(union.types).toHaveLength(2);
    });

    it('should not mutate the input function', () => {
      const def = parseFunction(SUM_TO);
      const before = emitFunction(def);
      transform(def);

      expect(emitFunction(def)).toBe(before);
    });

    it('should emit no type syntax for an unannotated function', () => {
      const def = transformed('function sumTo(n, acc) { return n === 0 ? acc : sumTo(n - 1, acc + n); }');
      const code = emitFunction(def);

      expect(outerStatements(def).map((s) => s.type)).toEqual([
        'VariableDeclaration',
        'VariableDeclaration',
        'ForStatement',
      ]);
      expect(code).toContain('let state = [n, acc];');
      expect(code).not.toContain('type Action');
    });

    it('should give an arrow function a block body', () => {
      const def = transformed('const isEven = (n: number): boolean => n === 0 ? true : isEven(n - 1);');
      const node = expectNode(def.node, t.isArrowFunctionExpression);
      const step = innerStep(def);

      expect(node.expression).toBe(false);
      expect(node.body.type).toBe('BlockStatement');
      expect(step.body.type).toBe('ConditionalExpression');
    });

    it('should map each switch arm to its own action', () => {
      const def = transformed(`
        function f(x: number): number {
          switch (x) {
            case 0:
              return 1;
            default:
              return f(x - 1);
          }
        }
      `);
      const [zero, other] = expectNode(innerStatements(def)[0], t.isSwitchStatement).cases;

      const base = returnedAction(zero?.consequent[0]);
      expect(base.kind).toBe('return');
      expect(expectNode(base.payload, t.isNumericLiteral).value).toBe(1);

      const step = returnedAction(other?.consequent[0]);
      expect(step.kind).toBe('continue');
      const [arg] = expectNode(step.payload, t.isArrayExpression).elements;
      expect(expectNode(arg, t.isBinaryExpression).operator).toBe('-');
    });

    it('should leave the body open when the return type excludes undefined', () => {
      const def = transformed(`
        function k(x: 'a' | 'b', n: number): number {
          switch (x) {
            case 'a':
              return n;
            case 'b':
              return k('a', n + 1);
          }
        }
      `);
      expect(innerStatements(def)).toHaveLength(1);
    });
  });

  describe('parameters', () => {
    it('should rename destructured parameters and keep their patterns in the step function', () => {
      const def = transformed(`
        function walk({ node, depth }: Cursor, limit = 10): number {
          if (depth >= limit || !node.next) return depth;
          return walk({ node: node.next, depth: depth + 1 }, limit);
        }
      `);
      const [first, second] = def.node.params;
      const renamed = expectNode(first, t.isIdentifier);
      const defaulted = expectNode(second, t.isAssignmentPattern);
      const [pattern] = innerStep(def).params;
      const [object, limit] = expectNode(pattern, t.isArrayPattern).elements;

      expect(renamed.name).toBe('arg0');
      expect(expectNode(renamed.typeAnnotation, t.isTSTypeAnnotation).typeAnnotation.type).toBe('TSTypeReference');
      expect(expectNode(defaulted.left, t.isIdentifier).name).toBe('limit');
      expect(object?.type).toBe('ObjectPattern');
      expect(expectNode(expectNode(limit, t.isAssignmentPattern).right, t.isNumericLiteral).value).toBe(10);
      expect(emitFunction(def)).toContain('let state: [Cursor, any?] = [arg0, limit];');
    });

    it('should spread a rest parameter into the accumulator', () => {
      const code = emitFunction(
        transformed(`
          function sum(total: number, ...rest: number[]): number {
            return rest.length === 0 ? total : sum(total + rest[0], ...rest.slice(1));
          }
        `)
      );
      expect(code).toContain('let state: [number, ...number[]] = [total, ...rest];');
    });

    it('should keep a this parameter out of the state', () => {
      const def = transformed('function f(this: Ctx, n: number): number { return n > 0 ? f(n - 1) : n; }');

      expect(def.node.params).toHaveLength(2);
      expect(emitFunction(def)).toContain('let state: [number] = [n];');
    });

    it('should not treat a call through a parameter that shadows the name as recursion', () => {
      const { report } = transformWithReport(parseFunction('function f(f, n) { return f(n); }'));
      expect(report.continues).toBe(0);
      expect(report.returns).toBe(1);
    });
  });

  describe('generated names', () => {
    it('should avoid identifiers already used by the function', () => {
      const def = transformed(`
        function loop(state, action) {
          if (state > 0) return loop(state - 1, action);
          return action;
        }
      `);
      const [step, accumulator, driver] = outerStatements(def);
      const stepDecl = expectNode(step, t.isVariableDeclaration).declarations[0];
      const stateDecl = expectNode(accumulator, t.isVariableDeclaration).declarations[0];
      const loopBody = expectNode(expectNode(driver, t.isForStatement).body, t.isBlockStatement);
      const actionDecl = expectNode(loopBody.body[0], t.isVariableDeclaration).declarations[0];

      expect(expectNode(stepDecl?.id, t.isIdentifier).name).toBe('loopInner');
      expect(expectNode(stateDecl?.id, t.isIdentifier).name).toBe('state2');
      expect(expectNode(actionDecl?.id, t.isIdentifier).name).toBe('action2');
    });

    it('should not count property names as taken', () => {
      const code = emitFunction(transformed('function f(n, o) { return n === 0 ? o.state : f(n - 1, { state: n }); }'));

      expect(code).toContain('let state = [n, o];');
      expect(code).toContain('const action = fInner(state);');
    });

    it('should rename the result type when the function uses the name', () => {
      const def = transformed('function f(n: number, a: Action): Action { return n ? f(n - 1, a) : a; }');
      const alias = expectNode(outerStatements(def)[0], t.isTSTypeAliasDeclaration);
      expect(alias.id.name).toBe('Action2');
    });

    it('should honour configured names', () => {
      const def = transform(parseFunction(SUM_TO), {
        innerSuffix: '_step',
        stateName: 'acc0',
        actionName: 'next',
        actionTypeName: 'Step',
      });
      const code = emitFunction(def);

      expect(code).toContain('const sumTo_step = ');
      expect(code).toContain('let acc0: [number, number] = [n, acc];');
      expect(code).toContain('const next = sumTo_step(acc0);');
      expect(code).toContain('type Step<C, R> =');
    });
  });

  describe('directives', () => {
    it('should move directives to the outer body', () => {
      const def = transformed('function f(n) { "use strict"; return n === 0 ? 0 : f(n - 1); }');
      const outer = expectNode(def.node.body, t.isBlockStatement);
      const inner = expectNode(innerStep(def).body, t.isBlockStatement);

      expect(outer.directives.map((d) => d.value.value)).toEqual(['use strict']);
      expect(inner.directives).toEqual([]);
    });
  });

  describe('methods', () => {
    it('should recurse through this in a class method', () => {
      const { def, report } = transformWithReport(
        parseFunction('class Counter { count(n, acc) { return n === 0 ? acc : this.count(n - 1, acc + 1); } }')
      );

      expect(def.node.type).toBe('ClassMethod');
      expect(report.continues).toBe(1);
      const [body] = innerStatements(def);
      const choice = expectNode(expectNode(body, t.isReturnStatement).argument, t.isConditionalExpression);
      expect(readAction(choice.alternate).kind).toBe('continue');
    });

    it('should not treat a bare call inside a method as recursion', () => {
      const { report } = transformWithReport(parseFunction('class A { f(n) { return f(n); } }'));
      expect(report.continues).toBe(0);
    });

    it('should treat a function held by a property like a method', () => {
      const source = 'const o = { f: function (n) { return n === 0 ? 0 : n === 1 ? f(n) : this.f(n - 1); } };';
      const { def, report } = transformWithReport(parseFunction(source));

      expect(def.property).toBe(true);
      expect(report.continues).toBe(1);
      expect(report.returns).toBe(2);
    });

    it('should call a named function expression through its own name', () => {
      const source = 'const o = { g: function f(n) { return n === 0 ? 0 : f(n - 1); } };';
      expect(transformWithReport(parseFunction(source)).report.continues).toBe(1);
    });
  });

  describe('report', () => {
    it('should count self calls left outside tail position', () => {
      const { report } = transformWithReport(
        parseFunction(`
          function recurse(n) {
            if (n === 0) return 0;
            return helper(recurse(n - 1));
          }
        `)
      );

      expect(report).toEqual({
        name: 'recurse',
        continues: 0,
        returns: 2,
        nonTailSelfCalls: 1,
        alreadyTransformed: false,
      });
    });
  });

  describe('idempotence', () => {
    it('should return an already transformed function unchanged', () => {
      const once = transformed(SUM_TO);
      expect(transform(once)).toBe(once);
      expect(transformWithReport(once).report.alreadyTransformed).toBe(true);
    });

    it('should recognise transformed output after printing and parsing it again', () => {
      const code = emitFunction(transformed(SUM_TO));
      const reparsed = parseFunction(code);

      expect(isTrampolined(reparsed)).toBe(true);
      expect(emitFunction(transform(reparsed))).toBe(code);
    });

    it('should not mistake an ordinary function for a transformed one', () => {
      expect(isTrampolined(parseFunction(SUM_TO))).toBe(false);
    });
  });

  describe('unsupported input', () => {
    it.each([
      ['function* f(n) { return f(n); }', 'generator'],
      ['async function f(n) { return f(n); }', 'async'],
      ['const o = { get f() { return 1; } };', 'accessor'],
      ['class A { constructor() {} }', 'constructor'],
    ])('%s -> %s', (source, code) => {
      expect(errorCode(() => transformed(source))).toBe(code);
    });

    it('should reject annotated parameters without a return type', () => {
      const source = 'function sumTo(n: number, acc: number) { return n === 0 ? acc : sumTo(n - 1, acc + n); }';
      expect(errorCode(() => transformed(source))).toBe('return-type');
    });

    it.each([
      ['function f(n) { return n === 0 ? arguments.length : f(n - 1, 1, 2); }', 'arguments'],
      ['function f(n) { const g = () => arguments[0]; return n === 0 ? g() : f(n - 1); }', 'arguments'],
      ['function f(n = arguments.length) { return n === 0 ? 0 : f(n - 1); }', 'arguments'],
      ['function f(n) { return n === 0 ? new.target : f(n - 1); }', 'arguments'],
    ])('%s -> %s', (source, code) => {
      expect(errorCode(() => transformed(source))).toBe(code);
    });

    it('should accept arguments bound by a nested function', () => {
      const source = `
        function f(n) {
          const count = function () { return arguments.length; };
          return n === 0 ? count(1, 2) : f(n - 1, options.arguments);
        }
      `;
      expect(transformWithReport(parseFunction(source)).report.continues).toBe(1);
    });

    it('should name the function in the error message', () => {
      expect(() => transformed('function* gen(n) { return gen(n); }')).toThrow(
        'gen: generator functions cannot be trampolined'
      );
    });
  });
});
