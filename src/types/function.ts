/**
 * Function definition and signature types
 *
 * A FunctionDef pairs a Babel function node with the identifier that
 * self-recursive calls use to refer to it.
 */

import type * as t from '@babel/types';

/**
 * Babel nodes that can be trampolined
 */
export type FunctionNode =
  | t.FunctionDeclaration
  | t.FunctionExpression
  | t.ArrowFunctionExpression
  | t.ObjectMethod
  | t.ClassMethod;

/**
 * A function together with the name used to detect self recursion
 */
export interface FunctionDef {
  /** Declaration id, binding name or method key */
  readonly name: string;
  readonly node: FunctionNode;
  /**
   * Held by an object property: like a method, it is reached as
   * `receiver.name(...)`, and a bare `name` refers to an outer binding
   */
  readonly property?: boolean;
}

/**
 * Patterns a parameter may bind
 */
export type BindingPattern = t.Identifier | t.ObjectPattern | t.ArrayPattern;

/**
 * One parameter of a function signature
 */
export interface ParameterSpec {
  /** Binding pattern without its type annotation */
  readonly pattern: BindingPattern;
  /** Declared type, null when unannotated */
  readonly type: t.TSType | null;
  /** Default value expression */
  readonly initializer: t.Expression | null;
  /** `x?: T` or a parameter with a default value */
  readonly optional: boolean;
  /** `...rest` */
  readonly rest: boolean;
}

export interface FunctionSignature {
  readonly name: string;
  /** Parameters in declaration order, excluding a TypeScript `this` parameter */
  readonly parameters: readonly ParameterSpec[];
  /** Declared return type, null when absent (unit) */
  readonly returnType: t.TSType | null;
  /** True when any parameter or the return type carries a TypeScript annotation */
  readonly annotated: boolean;
  readonly async: boolean;
  readonly generator: boolean;
}

/**
 * The signature split into the three lists the rebuilder consumes
 */
export interface SignatureParts {
  readonly patterns: readonly (BindingPattern | t.AssignmentPattern | t.RestElement)[];
  /** Tuple element types, one per parameter */
  readonly types: readonly t.TSType[];
  /** Return type with unit (`void`) substituted when absent */
  readonly returnType: t.TSType;
}
