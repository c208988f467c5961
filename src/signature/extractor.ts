/**
 * Signature extraction
 *
 * Decomposes a function's parameter list into binding patterns and types,
 * and reads its return type.
 */

import * as t from '@babel/types';
import type {
  BindingPattern,
  FunctionDef,
  FunctionSignature,
  ParameterSpec,
  SignatureParts,
} from '../types/index.js';
import { TransformError } from '../transform/errors.js';

type ParameterNode = FunctionDef['node']['params'][number];

/**
 * Extract the signature of a function
 */
export function extractSignature(def: FunctionDef): FunctionSignature {
  const { node } = def;
  const parameters: ParameterSpec[] = [];
  let annotated = readType(node.returnType) !== null;

  for (const param of node.params) {
    if (isThisParameter(param)) {
      continue;
    }
    const spec = extractParameter(param, def.name);
    annotated ||= spec.type !== null;
    parameters.push(spec);
  }

  return {
    name: def.name,
    parameters,
    returnType: readType(node.returnType),
    annotated,
    async: node.async,
    generator: node.generator,
  };
}

/**
 * Split a signature into ordered patterns, ordered tuple element types and
 * the return type (unit when absent)
 */
export function splitSignature(signature: FunctionSignature): SignatureParts {
  const { parameters } = signature;

  // Optional elements may only form the tail of a tuple type
  let optionalTail = parameters.length;
  while (optionalTail > 0) {
    const previous = parameters[optionalTail - 1];
    if (!previous || previous.rest || !previous.optional) {
      break;
    }
    optionalTail--;
  }

  const patterns = parameters.map(innerPattern);
  const types = parameters.map((param, index): t.TSType => {
    if (param.rest) {
      return t.tsRestType(param.type ? t.cloneNode(param.type) : t.tsArrayType(t.tsAnyKeyword()));
    }
    const type = param.type ? t.cloneNode(param.type) : t.tsAnyKeyword();
    if (!param.optional) {
      return type;
    }
    return index >= optionalTail ? t.tsOptionalType(type) : t.tsUnionType([type, t.tsUndefinedKeyword()]);
  });

  return {
    patterns,
    types,
    returnType: signature.returnType ? t.cloneNode(signature.returnType) : t.tsVoidKeyword(),
  };
}

/**
 * Whether a function with this signature may evaluate to `undefined` by
 * falling off the end of its body
 */
export function admitsUndefined(signature: FunctionSignature): boolean {
  const { returnType } = signature;
  return !signature.annotated || returnType === null || typeAdmitsUndefined(returnType);
}

function typeAdmitsUndefined(type: t.TSType): boolean {
  switch (type.type) {
    case 'TSVoidKeyword':
    case 'TSUndefinedKeyword':
    case 'TSAnyKeyword':
    case 'TSUnknownKeyword':
      return true;
    case 'TSUnionType':
      return type.types.some(typeAdmitsUndefined);
    case 'TSParenthesizedType':
      return typeAdmitsUndefined(type.typeAnnotation);
    default:
      return false;
  }
}

function extractParameter(param: ParameterNode, functionName: string): ParameterSpec {
  switch (param.type) {
    case 'Identifier':
      return {
        pattern: bare(param),
        type: readType(param.typeAnnotation),
        initializer: null,
        optional: param.optional === true,
        rest: false,
      };

    case 'ObjectPattern':
    case 'ArrayPattern':
      return {
        pattern: bare(param),
        type: readType(param.typeAnnotation),
        initializer: null,
        optional: param.type === 'ArrayPattern' && param.optional === true,
        rest: false,
      };

    case 'AssignmentPattern': {
      const left = asBinding(param.left, functionName);
      return {
        pattern: bare(left),
        type: readType(left.typeAnnotation),
        initializer: param.right,
        optional: true,
        rest: false,
      };
    }

    case 'RestElement': {
      const argument = asBinding(param.argument, functionName);
      return {
        pattern: bare(argument),
        type: readType(param.typeAnnotation) ?? readType(argument.typeAnnotation),
        initializer: null,
        optional: false,
        rest: true,
      };
    }

    default:
      throw new TransformError('parameter', `unsupported parameter kind ${param.type}`, functionName);
  }
}

/**
 * Pattern used by the inner step function: the binding plus its default or
 * rest marker
 */
function innerPattern(param: ParameterSpec): BindingPattern | t.AssignmentPattern | t.RestElement {
  const pattern = t.cloneNode(param.pattern);
  if (param.rest) {
    return t.restElement(pattern);
  }
  if (param.initializer) {
    return t.assignmentPattern(pattern, t.cloneNode(param.initializer));
  }
  return pattern;
}

function asBinding(node: t.Node, functionName: string): BindingPattern {
  if (t.isIdentifier(node) || t.isObjectPattern(node) || t.isArrayPattern(node)) {
    return node;
  }
  throw new TransformError('parameter', `unsupported parameter target ${node.type}`, functionName);
}

/**
 * Copy of a pattern without its type annotation and optional marker
 */
function bare(pattern: BindingPattern): BindingPattern {
  const copy = t.cloneNode(pattern);
  copy.typeAnnotation = null;
  if (t.isIdentifier(copy) || t.isArrayPattern(copy)) {
    copy.optional = null;
  }
  return copy;
}

function readType(annotation: t.TypeAnnotation | t.TSTypeAnnotation | t.Noop | null | undefined): t.TSType | null {
  return t.isTSTypeAnnotation(annotation) ? annotation.typeAnnotation : null;
}

function isThisParameter(param: ParameterNode): boolean {
  return t.isIdentifier(param) && param.name === 'this';
}
