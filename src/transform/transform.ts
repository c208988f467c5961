/**
 * Transformation driver
 *
 * transform(f) = rebuild(signature(f), rewrite(body(f)))
 */

import * as t from '@babel/types';
import {
  DEFAULT_TRANSFORM_OPTIONS,
  type FunctionDef,
  type FunctionSignature,
  type RewriteContext,
  type TransformOptions,
} from '../types/index.js';
import { admitsUndefined, extractSignature } from '../signature/index.js';
import { TailCallRewriter, findSelfCalls, isTrampolined } from '../rewrite/index.js';
import { rebuildFunction } from '../rebuild/index.js';
import { TransformError } from './errors.js';

export interface TransformReport {
  readonly name: string;
  /** Self tail calls turned into loop iterations */
  readonly continues: number;
  /** Tail values wrapped as final results */
  readonly returns: number;
  /** Self calls outside tail position; these still grow the stack */
  readonly nonTailSelfCalls: number;
  /** The input already had the trampolined shape and was returned as is */
  readonly alreadyTransformed: boolean;
}

export interface TransformResult {
  readonly def: FunctionDef;
  readonly report: TransformReport;
}

/**
 * Rewrite a self tail-recursive function into a loop over a step function
 */
export function transform(def: FunctionDef, options: TransformOptions = {}): FunctionDef {
  return transformWithReport(def, options).def;
}

export function transformWithReport(def: FunctionDef, options: TransformOptions = {}): TransformResult {
  const opts = { ...DEFAULT_TRANSFORM_OPTIONS, ...options };

  if (isTrampolined(def)) {
    return {
      def,
      report: { name: def.name, continues: 0, returns: 0, nonTailSelfCalls: 0, alreadyTransformed: true },
    };
  }

  assertSupported(def);
  const signature = extractSignature(def);
  if (signature.annotated && signature.returnType === null) {
    throw new TransformError('return-type', 'annotate the return type; the step function cannot infer it', def.name);
  }

  // Work on a copy; the caller keeps its tree
  const working: FunctionDef = { ...def, node: t.cloneNode(def.node, true) };
  const context: RewriteContext = {
    functionName: def.name,
    directCalls: !isMethod(def) && def.property !== true && !bindsOwnName(signature),
    methodCalls: opts.methodCalls,
    closeFallthrough: admitsUndefined(signature),
  };

  const rewriter = new TailCallRewriter(context);
  const body = rewriter.rewriteBody(working.node);
  const rebuilt = rebuildFunction(working, signature, body, opts);

  return {
    def: rebuilt,
    report: {
      name: def.name,
      ...rewriter.stats,
      nonTailSelfCalls: findSelfCalls(body, context).length,
      alreadyTransformed: false,
    },
  };
}

function assertSupported(def: FunctionDef): void {
  const { node, name } = def;
  if (node.generator) {
    throw new TransformError('generator', 'generator functions cannot be trampolined', name);
  }
  if (node.async) {
    throw new TransformError('async', 'async functions cannot be trampolined by a synchronous loop', name);
  }
  if (t.isClassMethod(node) || t.isObjectMethod(node)) {
    if (node.kind === 'constructor') {
      throw new TransformError('constructor', 'constructors cannot be trampolined', name);
    }
    if (node.kind !== 'method') {
      throw new TransformError('accessor', `${node.kind}ters cannot be trampolined`, name);
    }
  }
  if (name.length === 0) {
    throw new TransformError('anonymous', 'function has no name to recurse through');
  }
  const reference = callerReference(node);
  if (reference) {
    throw new TransformError('arguments', `${reference} would refer to the first call only`, name);
  }
}

/**
 * `arguments` or `new.target` read by the function itself, outside nested
 * non-arrow functions
 */
function callerReference(node: FunctionDef['node']): string | null {
  const found: string[] = [];
  for (const root of [...node.params, node.body]) {
    t.traverse(root, (current, ancestors) => {
      if (ancestors.some((slot) => isOwnScope(slot.node)) || isOwnScope(current)) {
        return;
      }
      if (t.isIdentifier(current, { name: 'arguments' }) && isReference(ancestors[ancestors.length - 1])) {
        found.push('arguments');
      } else if (t.isMetaProperty(current) && current.meta.name === 'new' && current.property.name === 'target') {
        found.push('new.target');
      }
    });
  }
  return found[0] ?? null;
}

/**
 * Non-arrow functions bind their own `arguments` and `new.target`
 */
function isOwnScope(node: t.Node): boolean {
  return t.isFunction(node) && !t.isArrowFunctionExpression(node);
}

function isReference(slot: t.TraversalAncestors[number] | undefined): boolean {
  if (!slot) {
    return true;
  }
  const { node, key } = slot;
  if (key === 'property' && t.isMemberExpression(node)) {
    return node.computed;
  }
  if (key === 'key' && (t.isObjectProperty(node) || t.isObjectMethod(node) || t.isClassMethod(node))) {
    return node.computed;
  }
  return true;
}

/**
 * Inside a method a bare `name(...)` refers to an outer binding, not the method
 */
function isMethod(def: FunctionDef): boolean {
  return t.isClassMethod(def.node) || t.isObjectMethod(def.node);
}

/**
 * A parameter with the function's own name shadows it
 */
function bindsOwnName(signature: FunctionSignature): boolean {
  return signature.parameters.some((param) => Object.hasOwn(t.getBindingIdentifiers(param.pattern), signature.name));
}
