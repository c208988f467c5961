/**
 * Source emission
 *
 * Prints functions and files with @babel/generator.
 */

import { CodeGenerator } from '@babel/generator';
import type * as t from '@babel/types';
import type { FunctionDef } from '../types/index.js';
import { stripFunctionTypes, stripTypes } from './strip-types.js';

export interface EmitOptions {
  /** Keep TypeScript syntax (default: true) */
  types?: boolean;
  /** Keep comments (default: true) */
  comments?: boolean;
}

export function emitFunction(def: FunctionDef, options: EmitOptions = {}): string {
  return print(options.types === false ? stripFunctionTypes(def.node) : def.node, options);
}

export function emitFile(file: t.File, options: EmitOptions = {}): string {
  return print(options.types === false ? stripTypes(file) : file, options);
}

function print(node: t.Node, options: EmitOptions): string {
  return new CodeGenerator(node, { comments: options.comments ?? true }).generate().code;
}
