/**
 * Output module exports
 */

export { emitFile, emitFunction } from './emitter.js';
export type { EmitOptions } from './emitter.js';
export { stripFunctionTypes, stripTypes } from './strip-types.js';
