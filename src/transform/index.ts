/**
 * Transform module exports
 */

export { TransformError } from './errors.js';
export type { TransformErrorCode } from './errors.js';
export { transform, transformWithReport } from './transform.js';
export type { TransformReport, TransformResult } from './transform.js';
export { transformSource } from './source.js';
export type { FunctionOutcome, SourceTransformOptions, SourceTransformResult } from './source.js';
