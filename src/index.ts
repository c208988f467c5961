/**
 * tailrec - stack-safe self tail recursion for JavaScript and TypeScript
 *
 * Rewrites a self tail-recursive function into an outer loop driving an
 * inner step function that returns `Continue(args)` or `Return(value)`.
 */

export * from './types/index.js';

export * from './parser/index.js';

export { admitsUndefined, extractSignature, splitSignature } from './signature/index.js';

export {
  TailCallRewriter,
  classify,
  classifyBody,
  completesNormally,
  findSelfCalls,
  isOpaque,
  isSelfCall,
  isTrampolined,
  markOpaque,
} from './rewrite/index.js';

export { NameAllocator, rebuildFunction } from './rebuild/index.js';

export * from './transform/index.js';

export * from './output/index.js';

export * from './runtime/index.js';
