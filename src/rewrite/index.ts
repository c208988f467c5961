/**
 * Rewrite module exports
 */

export { continueAction, returnAction, unit } from './actions.js';
export { classify, classifyBody } from './classify.js';
export { completesNormally } from './completion.js';
export { isOpaque, isTrampolined, markOpaque } from './guard.js';
export { TailCallRewriter, findSelfCalls, isSelfCall } from './rewriter.js';
