/**
 * Signature module exports
 */

export { admitsUndefined, extractSignature, splitSignature } from './extractor.js';
