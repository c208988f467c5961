/**
 * Rebuild module exports
 */

export { rebuildFunction } from './rebuilder.js';
export { NameAllocator } from './names.js';
