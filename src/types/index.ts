/**
 * Type definitions for tailrec
 */

export * from './action.js';
export * from './function.js';
export * from './options.js';
export * from './tree.js';
