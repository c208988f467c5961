/**
 * Parser module exports
 */

export { parse, parseExpression } from './parser.js';
export type { ParseOptions, ParseResult, ParseError } from './parser.js';
export { DEFAULT_TAG, findFunctions, parseFunction } from './functions.js';
export type { DiscoveredFunction, FindOptions, ParseFunctionOptions } from './functions.js';
