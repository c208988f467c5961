export { parseArguments, render, run } from './run.js';
export type { CliIO, CliOptions, Format } from './run.js';
