/**
 * Errors raised for input outside the transformation contract
 */

export type TransformErrorCode =
  | 'anonymous'
  | 'generator'
  | 'async'
  | 'accessor'
  | 'constructor'
  | 'parameter'
  | 'return-type'
  | 'arguments'
  | 'parse'
  | 'not-found';

export class TransformError extends Error {
  readonly code: TransformErrorCode;
  /** Function the error refers to, when known */
  readonly functionName: string | undefined;

  constructor(code: TransformErrorCode, message: string, functionName?: string) {
    super(functionName ? `${functionName}: ${message}` : message);
    this.name = 'TransformError';
    this.code = code;
    this.functionName = functionName;
  }
}
