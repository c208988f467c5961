/**
 * Transformation options
 */

export interface TransformOptions {
  /** Suffix appended to the function name to name the step function */
  innerSuffix?: string;
  /** Base name of the loop accumulator */
  stateName?: string;
  /** Base name of the per-iteration action binding */
  actionName?: string;
  /** Base name of the local result type */
  actionTypeName?: string;
  /** Treat `receiver.name(...)` as a self call */
  methodCalls?: boolean;
}

export const DEFAULT_TRANSFORM_OPTIONS: Required<TransformOptions> = {
  innerSuffix: 'Inner',
  stateName: 'state',
  actionName: 'action',
  actionTypeName: 'Action',
  methodCalls: true,
};
