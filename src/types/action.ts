/**
 * Result of one step of a trampolined function
 */

export const ACTION_CONTINUE = 'continue';
export const ACTION_RETURN = 'return';

export type ActionResult<State, Result> =
  | { readonly kind: typeof ACTION_CONTINUE; readonly state: State }
  | { readonly kind: typeof ACTION_RETURN; readonly value: Result };
