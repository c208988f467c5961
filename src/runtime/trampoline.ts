/**
 * Trampoline driver for hand-written step functions
 *
 * Runs the same loop the rebuilder emits: call the step function with the
 * current state until it returns a final value.
 */

import { ACTION_CONTINUE, ACTION_RETURN, type ActionResult } from '../types/index.js';

export function next<State>(state: State): ActionResult<State, never> {
  return { kind: ACTION_CONTINUE, state };
}

export function done<Result>(value: Result): ActionResult<never, Result> {
  return { kind: ACTION_RETURN, value };
}

export function trampoline<State, Result>(
  step: (state: State) => ActionResult<State, Result>,
  initial: State
): Result {
  let state = initial;
  for (;;) {
    const action = step(state);
    if (action.kind === ACTION_RETURN) {
      return action.value;
    }
    state = action.state;
  }
}
