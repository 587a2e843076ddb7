import type { Action } from './actions/Action';
import type { NoDeps } from './Deps';
import { type EffectFn, isEmptyEffect } from './Effect';
import { type Result, isResult } from './Result';

/**
 * A reducer either returns the next model or a `Result` carrying an effect;
 * the declared return type says which. `E` is the domain the effect may
 * dispatch into and defaults to the actions the reducer accepts.
 */
export type Reducer<M, A extends Action, D extends object = NoDeps, E extends Action = A> = (
  model: M,
  action: A,
) => M | Result<M, E, D>;

export type EffectHandler<A extends Action, D extends object = NoDeps> = (
  effect: EffectFn<A, D>,
) => void;

/**
 * Applies `reducer` and returns the next model. A non-empty effect is passed to
 * `handler`; by then the next model has already been computed, so a handler
 * that commits before running effects lets them observe the new state.
 */
export function invokeReducer<M, A extends Action, D extends object = NoDeps, E extends Action = A>(
  reducer: Reducer<M, A, D, E>,
  model: M,
  action: A,
  handler: EffectHandler<E, D>,
): M {
  const output = reducer(model, action);
  if (!isResult(output)) {
    return output;
  }
  const { model: next, effect } = output;
  if (effect && !isEmptyEffect(effect)) {
    handler(effect);
  }
  return next;
}
