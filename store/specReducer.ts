import type { Action } from '../core/actions/Action';
import type { NoDeps } from '../core/Deps';
import type { Reducer } from '../core/invokeReducer';
import { type Result, isResult, result } from '../core/Result';

export interface SpecContext<T, SpecT> {
  update: (input: T, spec: SpecT) => T;
}

/** `null` (or a result holding `null`) leaves the model untouched. */
export type SpecProducer<M, SpecT, A extends Action, D extends object = NoDeps> = (
  action: A,
  model: Readonly<M>,
) => SpecT | Result<SpecT | null, A, D> | null;

/**
 * Builds a reducer from a function describing each change as a spec, applied
 * immutably through `context`.
 */
export function specReducer<M, SpecT, A extends Action, D extends object = NoDeps>(
  context: SpecContext<M, SpecT>,
  produce: SpecProducer<M, SpecT, A, D>,
): Reducer<M, A, D> {
  const apply = (model: M, spec: SpecT | null) => (spec === null ? model : context.update(model, spec));

  return (model, action) => {
    const output = produce(action, model);
    if (isResult<SpecT | null, A, D>(output)) {
      return result(apply(model, output.model), output.effect);
    }
    return apply(model, output);
  };
}
