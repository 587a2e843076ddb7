import type { Action } from './actions/Action';
import type { DomainInput } from './actions/ActionDomain';
import type { NoDeps } from './Deps';
import type { Converter } from './Dispatcher';
import { type Effect, liftEffect, noop } from './Effect';

export const RESULT = Symbol('result');

/**
 * A model paired with the effect to run once it is committed.
 *
 * `Result<M2, A2, D2>` is assignable to `Result<M, A, D>` when `M2` is
 * assignable to `M`, `A2` to `A`, and `D` to `D2`: a parent result can absorb
 * a child's effect when the parent accepts all the child's actions and
 * provides all the child's dependencies.
 */
export interface Result<M, A extends Action = never, D extends object = NoDeps> {
  readonly [RESULT]: true;
  readonly model: M;
  readonly effect: Effect<A, D>;
}

export function result<M, A extends Action = never, D extends object = NoDeps>(
  model: M,
  effect: Effect<A, D> = noop,
): Result<M, A, D> {
  return { [RESULT]: true, model, effect };
}

/**
 * Narrows a reducer's output. Any other value can be tested too; its effect
 * is then typed as runnable by no context.
 */
export function isResult<M, A extends Action, D extends object>(
  value: M | Result<M, A, D>,
): value is Result<M, A, D>;
export function isResult(value: unknown): value is Result<unknown, never, never>;
export function isResult(value: unknown): boolean {
  return typeof value === 'object' && value !== null && RESULT in value;
}

/**
 * Adapts a nested reducer's result to its parent: the model is mapped and the
 * effect's dispatches are converted into the parent's actions.
 */
export function liftResult<M, Child extends Action, ParentM, Parent extends Action, D extends object>(
  child: Result<M, Child, D>,
  mapModel: (model: M) => ParentM,
  domain: DomainInput<Child>,
  converter: Converter<Child, Parent>,
): Result<ParentM, Parent, D> {
  return result(mapModel(child.model), liftEffect(child.effect, domain, converter));
}
