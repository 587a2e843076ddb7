import type { Action } from './actions/Action';
import type { DomainInput, MergeActions } from './actions/ActionDomain';
import type { Context } from './Context';
import type { MergeDeps, NoDeps } from './Deps';
import type { Converter } from './Dispatcher';

export type EffectFn<A extends Action = never, D extends object = NoDeps> = (
  context: Context<A, D>,
) => void;

export type Effect<A extends Action = never, D extends object = NoDeps> =
  | EffectFn<A, D>
  | null
  | undefined;

export const noop: EffectFn = () => undefined;

/**
 * True for a missing effect or the `noop` sentinel. Other functions are never
 * considered empty, even if they do nothing.
 */
export function isEmptyEffect<A extends Action, D extends object>(effect: Effect<A, D>): boolean {
  return !effect || effect === noop;
}

export function sequence<
  A1 extends Action = never,
  D1 extends object = NoDeps,
  A2 extends Action = never,
  D2 extends object = NoDeps,
>(a: Effect<A1, D1>, b: Effect<A2, D2>): Effect<MergeActions<A1, A2>, MergeDeps<D1, D2>> {
  if (!a || isEmptyEffect(a)) {
    return !b || isEmptyEffect(b) ? noop : b;
  }
  if (!b || isEmptyEffect(b)) {
    return a;
  }
  const first = a;
  const second = b;
  return (context) => {
    first(context);
    second(context);
  };
}

/**
 * Left-to-right fold of `sequence`. Up to four effects merge their action
 * domains and deps pairwise; longer lists must share one domain.
 */
export function sequenceAll(): EffectFn;
export function sequenceAll<A1 extends Action = never, D1 extends object = NoDeps>(
  a: Effect<A1, D1>,
): Effect<A1, D1>;
export function sequenceAll<
  A1 extends Action = never,
  D1 extends object = NoDeps,
  A2 extends Action = never,
  D2 extends object = NoDeps,
>(a: Effect<A1, D1>, b: Effect<A2, D2>): Effect<MergeActions<A1, A2>, MergeDeps<D1, D2>>;
export function sequenceAll<
  A1 extends Action = never,
  D1 extends object = NoDeps,
  A2 extends Action = never,
  D2 extends object = NoDeps,
  A3 extends Action = never,
  D3 extends object = NoDeps,
>(
  a: Effect<A1, D1>,
  b: Effect<A2, D2>,
  c: Effect<A3, D3>,
): Effect<MergeActions<MergeActions<A1, A2>, A3>, MergeDeps<MergeDeps<D1, D2>, D3>>;
export function sequenceAll<
  A1 extends Action = never,
  D1 extends object = NoDeps,
  A2 extends Action = never,
  D2 extends object = NoDeps,
  A3 extends Action = never,
  D3 extends object = NoDeps,
  A4 extends Action = never,
  D4 extends object = NoDeps,
>(
  a: Effect<A1, D1>,
  b: Effect<A2, D2>,
  c: Effect<A3, D3>,
  d: Effect<A4, D4>,
): Effect<
  MergeActions<MergeActions<MergeActions<A1, A2>, A3>, A4>,
  MergeDeps<MergeDeps<MergeDeps<D1, D2>, D3>, D4>
>;
export function sequenceAll<A extends Action = never, D extends object = NoDeps>(
  ...effects: Effect<A, D>[]
): Effect<A, D>;
export function sequenceAll<A extends Action, D extends object>(...effects: Effect<A, D>[]): Effect<A, D> {
  return effects.reduce<Effect<A, D>>((acc, e) => sequence(acc, e), noop);
}

/**
 * Runs an effect written for a nested domain against a parent context: the
 * child's dispatches go through `converter` into the parent's actions.
 */
export function liftEffect<Child extends Action, Parent extends Action, D extends object>(
  effect: Effect<Child, D>,
  domain: DomainInput<Child>,
  converter: Converter<Child, Parent>,
): Effect<Parent, D> {
  if (!effect || isEmptyEffect(effect)) {
    return noop;
  }
  const run = effect;
  return (context) => run(context.narrow(domain, converter));
}
