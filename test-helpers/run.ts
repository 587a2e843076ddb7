import type { Action } from '../core/actions/Action';
import type { Context } from '../core/Context';
import type { Effect } from '../core/Effect';

export function run<A extends Action, D extends object>(effect: Effect<A, D>, context: Context<A, D>) {
  if (!effect) {
    throw new Error('expected an effect');
  }
  effect(context);
}

export function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return null;
}
