import {
  type Add,
  type Clear,
  type Sub,
  type Tick,
  ADD,
  ARITHMETIC,
  CLEAR,
  TICK,
  tickToAdd,
} from '../test-helpers/actions';
import { FakeEventLoop } from '../test-helpers/FakeEventLoop';
import { actions } from './actions/ActionDomain';
import { Context } from './Context';
import { Dispatcher } from './Dispatcher';

function setup() {
  const loop = new FakeEventLoop();
  const onArithmetic = mock<(action: Add | Sub) => void>();
  const onClear = mock<(action: Clear) => void>();
  const context = Context.create(
    Dispatcher.empty().on(ARITHMETIC, onArithmetic).on(CLEAR, onClear),
    loop,
    { label: 'test' },
  );
  return { loop, onArithmetic, onClear, context };
}

describe('Context', () => {
  it('forwards dispatched actions to its dispatcher', () => {
    const { context, onArithmetic, onClear } = setup();

    context.dispatch({ type: 'sub', amount: 2 });

    expect(onArithmetic).toHaveBeenCalledWith({ type: 'sub', amount: 2 });
    expect(onClear).not(toHaveBeenCalled());
  });

  it('exposes the host loop through its handle', () => {
    const { context, loop } = setup();
    const fn = () => null;

    context.loop().async(fn);
    context.loop().pause();

    expect(loop.calls).toEqual(['async', 'pause']);
    expect(loop.scheduled).toEqual([fn]);
  });

  it('exposes its dependencies', () => {
    const { context } = setup();
    expect(context.deps).toEqual({ label: 'test' });
  });

  describe('narrow', () => {
    it('forwards actions of the narrower domain to the broad handler', () => {
      const { context, onArithmetic } = setup();

      const narrow = context.narrow(ADD);
      narrow.dispatch({ type: 'add', amount: 5 });

      expect(onArithmetic).toHaveBeenCalledWith({ type: 'add', amount: 5 });
    });

    it('shares the loop handle and dependencies', () => {
      const { context } = setup();

      const narrow = context.narrow(actions(ADD, CLEAR));

      expect(narrow.loop()).toBe(context.loop());
      expect(narrow.deps).toBe(context.deps);
    });

    it('converts actions of another domain', () => {
      const { context, onArithmetic } = setup();

      const child = context.narrow(TICK, tickToAdd);
      child.dispatch({ type: 'tick', steps: 7 });

      expect(onArithmetic).toHaveBeenCalledWith({ type: 'add', amount: 7 });
    });

    it('is implied by assignment to a narrower context type', () => {
      const { context, onClear } = setup();

      const narrow: Context<Clear> = context;
      narrow.dispatch({ type: 'clear' });

      expect(onClear).toHaveBeenCalled({ times: 1 });
    });
  });

  describe('withDeps', () => {
    it('replaces the dependencies and keeps dispatch and loop', () => {
      const { context, onClear } = setup();

      const next = context.withDeps({ label: 'other', limit: 3 });
      next.dispatch({ type: 'clear' });

      expect(next.deps).toEqual({ label: 'other', limit: 3 });
      expect(next.loop()).toBe(context.loop());
      expect(onClear).toHaveBeenCalled({ times: 1 });
    });
  });

  describe('empty', () => {
    it('has no dependencies and no event loop', () => {
      const context = Context.empty();

      expect(context.deps).toEqual({});
      expect(() => context.loop().async(() => null)).throws('Context has no event loop');
    });
  });

  it('can serve effects of a nested domain through a converter', () => {
    const { context, onArithmetic } = setup();
    const ticks: Tick[] = [{ type: 'tick', steps: 1 }, { type: 'tick', steps: 2 }];

    const child = context.narrow(TICK, tickToAdd);
    ticks.forEach(child.dispatch);

    expect(onArithmetic).toHaveBeenCalled({ times: 2 });
    expect(onArithmetic).toHaveBeenCalledWith({ type: 'add', amount: 2 });
  });
});
