import {
  type Action,
  type Context,
  type Effect,
  type EffectFn,
  type Reducer,
  type Result,
  Dispatcher,
  actions,
  kind,
  result,
  sequence,
} from '../core';

interface Add extends Action<'add'> {
  amount: number;
}

interface Clear extends Action<'clear'> {}

const ADD = kind<Add>('add');
const CLEAR = kind<Clear>('clear');

interface Clock {
  now: () => number;
}

interface Labelled {
  label: string;
}

declare const addOnly: Dispatcher<Add>;
declare const both: Dispatcher<Add | Clear>;

Dispatcher.from(ADD, both);
Dispatcher.from(actions(ADD, CLEAR), both);

//@ts-expect-error
Dispatcher.from(CLEAR, addOnly);

declare const addContext: Context<Add>;
declare const broadContext: Context<Add | Clear, Clock>;

addContext.dispatch({ type: 'add', amount: 1 });

//@ts-expect-error
addContext.dispatch({ type: 'clear' });

const narrowed: Context<Add> = broadContext;
const now: number = broadContext.deps.now();

//@ts-expect-error
const widened: Context<Add | Clear> = addContext;

declare const child: Result<number, Add, Clock>;

const absorbed: Result<number, Add | Clear, Clock & Labelled> = child;

//@ts-expect-error
const missingAction: Result<number, Clear, Clock> = child;

//@ts-expect-error
const missingDeps: Result<number, Add> = child;

//@ts-expect-error
const wrongModel: Result<string, Add, Clock> = child;

const stamp: EffectFn<Add, Clock> = (context) => {
  context.dispatch({ type: 'add', amount: context.deps.now() });
};

const timed: Reducer<number, Add, Clock> = (model, action) => result(model + action.amount, stamp);

//@ts-expect-error
const untimed: Reducer<number, Add> = timed;

const clearEffect: EffectFn<Clear> = (context) => context.dispatch({ type: 'clear' });
const clearsAfterAdd: Reducer<number, Add, Clock, Clear> = (model) => result(model, clearEffect);

//@ts-expect-error
const addsAfterAdd: Reducer<number, Add, Clock, Clear> = timed;

const label: EffectFn<Clear, Labelled> = (context) => {
  if (context.deps.label === '') {
    context.dispatch({ type: 'clear' });
  }
};

const combined = sequence(stamp, label);
const runnable: Effect<Add | Clear, Clock & Labelled> = combined;

//@ts-expect-error
const needsLabel: Effect<Add | Clear, Clock> = combined;

export { narrowed, now, widened, absorbed, missingAction, missingDeps, wrongModel, untimed, clearsAfterAdd, addsAfterAdd, runnable, needsLabel };
