import context, { type Spec } from 'json-immutability-helper';
import { type Action, type EffectFn, actions, kind, result } from '../core';
import { QueueEventLoop, Store, specReducer } from '../store';

interface Type {
  total: number;
  resets: number;
}

interface Add extends Action<'add'> {
  amount: number;
}

interface Reset extends Action<'reset'> {}

const ADD = kind<Add>('add');
const RESET = kind<Reset>('reset');

const announce: EffectFn<Reset, { label: string }> = (ctx) => {
  console.log(`${ctx.deps.label} was reset`);
};

const reducer = specReducer<Type, Spec<Type>, Add | Reset, { label: string }>(context, (action, model) => {
  if (action.type === 'add') {
    return { total: ['+', action.amount] };
  }
  if (model.total === 0) {
    return null;
  }
  return result<Spec<Type> | null, Reset, { label: string }>(
    { total: ['=', 0], resets: ['+', 1] },
    announce,
  );
});

const store = new Store({
  actions: actions(ADD, RESET),
  model: { total: 0, resets: 0 },
  reducer,
  deps: { label: 'counter' },
  loop: new QueueEventLoop(),
  effectMode: 'deferred',
});

store.addStateListener((state) => {
  console.log('latest total is', state.total);
});

store.addEventListener('warning', (e) => {
  const error: Error = e.detail;
  console.log('effect failed', error.message);
});

//@ts-expect-error
store.addEventListener('nope', () => null);

store.dispatch({ type: 'add', amount: 2 });
store.dispatch({ type: 'reset' });

//@ts-expect-error
store.dispatch({ type: 'sub', amount: 2 });

store.close();
