import type { Action } from '../core/actions/Action';
import type { DomainInput } from '../core/actions/ActionDomain';
import { Context } from '../core/Context';
import type { NoDeps } from '../core/Deps';
import { Dispatcher } from '../core/Dispatcher';
import { CLOSED_MESSAGE, StoreClosedError } from '../core/errors';
import type { EffectFn } from '../core/Effect';
import { type Reducer, invokeReducer } from '../core/invokeReducer';
import type { EventLoop } from '../core/loop/EventLoop';
import { QueueEventLoop } from './loop/QueueEventLoop';
import { TypedEventTarget } from './helpers/TypedEventTarget';

export type EffectMode = 'eager' | 'deferred';

export interface StoreConfig<M, A extends Action, D extends object = NoDeps> {
  actions: DomainInput<A>;
  model: M;
  reducer: Reducer<M, A, D>;
  deps: D;
  loop?: EventLoop | undefined;
  effectMode?: EffectMode | undefined;
}

type StoreEvents = {
  warning: Error;
};

type StateListener<M> = (model: Readonly<M>) => void;

export class Store<M, A extends Action, D extends object = NoDeps> extends TypedEventTarget<StoreEvents> {
  private _model: M;
  private _closed = false;
  private _processing = false;
  private readonly _pending: A[] = [];
  private readonly _listeners = new Set<StateListener<M>>();
  private readonly _reducer: Reducer<M, A, D>;
  private readonly _effectMode: EffectMode;
  private readonly _ownedLoop: QueueEventLoop | null;

  /** The context every effect of this store runs against. */
  public readonly context: Context<A, D>;

  public constructor({
    actions,
    model,
    reducer,
    deps,
    loop,
    effectMode = 'eager',
  }: StoreConfig<M, A, D>) {
    super();
    this._model = model;
    this._reducer = reducer;
    this._effectMode = effectMode;
    let hostLoop: EventLoop;
    if (loop) {
      hostLoop = loop;
      this._ownedLoop = null;
    } else {
      const ownLoop = new QueueEventLoop();
      hostLoop = ownLoop;
      this._ownedLoop = ownLoop;
    }
    this.context = Context.create(Dispatcher.of(actions, this.dispatch), hostLoop, deps);
  }

  /**
   * Actions dispatched while another is being processed (typically by an
   * effect) are queued and handled once the current one is done.
   */
  public readonly dispatch = (action: A) => {
    if (this._closed) {
      throw new StoreClosedError(CLOSED_MESSAGE);
    }
    this._pending.push(action);
    if (this._processing) {
      return;
    }
    this._processing = true;
    try {
      while (this._pending.length > 0) {
        this._process(this._pending.shift()!);
      }
    } catch (e) {
      this._pending.length = 0;
      throw e;
    } finally {
      this._processing = false;
    }
  };

  private _process(action: A) {
    const effects: EffectFn<A, D>[] = [];
    const next = invokeReducer(this._reducer, this._model, action, (effect) => {
      effects.push(effect);
    });
    this._setModel(next);
    for (const effect of effects) {
      if (this._effectMode === 'eager') {
        this._run(effect);
      } else {
        this.context.loop().async(() => this._run(effect));
      }
    }
  }

  private _run(effect: EffectFn<A, D>) {
    try {
      effect(this.context);
    } catch (e) {
      this._warn(e instanceof Error ? e : new Error(`effect failed: ${e}`));
    }
  }

  private _setModel(model: M) {
    if (model === this._model) {
      return;
    }
    this._model = model;
    for (const listener of this._listeners) {
      listener(model);
    }
  }

  public getState(): Readonly<M> {
    return this._model;
  }

  public addStateListener(listener: StateListener<M>) {
    this._listeners.add(listener);
    listener(this._model);
  }

  public removeStateListener(listener: StateListener<M>) {
    this._listeners.delete(listener);
  }

  private _warn(error: Error) {
    this.emit('warning', error);
  }

  public close() {
    this._closed = true;
    this._pending.length = 0;
    this._listeners.clear();
    this.context.loop().release();
    this._ownedLoop?.finish();
  }
}
