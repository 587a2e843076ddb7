import type { Action } from './actions/Action';
import type { DomainInput } from './actions/ActionDomain';
import { type Converter, Dispatcher } from './Dispatcher';
import type { NoDeps } from './Deps';
import type { EventLoop } from './loop/EventLoop';
import { EventLoopHandle } from './loop/EventLoopHandle';

/**
 * Everything an effect can touch: a dispatcher, the store's event loop and the
 * store's dependencies.
 *
 * A context over a broad action domain is assignable to a context over any
 * narrower one, and to any context needing a subset of its dependencies.
 * Contexts share one loop handle with the store that created them and must not
 * be used after that store is closed.
 */
export class Context<A extends Action = never, D extends object = NoDeps> {
  private constructor(
    private readonly _dispatcher: Dispatcher<A>,
    private readonly _loop: EventLoopHandle,
    public readonly deps: D,
  ) {}

  public static create<A extends Action, D extends object>(
    dispatcher: Dispatcher<A>,
    loop: EventLoop,
    deps: D,
  ): Context<A, D> {
    return new Context(dispatcher, new EventLoopHandle(loop), deps);
  }

  public static empty(): Context {
    return new Context<never, NoDeps>(
      Dispatcher.empty(),
      EventLoopHandle.detached(),
      {},
    );
  }

  public readonly dispatch = (action: A) => {
    this._dispatcher.dispatch(action);
  };

  public loop(): EventLoopHandle {
    return this._loop;
  }

  public narrow<A2 extends A>(domain: DomainInput<A2>): Context<A2, D>;

  public narrow<A2 extends Action>(domain: DomainInput<A2>, converter: Converter<A2, A>): Context<A2, D>;

  public narrow(domain: DomainInput<A>, converter?: Converter<A, A>): Context<A, D> {
    const dispatcher = converter
      ? Dispatcher.from(domain, this._dispatcher, converter)
      : Dispatcher.from(domain, this._dispatcher);
    return new Context(dispatcher, this._loop, this.deps);
  }

  public withDeps<D2 extends object>(deps: D2): Context<A, D2> {
    return new Context(this._dispatcher, this._loop, deps);
  }
}
