import { type Action, type ActionKind, converts } from './actions/Action';
import {
  type ActionDomain,
  type DomainInput,
  asDomain,
  describeDomain,
} from './actions/ActionDomain';
import { IncompatibleActionsError, UnhandledActionError } from './errors';

export type Handler<A> = (action: A) => void;

export type Converter<From, To> = (action: From) => To;

interface Route {
  readonly _kind: ActionKind;
  readonly _handler: Handler<Action>;
}

/**
 * Routes each action to the handler registered for the first member of its
 * domain that accepts the action's tag.
 *
 * Only `dispatch` mentions the action type, so a dispatcher over a broad
 * domain is assignable to a dispatcher over any narrower one.
 */
export class Dispatcher<A extends Action> {
  private constructor(
    private readonly _domain: ActionDomain,
    private readonly _routes: readonly Route[],
  ) {}

  public static empty(): Dispatcher<never> {
    return new Dispatcher<never>({ kinds: [] }, []);
  }

  /**
   * One handler for every member of `domain`, optionally fed through a
   * converter first.
   */
  public static of<A extends Action>(domain: DomainInput<A>, handler: Handler<A>): Dispatcher<A>;

  public static of<A extends Action, B>(
    domain: DomainInput<A>,
    handler: Handler<B>,
    converter: Converter<A, B>,
  ): Dispatcher<A>;

  public static of<A extends Action>(
    domain: DomainInput<A>,
    handler: Handler<A>,
    converter?: Converter<A, A>,
  ): Dispatcher<A> {
    const d = asDomain(domain);
    const forward = converter ? converting(handler, converter) : handler;
    return new Dispatcher<A>(
      d,
      d.kinds.map((k) => route(k, forward)),
    );
  }

  /**
   * A view of `other` for `domain`.
   *
   * Without a converter every member of `domain` is bound to the handler of
   * the first member of `other`'s domain it converts into; with a converter,
   * converted actions are routed by `other` as they arrive.
   */
  public static from<A extends B, B extends Action>(
    domain: DomainInput<A>,
    other: Dispatcher<B>,
  ): Dispatcher<A>;

  public static from<A extends Action, B extends Action>(
    domain: DomainInput<A>,
    other: Dispatcher<B>,
    converter: Converter<A, B>,
  ): Dispatcher<A>;

  public static from<A extends Action>(
    domain: DomainInput<A>,
    other: Dispatcher<A>,
    converter?: Converter<A, A>,
  ): Dispatcher<A> {
    const d = asDomain(domain);
    if (converter) {
      const forward = converting(other.dispatch, converter);
      return new Dispatcher<A>(
        d,
        d.kinds.map((k) => route(k, forward)),
      );
    }
    return new Dispatcher<A>(
      d,
      d.kinds.map((k) => {
        const target = other._routes.find((r) => converts(k, r._kind));
        if (!target) {
          throw new IncompatibleActionsError(
            `No action in ${describeDomain(other._domain)} accepts ${k.name}`,
          );
        }
        return { _kind: k, _handler: target._handler };
      }),
    );
  }

  /** A dispatcher that also sends actions of `kind` to `handler`. */
  public on<B extends Action>(kind: ActionKind<B>, handler: Handler<B>): Dispatcher<A | B> {
    return new Dispatcher<A | B>({ kinds: [...this._domain.kinds, kind] }, [
      ...this._routes,
      route(kind, handler),
    ]);
  }

  public get domain(): ActionDomain {
    return this._domain;
  }

  public readonly dispatch = (action: A) => {
    const match = this._routes.find((r) => r._kind.matches(action));
    if (!match) {
      throw new UnhandledActionError(
        `No handler for action ${action.type} in ${describeDomain(this._domain)}`,
      );
    }
    match._handler(action);
  };
}

function route<A extends Action>(kind: ActionKind<A>, handler: Handler<A>): Route {
  return {
    _kind: kind,
    _handler: (action) => {
      if (kind.matches(action)) {
        handler(action);
      }
    },
  };
}

function converting<A, B>(handler: Handler<B>, converter: Converter<A, B>): Handler<A> {
  return (action) => handler(converter(action));
}
