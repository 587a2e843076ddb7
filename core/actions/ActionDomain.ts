import { type Action, type ActionKind, type ActionOf, converts } from './Action';

/**
 * An ordered set of action kinds that a dispatcher, context or effect accepts.
 * Order matters: lookups pick the first applicable member.
 */
export interface ActionDomain<A extends Action = Action> {
  readonly kinds: readonly ActionKind<A>[];
}

/** A bare kind is the one-member domain. */
export type DomainInput<A extends Action = Action> = ActionKind<A> | ActionDomain<A>;

// A union already collapses members that are assignable to one another for
// every purpose the type checker cares about, so the merged domain is the union.
export type MergeActions<A1 extends Action, A2 extends Action> = A1 | A2;

export function actions<Ks extends ActionKind[]>(...kinds: Ks): ActionDomain<ActionOf<Ks[number]>>;
export function actions(...kinds: ActionKind[]): ActionDomain {
  return { kinds };
}

export function isDomain<A extends Action>(input: DomainInput<A>): input is ActionDomain<A> {
  return 'kinds' in input;
}

export function asDomain<A extends Action>(input: DomainInput<A>): ActionDomain<A>;
export function asDomain(input: undefined): ActionDomain<never>;
export function asDomain<A extends Action>(input: DomainInput<A> | undefined): ActionDomain<A> {
  if (!input) {
    return { kinds: [] };
  }
  return isDomain(input) ? input : { kinds: [input] };
}

export function simplify<A extends Action>(domain: ActionDomain<A>): DomainInput<A> {
  return domain.kinds.length === 1 ? domain.kinds[0]! : domain;
}

export function findConvertible<A extends Action>(
  from: ActionKind,
  domain: DomainInput<A>,
): ActionKind<A> | undefined {
  return asDomain(domain).kinds.find((candidate) => converts(from, candidate));
}

export function areCompatible(narrow: DomainInput, broad: DomainInput): boolean {
  return asDomain(narrow).kinds.every((k) => findConvertible(k, broad) !== undefined);
}

export function routeFor<A extends Action>(
  domain: DomainInput<A>,
  action: Action,
): ActionKind<A> | undefined {
  return asDomain(domain).kinds.find((k) => k.matches(action));
}

/**
 * Union of two domains, keeping one representative per convertibility class.
 *
 * Kinds of `d1` are folded into an accumulator that starts as `d2`. A kind that
 * converts into an existing member is absorbed; otherwise any members that
 * convert into it are replaced by it. One remaining member is returned bare.
 */
export function mergeDomains<A1 extends Action, A2 extends Action>(
  d1: DomainInput<A1>,
  d2: DomainInput<A2>,
): DomainInput<MergeActions<A1, A2>> {
  let acc: ActionKind<MergeActions<A1, A2>>[] = [...asDomain(d2).kinds];
  for (const x of asDomain(d1).kinds) {
    if (acc.some((t) => converts(x, t))) {
      continue;
    }
    acc = acc.filter((t) => !converts(t, x));
    acc.push(x);
  }
  return simplify({ kinds: acc });
}

export function describeDomain(domain: DomainInput): string {
  return asDomain(domain)
    .kinds.map((k) => k.name)
    .join(' | ');
}
