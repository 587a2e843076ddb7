export interface Action<Type extends string = string> {
  readonly type: Type;
}

/**
 * Runtime description of one action type: the set of `type` tags it accepts.
 * A kind built with `variant` accepts the tags of all its members, which makes
 * each member convertible into it.
 */
export interface ActionKind<A extends Action = Action> {
  readonly name: string;
  readonly tags: readonly string[];
  matches(action: Action): action is A;
}

export type ActionOf<K> = K extends ActionKind<infer A> ? A : never;

export function kind<A extends Action>(tag: A['type'], name: string = tag): ActionKind<A> {
  return makeKind<A>(name, [tag]);
}

export function variant<Ks extends ActionKind[]>(
  name: string,
  ...kinds: Ks
): ActionKind<ActionOf<Ks[number]>> {
  const tags = new Set<string>();
  for (const k of kinds) {
    for (const tag of k.tags) {
      tags.add(tag);
    }
  }
  return makeKind<ActionOf<Ks[number]>>(name, [...tags]);
}

export function converts(from: ActionKind, to: ActionKind): boolean {
  return from.tags.every((tag) => to.tags.includes(tag));
}

function makeKind<A extends Action>(name: string, tags: string[]): ActionKind<A> {
  const accepted = new Set<string>(tags);
  return {
    name,
    tags,
    matches: (action): action is A => accepted.has(action.type),
  };
}
