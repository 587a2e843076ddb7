/**
 * Dependencies are plain objects of services. A context providing `D` can
 * serve any effect whose dependency type `D` is assignable to.
 */
export type NoDeps = Record<never, never>;

export type MergeDeps<D1 extends object, D2 extends object> = D1 & D2;

export function mergeDeps<D1 extends object, D2 extends object>(a: D1, b: D2): MergeDeps<D1, D2> {
  return { ...a, ...b };
}
