/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;

/** A zero-argument constructor, as used for entity classes and relation factories */
export type Constructor<T> = new () => T;
