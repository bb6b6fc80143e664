/**
 * Marks a const object as the companion of a same-named type, e.g. `Timestamp`
 * the class and `Envelope` the helper namespace beside the `Envelope` shape.
 *
 * Returns its argument untouched. It exists so companions are easy to grep for.
 */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}
