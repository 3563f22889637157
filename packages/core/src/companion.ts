/** Marks an object as the companion of a same-named type, e.g. `ISODateString` (type) and `ISODateString` (object).
 *  It does nothing at runtime; it only makes companions easy to find.
 */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}
