/**
 * Capability widening for existential values.
 *
 * Widening forgets requirements: the same concrete value is re-wrapped
 * under a capability with fewer attributes. It is checked at run time,
 * so it also serves to move a value between two unrelated capabilities
 * that it happens to satisfy.
 *
 * @module
 */

import { isPrimerError } from "@erasure-primer/core";
import type { Existential, ExistentialKind } from "./types.js";

/**
 * Re-wrap an existential under a smaller capability.
 *
 * `Shape extends Sub` makes the forgetting direction explicit in the
 * types; the witness for `Sub` comes from `to`'s cache.
 *
 * @example
 * ```typescript
 * const Priced = existentialOf(defineCapability<{ price: number }>()("Priced", { price: "number" }));
 * const priced = widen(AnyVehicle.erase(new Tesla()), Priced);
 * read(priced, "price"); // 80000
 * ```
 */
export function widen<Shape extends Sub, Sub>(
  box: Existential<Shape>,
  to: ExistentialKind<Sub>,
): Existential<Sub> {
  return to.from(box.__value);
}

/**
 * Try to re-wrap an existential under another capability.
 *
 * Returns `undefined` when the concrete value lacks an attribute `to`
 * requires, where {@link widen} would throw.
 */
export function rewrap<Shape, Other>(
  box: Existential<Shape>,
  to: ExistentialKind<Other>,
): Existential<Other> | undefined {
  try {
    return to.from(box.__value);
  } catch (error) {
    if (isConformanceError(error)) return undefined;
    throw error;
  }
}

function isConformanceError(error: unknown): boolean {
  return isPrimerError(error) && (error.code === "EP1001" || error.code === "EP1002");
}
