/**
 * Heterogeneous collection utilities for existential values.
 *
 * These operate on arrays of {@link Existential} values that share one
 * capability. Because every element carries its own witness, the concrete
 * types can differ while reads remain type-safe.
 *
 * @module
 */

import type { Existential, ExistentialList } from "./types.js";
import { read, typeNameOf } from "./erased.js";

/**
 * Map a function over every element of an existential list.
 */
export function mapExistential<Shape, R>(
  list: ExistentialList<Shape>,
  f: (box: Existential<Shape>) => R,
): R[] {
  return list.map(f);
}

/**
 * Filter elements of an existential list by a predicate.
 */
export function filterExistential<Shape>(
  list: ExistentialList<Shape>,
  predicate: (box: Existential<Shape>) => boolean,
): ExistentialList<Shape> {
  return list.filter(predicate);
}

/**
 * Read the same attribute from every element, each through its own witness.
 */
export function readEach<Shape, K extends keyof Shape>(
  list: ExistentialList<Shape>,
  key: K,
): Array<Shape[K]> {
  return list.map((box) => read(box, key));
}

/**
 * Group elements by the concrete type behind them.
 *
 * Groups appear in the order their first element appears in `list`.
 */
export function groupByConcreteType<Shape>(
  list: ExistentialList<Shape>,
): Map<string, Array<Existential<Shape>>> {
  const groups = new Map<string, Array<Existential<Shape>>>();
  for (const box of list) {
    const name = typeNameOf(box);
    let bucket = groups.get(name);
    if (bucket === undefined) {
      bucket = [];
      groups.set(name, bucket);
    }
    bucket.push(box);
  }
  return groups;
}

/**
 * The distinct concrete types in a list, in first-seen order.
 */
export function distinctConcreteTypes<Shape>(list: ExistentialList<Shape>): string[] {
  return [...groupByConcreteType(list).keys()];
}
