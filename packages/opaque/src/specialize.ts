/**
 * Specialization: binding dictionaries and accessors once.
 *
 * Because an opaque function always returns the same concrete type, the
 * way its attributes are read can be decided once instead of on every
 * call. {@link specialize} does the general version of this for any
 * function whose last parameter is a dictionary of operations.
 *
 * @module
 */

import {
  createLogger,
  EP1003,
  isRequirement,
  primerError,
  requirementKeys,
} from "@erasure-primer/core";
import { assertPinned, type Opaque, type OpaqueFunction } from "./opaque.js";

type DropLast<T extends unknown[], N extends number, Dropped extends unknown[] = []> =
  Dropped["length"] extends N
    ? T
    : T extends [...infer Rest, unknown]
      ? DropLast<Rest, N, [...Dropped, unknown]>
      : [];

/**
 * Removes the last N parameters from a function type.
 *
 * @example
 * ```typescript
 * type Fn = (vehicle: Vehicle, format: Format) => string;
 * type Bound = Specialized<Fn, 1>;
 * // Bound = (vehicle: Vehicle) => string
 * ```
 */
export type Specialized<F, N extends number> = F extends (...args: infer A) => infer R
  ? (...args: DropLast<A, N>) => R
  : never;

/**
 * Bind the trailing dictionary argument of `fn`.
 *
 * @example
 * ```typescript
 * const describe = (vehicle: Vehicle, format: Format) => format.money(vehicle.price);
 * const describeUsd = specialize(describe, usd);
 * describeUsd(new Tesla());
 * ```
 */
export function specialize<Args extends unknown[], D, R>(
  fn: (...args: [...Args, D]) => R,
  dictionary: D,
): (...args: Args) => R {
  return (...args: Args) => fn(...args, dictionary);
}

/**
 * A direct reader for one attribute of `fn`'s results.
 *
 * No witness is consulted: the attribute is read straight off the value.
 * While `fn` is pinned, values of another concrete type are rejected.
 *
 * @throws {PrimerError} EP1003 if `key` is not a requirement of the
 *   function's capability.
 */
export function specializedReader<
  Args extends unknown[],
  Shape extends object,
  Tag extends string,
  K extends keyof Shape,
>(fn: OpaqueFunction<Args, Shape, Tag>, key: K): (value: Opaque<Shape, Tag>) => Shape[K] {
  const { contract } = fn;
  if (!isRequirement(contract, key)) {
    throw primerError(EP1003, { capability: contract.name, requirement: String(key) })
      .note(`\`${contract.name}\` requires: ${requirementKeys(contract).join(", ")}`)
      .build();
  }

  createLogger("opaque").debug(`specialized ${fn.tag}.${String(key)}`);
  return (value) => {
    assertPinned(fn, value);
    const shaped: Shape = value;
    return shaped[key];
  };
}
