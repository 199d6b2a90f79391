/**
 * Core types for existential values.
 *
 * An {@link Existential} wraps a value whose concrete type has been
 * forgotten, together with the witness table of that concrete type. The
 * witness is the only thing that knows how to read the capability's
 * attributes, so every read is resolved at the point of use.
 *
 * @module
 */

import type { CapabilityContract } from "@erasure-primer/core";

/**
 * How one concrete type satisfies one capability.
 *
 * Shared by every value of that concrete type wrapped under the same
 * {@link ExistentialKind}.
 *
 * @typeParam Shape - The capability's attributes.
 */
export interface WitnessTable<Shape> {
  readonly capability: CapabilityContract<Shape>;

  /** The concrete type this table was derived for. */
  readonly typeName: string;

  /** Read one attribute of a value of this concrete type. */
  get<K extends keyof Shape>(value: unknown, key: K): Shape[K];
}

/**
 * A value of some concrete type satisfying `Shape`.
 *
 * The concrete type is hidden (`unknown`); the witness guarantees that
 * every attribute of `Shape` can be read at run time.
 */
export interface Existential<Shape> {
  readonly __existential__: true;
  readonly __value: unknown;
  readonly __witness: WitnessTable<Shape>;
}

/** A heterogeneous list whose elements share one capability. */
export type ExistentialList<Shape> = ReadonlyArray<Existential<Shape>>;

/**
 * The existential type over one capability: wraps values and owns the
 * witness tables derived for each concrete type it has seen.
 */
export interface ExistentialKind<Shape> {
  readonly contract: CapabilityContract<Shape>;

  /**
   * Wrap a value whose type is statically known to satisfy `Shape`.
   * The value is still checked at run time.
   */
  erase<T extends Shape>(value: T): Existential<Shape>;

  /**
   * Wrap a value of unknown type.
   *
   * @throws {PrimerError} EP1001 or EP1002 when the value does not conform.
   */
  from(value: unknown): Existential<Shape>;

  /** The cached witness for the value's concrete type. */
  witnessFor(value: unknown): WitnessTable<Shape>;

  /** Witness tables derived so far, one per concrete type. */
  witnesses(): ReadonlyArray<WitnessTable<Shape>>;
}
