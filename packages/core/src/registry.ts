/**
 * Registries
 *
 * A generic Registry<K, V> with configurable duplicate handling, and the
 * implementer registry built on it: the known finite set of concrete types
 * that satisfy one capability.
 */

import { assertConforms, type CapabilityContract } from "./capability.js";
import { EP1005, EP1006, primerError } from "./diagnostics.js";

// ============================================================================
// Generic Registry<K, V> Abstraction
// ============================================================================

/**
 * Duplicate handling strategy for registry entries.
 */
export type DuplicateStrategy =
  | "error" // Throw error on duplicate (default)
  | "skip" // Keep the existing entry when `valueEquals` holds
  | "replace"; // Replace existing entry

/**
 * Options for creating a Registry instance.
 */
export interface RegistryOptions<K, V> {
  /** How to handle duplicate entries (default: "error") */
  duplicateStrategy?: DuplicateStrategy;

  /** Custom equality check for values (used with "skip" strategy) */
  valueEquals?: (a: V, b: V) => boolean;

  /** Builds the error thrown for a rejected duplicate */
  onDuplicate?: (key: K) => Error;

  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs.
 *
 * @example
 * ```typescript
 * const witnesses = createGenericRegistry<string, WitnessTable<Vehicle>>({
 *   duplicateStrategy: "skip",
 *   valueEquals: (a, b) => a.typeName === b.typeName,
 * });
 * ```
 */
export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  set(key: K, value: V): void;
  get(key: K): V | undefined;
  has(key: K): boolean;
  delete(key: K): boolean;
  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  readonly size: number;
  clear(): void;
  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private readonly strategy: DuplicateStrategy;
  private readonly name: string;

  constructor(private readonly options: RegistryOptions<K, V> = {}) {
    this.strategy = options.duplicateStrategy ?? "error";
    this.name = options.name ?? "Registry";
  }

  set(key: K, value: V): void {
    const existing = this.store.get(key);

    if (existing !== undefined) {
      switch (this.strategy) {
        case "error":
          throw this.duplicateError(key);

        case "skip":
          if (!this.options.valueEquals || this.options.valueEquals(existing, value)) return;
          throw this.duplicateError(key);

        case "replace":
          break;
      }
    }

    this.store.set(key, value);
  }

  private duplicateError(key: K): Error {
    return (
      this.options.onDuplicate?.(key) ??
      new Error(`${this.name}: entry for key '${String(key)}' already exists`)
    );
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

/**
 * Create a new generic registry instance.
 */
export function createGenericRegistry<K, V>(
  options: RegistryOptions<K, V> = {},
): GenericRegistry<K, V> {
  return new GenericRegistryImpl<K, V>(options);
}

// ============================================================================
// Implementer Registry
// ============================================================================

/** Produces a fresh value of one concrete implementer. */
export type ImplementerFactory<Shape> = () => Shape;

/** A random source returning numbers in `[0, 1)`. */
export type RandomSource = () => number;

/**
 * The known finite set of implementers of one capability, by name.
 */
export interface ImplementerRegistry<Shape> {
  readonly contract: CapabilityContract<Shape>;

  /**
   * @throws {PrimerError} EP1006 when `name` is already registered.
   */
  register(name: string, factory: ImplementerFactory<Shape>): ImplementerRegistry<Shape>;

  /** Registered names, in registration order. */
  names(): string[];

  readonly size: number;

  /**
   * Build the implementer registered under `name`, checked against the
   * contract. Returns `undefined` for an unknown name.
   */
  create(name: string): Shape | undefined;

  /**
   * Build one implementer chosen uniformly with `random`.
   *
   * @throws {PrimerError} EP1005 when nothing is registered.
   */
  pick(random?: RandomSource): { readonly name: string; readonly value: Shape };
}

/**
 * Create an implementer registry for `contract`.
 *
 * @example
 * ```typescript
 * const vehicles = createImplementerRegistry(VehicleCapability)
 *   .register("Tesla", () => new Tesla())
 *   .register("Bicycle", () => new Bicycle());
 *
 * vehicles.pick().value.price; // 80000 or 200
 * ```
 */
export function createImplementerRegistry<Shape>(
  contract: CapabilityContract<Shape>,
): ImplementerRegistry<Shape> {
  const factories = createGenericRegistry<string, ImplementerFactory<Shape>>({
    name: `${contract.name} implementers`,
    onDuplicate: (name) =>
      primerError(EP1006, { type: name, capability: contract.name }).build(),
  });

  const build = (factory: ImplementerFactory<Shape>): Shape => {
    const value: unknown = factory();
    assertConforms(contract, value);
    return value;
  };

  const registry: ImplementerRegistry<Shape> = {
    contract,

    register(name, factory) {
      factories.set(name, factory);
      return registry;
    },

    names() {
      return [...factories.keys()];
    },

    get size() {
      return factories.size;
    },

    create(name) {
      const factory = factories.get(name);
      return factory ? build(factory) : undefined;
    },

    pick(random = Math.random) {
      const entries = [...factories];
      if (entries.length === 0) {
        throw primerError(EP1005, { capability: contract.name })
          .help(`register an implementer of \`${contract.name}\` before picking`)
          .build();
      }
      const draw = random();
      // NaN and infinities pick the first implementer
      const scaled = Number.isFinite(draw) ? Math.floor(draw * entries.length) : 0;
      const index = Math.min(entries.length - 1, Math.max(0, scaled));
      const [name, factory] = entries[index];
      return { name, value: build(factory) };
    },
  };

  return registry;
}
