/**
 * Core operations for creating and interacting with existential values.
 *
 * An existential wraps a concrete value alongside the witness table of its
 * concrete type. The concrete type is forgotten; all access goes through
 * the witness. This enables heterogeneous collections where every element
 * shares a common capability.
 *
 * @module
 */

import {
  assertConforms,
  concreteTypeName,
  constructorOf,
  createLogger,
  EP1002,
  EP1003,
  isRequirement,
  isRequirementValue,
  primerError,
  requirementKeys,
  type CapabilityContract,
} from "@erasure-primer/core";
import type { Existential, ExistentialKind, WitnessTable } from "./types.js";

const log = createLogger("erased");

/**
 * Derive the witness table of one concrete type.
 *
 * Each read checks the attribute's kind again, since the table is shared
 * by values that were checked one at a time.
 */
function deriveWitness<Shape>(
  contract: CapabilityContract<Shape>,
  typeName: string,
): WitnessTable<Shape> {
  return {
    capability: contract,
    typeName,
    get<K extends keyof Shape>(value: unknown, key: K): Shape[K] {
      const candidate: unknown =
        value === null || value === undefined ? undefined : Reflect.get(Object(value), key);
      if (!isRequirementValue(contract, key, candidate)) {
        throw primerError(EP1002, {
          type: typeName,
          capability: contract.name,
          requirement: String(key),
          expected: contract.requirements[key],
          actual: typeof candidate,
        }).build();
      }
      return candidate;
    },
  };
}

/**
 * Create the existential type over `contract`.
 *
 * @example
 * ```typescript
 * const AnyVehicle = existentialOf(VehicleCapability);
 * const garage = [AnyVehicle.erase(new Tesla()), AnyVehicle.erase(new Bicycle())];
 * garage.map((v) => read(v, "price")); // [80000, 200]
 * ```
 */
export function existentialOf<Shape>(contract: CapabilityContract<Shape>): ExistentialKind<Shape> {
  const cache = new Map<Function | string, WitnessTable<Shape>>();

  const witnessFor = (value: unknown): WitnessTable<Shape> => {
    const key = constructorOf(value) ?? concreteTypeName(value);
    let witness = cache.get(key);
    if (witness === undefined) {
      witness = deriveWitness(contract, concreteTypeName(value));
      cache.set(key, witness);
      log.debug(`derived ${contract.name} witness for ${witness.typeName}`);
    }
    return witness;
  };

  const from = (value: unknown): Existential<Shape> => {
    assertConforms(contract, value);
    return { __existential__: true, __value: value, __witness: witnessFor(value) };
  };

  return {
    contract,
    erase: from,
    from,
    witnessFor,
    witnesses: () => [...cache.values()],
  };
}

/**
 * Wrap a value with a one-off existential type over `contract`.
 *
 * Witness tables are not shared across calls; prefer
 * {@link existentialOf} for repeated wrapping.
 */
export function erase<Shape, T extends Shape>(
  contract: CapabilityContract<Shape>,
  value: T,
): Existential<Shape> {
  return existentialOf(contract).erase(value);
}

/**
 * Read one attribute of an existential, dispatching through its witness.
 *
 * @throws {PrimerError} EP1003 if `key` is not a requirement of the
 *   existential's capability.
 */
export function read<Shape, K extends keyof Shape>(box: Existential<Shape>, key: K): Shape[K] {
  const witness = box.__witness;
  if (!isRequirement(witness.capability, key)) {
    throw primerError(EP1003, { capability: witness.capability.name, requirement: String(key) })
      .note(`\`${witness.capability.name}\` requires: ${requirementKeys(witness.capability).join(", ")}`)
      .build();
  }
  log.debug(`dispatch ${witness.capability.name}.${String(key)} via ${witness.typeName} witness`);
  return witness.get(box.__value, key);
}

/**
 * Every attribute of the capability, in declaration order.
 */
export function readAll<Shape>(
  box: Existential<Shape>,
): Array<readonly [keyof Shape & string, Shape[keyof Shape & string]]> {
  return requirementKeys(box.__witness.capability).map((key) => [key, read(box, key)] as const);
}

/**
 * The concrete type behind an existential.
 *
 * Only known at run time: the static type of every existential over one
 * capability is the same.
 */
export function typeNameOf<Shape>(box: Existential<Shape>): string {
  return box.__witness.typeName;
}

/**
 * Recover the concrete value if it is an instance of `ctor`.
 */
export function downcast<Shape, T>(
  box: Existential<Shape>,
  ctor: abstract new (...args: never[]) => T,
): T | undefined {
  const value = box.__value;
  return value instanceof ctor ? value : undefined;
}

/**
 * Whether the existential's capability declares `key`.
 */
export function hasRequirement<Shape>(box: Existential<Shape>, key: PropertyKey): boolean {
  return isRequirement(box.__witness.capability, key);
}

/** Whether two existentials share a witness table (same concrete type and kind). */
export function sameWitness<Shape>(a: Existential<Shape>, b: Existential<Shape>): boolean {
  return a.__witness === b.__witness;
}
