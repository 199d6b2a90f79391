/**
 * Capability contracts.
 *
 * A capability is a named set of required readable attributes. The
 * contract carries a runtime requirement table so that conformance can be
 * checked for values whose static type has been forgotten, and a phantom
 * `Shape` so that typed reads stay typed.
 *
 * @module
 */

import { EP1001, EP1002, primerError } from "./diagnostics.js";

/** Runtime kind of a required attribute, compared against `typeof`. */
export type RequirementKind = "boolean" | "number" | "string";

/** The requirement kind matching a TypeScript value type. */
export type KindFor<T> = [T] extends [boolean]
  ? "boolean"
  : [T] extends [number]
    ? "number"
    : [T] extends [string]
      ? "string"
      : never;

/** One requirement entry per attribute of `Shape`. */
export type Requirements<Shape> = { readonly [K in keyof Shape]-?: KindFor<Shape[K]> };

/**
 * A named capability set over `Shape`.
 *
 * @typeParam Shape - The attributes an implementer must supply.
 */
export interface CapabilityContract<Shape> {
  readonly name: string;
  readonly requirements: Requirements<Shape>;
}

/**
 * Define a capability contract.
 *
 * Curried so that `Shape` is named explicitly while the requirement table
 * is checked against it.
 *
 * @example
 * ```typescript
 * interface Vehicle { readonly isElectric: boolean; readonly price: number }
 *
 * const VehicleCapability = defineCapability<Vehicle>()("Vehicle", {
 *   isElectric: "boolean",
 *   price: "number",
 * });
 * ```
 */
export function defineCapability<Shape>() {
  return (name: string, requirements: Requirements<Shape>): CapabilityContract<Shape> =>
    Object.freeze({ name, requirements: { ...requirements } });
}

/** Required attribute names, in declaration order. */
export function requirementKeys<Shape>(
  contract: CapabilityContract<Shape>,
): Array<keyof Shape & string> {
  return Object.keys(contract.requirements).filter(
    (key): key is keyof Shape & string => isRequirement(contract, key),
  );
}

/** Whether `candidate` has the kind `contract` requires for `key`. */
export function isRequirementValue<Shape, K extends keyof Shape>(
  contract: CapabilityContract<Shape>,
  key: K,
  candidate: unknown,
): candidate is Shape[K] {
  const expected: RequirementKind = contract.requirements[key];
  return typeof candidate === expected;
}

/** Whether `key` names a requirement of `contract`. */
export function isRequirement<Shape>(
  contract: CapabilityContract<Shape>,
  key: PropertyKey,
): key is keyof Shape {
  return typeof key === "string" && Object.prototype.hasOwnProperty.call(contract.requirements, key);
}

// ============================================================================
// Concrete Type Identity
// ============================================================================

/**
 * The runtime identity of a value's concrete type.
 *
 * Objects report their constructor name (`"Object"` for literals,
 * `"null-prototype"` when there is no prototype); primitives report
 * `typeof`.
 */
export function concreteTypeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object" && typeof value !== "function") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return "null-prototype";
  const ctor = constructorOf(value);
  return ctor?.name || "anonymous";
}

/** The constructor a value was created with, if it has one. */
export function constructorOf(value: unknown): Function | undefined {
  if (value === null || (typeof value !== "object" && typeof value !== "function")) {
    return undefined;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || typeof proto !== "object") return undefined;
  const ctor: unknown = Reflect.get(proto, "constructor");
  return typeof ctor === "function" ? ctor : undefined;
}

// ============================================================================
// Conformance
// ============================================================================

export type Violation =
  | { readonly kind: "missing"; readonly requirement: string }
  | {
      readonly kind: "wrong-kind";
      readonly requirement: string;
      readonly expected: RequirementKind;
      readonly actual: string;
    };

/**
 * Every way `value` fails to satisfy `contract`. An empty list means it
 * conforms.
 */
export function checkConformance<Shape>(
  contract: CapabilityContract<Shape>,
  value: unknown,
): Violation[] {
  const violations: Violation[] = [];
  for (const key of requirementKeys(contract)) {
    const requirement: string = key;
    const expected: RequirementKind = contract.requirements[key];
    if (!hasAttribute(value, requirement)) {
      violations.push({ kind: "missing", requirement });
      continue;
    }
    const actual = typeof Reflect.get(Object(value), requirement);
    if (actual !== expected) {
      violations.push({ kind: "wrong-kind", requirement, expected, actual });
    }
  }
  return violations;
}

function hasAttribute(value: unknown, key: string): boolean {
  if (value === null || value === undefined) return false;
  return key in Object(value);
}

/** Type guard form of {@link checkConformance}. */
export function conforms<Shape>(contract: CapabilityContract<Shape>, value: unknown): value is Shape {
  return checkConformance(contract, value).length === 0;
}

/**
 * Assert that `value` satisfies `contract`.
 *
 * @throws {PrimerError} EP1001 for the first missing attribute, EP1002 for
 *   the first attribute of the wrong kind.
 */
export function assertConforms<Shape>(
  contract: CapabilityContract<Shape>,
  value: unknown,
): asserts value is Shape {
  const [first] = checkConformance(contract, value);
  if (first === undefined) return;

  const type = concreteTypeName(value);
  const required = requirementKeys(contract).join(", ");
  if (first.kind === "missing") {
    throw primerError(EP1001, {
      type,
      capability: contract.name,
      requirement: first.requirement,
    })
      .note(`\`${contract.name}\` requires: ${required}`)
      .help(
        `add a \`${first.requirement}: ${describeKind(contract, first.requirement)}\` property to ${type}`,
      )
      .build();
  }
  throw primerError(EP1002, {
    type,
    capability: contract.name,
    requirement: first.requirement,
    expected: first.expected,
    actual: first.actual,
  })
    .note(`\`${contract.name}\` requires: ${required}`)
    .build();
}

function describeKind<Shape>(contract: CapabilityContract<Shape>, key: string): string {
  return isRequirement(contract, key) ? contract.requirements[key] : "unknown";
}
