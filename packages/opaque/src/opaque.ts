/**
 * Opaque functions: one concrete type behind a capability.
 *
 * The factory's concrete result type is fixed by its definition, but
 * callers only see `Shape` plus a phantom tag. The first call pins the
 * concrete type; later calls are checked against the pin while
 * `opaque.verify` is on.
 *
 * @module
 */

import {
  assertConforms,
  concreteTypeName,
  config,
  constructorOf,
  createLogger,
  EP1004,
  primerError,
  type CapabilityContract,
} from "@erasure-primer/core";

declare const __opaque__: unique symbol;

/**
 * `Shape` tagged with the opaque function that produced it.
 *
 * The tag only exists at the type level, so two results with matching
 * shapes but different tags do not mix.
 */
export type Opaque<Shape extends object, Tag extends string> = Shape & { readonly [__opaque__]?: Tag };

export interface OpaqueFunction<Args extends unknown[], Shape extends object, Tag extends string> {
  (...args: Args): Opaque<Shape, Tag>;

  readonly tag: Tag;
  readonly contract: CapabilityContract<Shape>;

  /** The concrete type behind every result, once the first call has run. */
  pinnedType(): string | undefined;

  /** The constructor of the pinned type; `undefined` for primitives or before the first call. */
  pinnedConstructor(): Function | undefined;

  /** How many times the function has been invoked. */
  calls(): number;
}

interface Pin {
  readonly name: string;
  readonly ctor: Function | undefined;
}

/**
 * Wrap `factory` as an opaque function over `contract`.
 *
 * @example
 * ```typescript
 * const someVehicle = opaque(VehicleCapability, "SomeVehicle", () => new Tesla());
 * someVehicle().price;      // 80000
 * someVehicle.pinnedType(); // "Tesla"
 * ```
 *
 * @throws {PrimerError} EP1001 or EP1002 when the first result does not
 *   conform; EP1004 when a later result has another concrete type.
 */
export function opaque<
  Shape extends object,
  Tag extends string,
  Args extends unknown[],
  T extends Shape,
>(
  contract: CapabilityContract<Shape>,
  tag: Tag,
  factory: (...args: Args) => T,
): OpaqueFunction<Args, Shape, Tag> {
  const log = createLogger("opaque");
  let pin: Pin | undefined;
  let count = 0;

  const call = (...args: Args): Opaque<Shape, Tag> => {
    count++;
    const result = factory(...args);

    if (pin === undefined) {
      assertConforms(contract, result);
      pin = { name: concreteTypeName(result), ctor: constructorOf(result) };
      log.debug(`pinned ${tag} to ${pin.name}`);
    } else if (config.verifiesOpaque()) {
      checkPin(tag, pin, result);
    }

    return result;
  };

  return Object.assign(call, {
    tag,
    contract,
    pinnedType: () => pin?.name,
    pinnedConstructor: () => pin?.ctor,
    calls: () => count,
  });
}

function checkPin(tag: string, pin: Pin, value: unknown): void {
  const actual = concreteTypeName(value);
  if (actual === pin.name && constructorOf(value) === pin.ctor) return;
  throw primerError(EP1004, { tag, actual, pinned: pin.name })
    .note(`every call to \`${tag}\` must return the same concrete type`)
    .help(`use an existential wrapper if \`${tag}\` needs to return different types`)
    .build();
}

/**
 * Verify that `value` has the concrete type `fn` is pinned to.
 *
 * A function that has not been called yet accepts anything.
 *
 * @throws {PrimerError} EP1004 on mismatch.
 */
export function assertPinned<Args extends unknown[], Shape extends object, Tag extends string>(
  fn: OpaqueFunction<Args, Shape, Tag>,
  value: unknown,
): void {
  const name = fn.pinnedType();
  if (name === undefined) return;
  checkPin(fn.tag, { name, ctor: fn.pinnedConstructor() }, value);
}
