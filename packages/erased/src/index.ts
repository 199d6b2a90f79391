/**
 * @erasure-primer/erased: the existential capability-set wrapper.
 *
 * Wrap values of different concrete types into a uniform
 * {@link Existential} representation that carries a witness table, then
 * read their shared attributes through it. Which concrete type sits behind
 * a value is discovered at run time, at the point of use.
 *
 * **Usage:**
 * ```typescript
 * const AnyVehicle = existentialOf(VehicleCapability);
 * const garage = [AnyVehicle.erase(new Tesla()), AnyVehicle.erase(new Bicycle())];
 *
 * readEach(garage, "price");         // [80000, 200]
 * garage.map(typeNameOf);            // ["Tesla", "Bicycle"]
 * ```
 *
 * @packageDocumentation
 */

// Core types
export type { WitnessTable, Existential, ExistentialList, ExistentialKind } from "./types.js";

// Construction and dispatch
export {
  existentialOf,
  erase,
  read,
  readAll,
  typeNameOf,
  downcast,
  hasRequirement,
  sameWitness,
} from "./erased.js";

// Heterogeneous collection utilities
export {
  mapExistential,
  filterExistential,
  readEach,
  groupByConcreteType,
  distinctConcreteTypes,
} from "./collections.js";

// Capability widening
export { widen, rewrap } from "./widen.js";
