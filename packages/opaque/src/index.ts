/**
 * @erasure-primer/opaque: the opaque capability-set wrapper.
 *
 * An opaque function returns one concrete type that callers never see by
 * name. Since the type cannot vary between calls, readers of its results
 * can be specialized once.
 *
 * **Usage:**
 * ```typescript
 * const someVehicle = opaque(VehicleCapability, "SomeVehicle", () => new Tesla());
 * const price = specializedReader(someVehicle, "price");
 *
 * price(someVehicle()); // 80000
 * ```
 *
 * @packageDocumentation
 */

export { opaque, assertPinned, type Opaque, type OpaqueFunction } from "./opaque.js";
export { specialize, specializedReader, type Specialized } from "./specialize.js";
