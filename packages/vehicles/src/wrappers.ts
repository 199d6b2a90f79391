/**
 * The two ways of returning "some vehicle".
 *
 * {@link anyVehicle} may hand back a different concrete type on every
 * call, so callers only get an existential and every read is dispatched
 * through a witness. {@link someVehicle} always returns a Tesla; callers
 * still cannot name that type, but it never changes.
 *
 * @module
 */

import { createLogger, type RandomSource } from "@erasure-primer/core";
import { existentialOf, type Existential, type ExistentialList } from "@erasure-primer/erased";
import { opaque } from "@erasure-primer/opaque";
import { Tesla, vehicleImplementers } from "./implementers.js";
import { VehicleCapability, type Vehicle } from "./vehicle.js";

const log = createLogger("vehicles");

/** The existential type over {@link Vehicle}. */
export const AnyVehicle = existentialOf(VehicleCapability);

/**
 * Existential wrapper: one of the registered vehicles, chosen by `random`.
 */
export function anyVehicle(random: RandomSource = Math.random): Existential<Vehicle> {
  const { name, value } = vehicleImplementers.pick(random);
  log.debug(`anyVehicle picked ${name}`);
  return AnyVehicle.erase(value);
}

/** Opaque wrapper: always a Tesla, typed only as a tagged Vehicle. */
export const someVehicle = opaque(VehicleCapability, "someVehicle", () => new Tesla());

/** One of each registered vehicle, in registration order. */
export function showroom(): ExistentialList<Vehicle> {
  const list: Array<Existential<Vehicle>> = [];
  for (const name of vehicleImplementers.names()) {
    const value = vehicleImplementers.create(name);
    if (value !== undefined) list.push(AnyVehicle.erase(value));
  }
  return list;
}
