import { createImplementerRegistry } from "@erasure-primer/core";
import { VehicleCapability, type Vehicle } from "./vehicle.js";

export class Tesla implements Vehicle {
  readonly isElectric = true;
  readonly price = 80000.0;
}

export class Bicycle implements Vehicle {
  readonly isElectric = false;
  readonly price = 200;
}

/** Every vehicle the existential wrapper may choose from, in pick order. */
export const vehicleImplementers = createImplementerRegistry(VehicleCapability)
  .register("Tesla", () => new Tesla())
  .register("Bicycle", () => new Bicycle());
