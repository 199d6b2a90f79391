import { defineCapability } from "@erasure-primer/core";

/** Anything that can be sold as a vehicle. */
export interface Vehicle {
  readonly isElectric: boolean;
  /** Floating-point magnitude, in dollars. */
  readonly price: number;
}

export const VehicleCapability = defineCapability<Vehicle>()("Vehicle", {
  isElectric: "boolean",
  price: "number",
});
