/**
 * @erasure-primer/vehicles: the teaching example.
 *
 * One capability (`Vehicle`), two implementers (`Tesla`, `Bicycle`) and
 * the two wrappers that return "some vehicle" in different ways.
 *
 * @packageDocumentation
 */

export { VehicleCapability, type Vehicle } from "./vehicle.js";
export { Tesla, Bicycle, vehicleImplementers } from "./implementers.js";
export { AnyVehicle, anyVehicle, someVehicle, showroom } from "./wrappers.js";
export {
  formatMagnitude,
  describeVehicle,
  snapshot,
  printAnyVehicle,
  printSomeVehicle,
  type LineWriter,
} from "./print.js";
