import { concreteTypeName, config, type RandomSource } from "@erasure-primer/core";
import { read, typeNameOf, type Existential } from "@erasure-primer/erased";
import { specializedReader } from "@erasure-primer/opaque";
import type { Vehicle } from "./vehicle.js";
import { anyVehicle, someVehicle } from "./wrappers.js";

export type LineWriter = (line: string) => void;

/**
 * Print `n` with at least `fractionDigits` digits after the point.
 *
 * Digits beyond the minimum are kept: `formatMagnitude(21.25)` is `"21.25"`.
 */
export function formatMagnitude(n: number, fractionDigits: number = config.fractionDigits()): string {
  const text = String(n);
  if (!Number.isFinite(n) || text.includes("e")) return text;
  const dot = text.indexOf(".");
  const digits = dot === -1 ? 0 : text.length - dot - 1;
  return digits >= fractionDigits ? text : n.toFixed(fractionDigits);
}

export function describeVehicle(vehicle: Vehicle): string[] {
  return [`isElectric: ${vehicle.isElectric}`, `price: ${formatMagnitude(vehicle.price)}`];
}

/** Read every attribute of an existential vehicle through its witness. */
export function snapshot(box: Existential<Vehicle>): Vehicle {
  return { isElectric: read(box, "isElectric"), price: read(box, "price") };
}

/** Call {@link anyVehicle} once and print what came back. */
export function printAnyVehicle(write: LineWriter, random?: RandomSource): Existential<Vehicle> {
  const box = anyVehicle(random);
  write(`anyVehicle() -> existential Vehicle, concrete type ${typeNameOf(box)}`);
  for (const line of describeVehicle(snapshot(box))) write(`  ${line}`);
  return box;
}

interface SomeVehicleReaders {
  readonly isElectric: (vehicle: ReturnType<typeof someVehicle>) => boolean;
  readonly price: (vehicle: ReturnType<typeof someVehicle>) => number;
}

let readers: SomeVehicleReaders | undefined;

// Built on first use: creating a reader logs, and logging reads the config
function someVehicleReaders(): SomeVehicleReaders {
  readers ??= {
    isElectric: specializedReader(someVehicle, "isElectric"),
    price: specializedReader(someVehicle, "price"),
  };
  return readers;
}

/** Call {@link someVehicle} once and print what came back. */
export function printSomeVehicle(write: LineWriter): Vehicle {
  const { isElectric, price } = someVehicleReaders();
  const vehicle = someVehicle();
  write(`someVehicle() -> opaque Vehicle, concrete type ${concreteTypeName(vehicle)}`);
  for (const line of describeVehicle({ isElectric: isElectric(vehicle), price: price(vehicle) })) {
    write(`  ${line}`);
  }
  return vehicle;
}
