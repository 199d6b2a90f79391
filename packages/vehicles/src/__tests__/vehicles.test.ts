import { describe, it, expect, afterEach } from "vitest";
import { config } from "@erasure-primer/core";
import { mapExistential, read, readEach, typeNameOf, type Existential } from "@erasure-primer/erased";
import type { Opaque } from "@erasure-primer/opaque";
import {
  forAll,
  seededRandom,
  sequenceRandom,
  typeAssert,
  type Equal,
} from "@erasure-primer/testing";
import {
  anyVehicle,
  Bicycle,
  describeVehicle,
  formatMagnitude,
  printAnyVehicle,
  printSomeVehicle,
  showroom,
  someVehicle,
  Tesla,
  vehicleImplementers,
  type Vehicle,
} from "../index.js";

afterEach(() => {
  config.reset();
});

describe("implementers", () => {
  it("Tesla and Bicycle carry their fixed values", () => {
    expect(new Tesla()).toMatchObject({ isElectric: true, price: 80000 });
    expect(new Bicycle()).toMatchObject({ isElectric: false, price: 200 });
  });

  it("are registered in pick order", () => {
    expect(vehicleImplementers.names()).toEqual(["Tesla", "Bicycle"]);
    expect(vehicleImplementers.size).toBe(2);
  });
});

describe("formatMagnitude", () => {
  it("shows at least one fraction digit by default", () => {
    expect(formatMagnitude(80000)).toBe("80000.0");
    expect(formatMagnitude(200)).toBe("200.0");
  });

  it("keeps digits beyond the minimum", () => {
    expect(formatMagnitude(21.25)).toBe("21.25");
  });

  it("takes an explicit digit count", () => {
    expect(formatMagnitude(200, 0)).toBe("200");
    expect(formatMagnitude(1.5, 3)).toBe("1.500");
  });

  it("follows output.fractionDigits", () => {
    config.set({ output: { fractionDigits: 2 } });
    expect(formatMagnitude(200)).toBe("200.00");
  });

  it("leaves non-finite values alone", () => {
    expect(formatMagnitude(Number.POSITIVE_INFINITY)).toBe("Infinity");
  });
});

describe("describeVehicle", () => {
  it("reports Tesla as 80000.0", () => {
    expect(describeVehicle(new Tesla())).toEqual(["isElectric: true", "price: 80000.0"]);
  });

  it("reports Bicycle as 200.0", () => {
    expect(describeVehicle(new Bicycle())).toEqual(["isElectric: false", "price: 200.0"]);
  });
});

describe("anyVehicle (existential)", () => {
  it("returns the implementer the random source chose", () => {
    expect(typeNameOf(anyVehicle(sequenceRandom(0)))).toBe("Tesla");
    expect(typeNameOf(anyVehicle(sequenceRandom(0.75)))).toBe("Bicycle");
  });

  it("reads match the chosen implementer", () => {
    const names = ["Tesla", "Bicycle"];
    forAll(seededRandom, 100, (random) => {
      const x = random();
      const box = anyVehicle(sequenceRandom(x));
      const expected = names[Math.min(1, Math.floor(x * 2))];
      expect(typeNameOf(box)).toBe(expected);
      expect(read(box, "price")).toBe(expected === "Tesla" ? 80000 : 200);
      expect(read(box, "isElectric")).toBe(expected === "Tesla");
    });
  });

  it("hides the concrete type from the static type", () => {
    const box = anyVehicle(sequenceRandom(0));
    typeAssert<Equal<typeof box, Existential<Vehicle>>>();
  });
});

describe("someVehicle (opaque)", () => {
  it("always returns a Tesla", () => {
    for (let i = 0; i < 10; i++) {
      const vehicle = someVehicle();
      expect(vehicle).toBeInstanceOf(Tesla);
      expect(vehicle.price).toBe(80000);
      expect(vehicle.isElectric).toBe(true);
    }
    expect(someVehicle.pinnedType()).toBe("Tesla");
  });

  it("is typed as a tagged Vehicle", () => {
    typeAssert<Equal<ReturnType<typeof someVehicle>, Opaque<Vehicle, "someVehicle">>>();
  });
});

describe("showroom", () => {
  it("holds one of each vehicle", () => {
    const list = showroom();
    expect(mapExistential(list, typeNameOf)).toEqual(["Tesla", "Bicycle"]);
    expect(readEach(list, "price")).toEqual([80000, 200]);
  });
});

describe("printing", () => {
  it("prints the existential wrapper's choice", () => {
    const lines: string[] = [];
    printAnyVehicle((line) => lines.push(line), sequenceRandom(0.75));
    expect(lines).toEqual([
      "anyVehicle() -> existential Vehicle, concrete type Bicycle",
      "  isElectric: false",
      "  price: 200.0",
    ]);
  });

  it("prints the opaque wrapper's Tesla", () => {
    const lines: string[] = [];
    printSomeVehicle((line) => lines.push(line));
    expect(lines).toEqual([
      "someVehicle() -> opaque Vehicle, concrete type Tesla",
      "  isElectric: true",
      "  price: 80000.0",
    ]);
  });
});
