import { describe, it, expect } from "vitest";
import { defineCapability, PrimerError } from "@erasure-primer/core";
import { forAll, seededRandom, typeAssert, type Equal } from "@erasure-primer/testing";
import {
  distinctConcreteTypes,
  downcast,
  erase,
  existentialOf,
  filterExistential,
  groupByConcreteType,
  hasRequirement,
  mapExistential,
  read,
  readAll,
  readEach,
  rewrap,
  sameWitness,
  typeNameOf,
  widen,
} from "../index.js";
import type { Existential, ExistentialList } from "../index.js";

// ---------------------------------------------------------------------------
// Test helpers: a small capability and three implementers
// ---------------------------------------------------------------------------

interface Sensor {
  readonly online: boolean;
  readonly reading: number;
}

const SensorCapability = defineCapability<Sensor>()("Sensor", {
  online: "boolean",
  reading: "number",
});

class Thermometer {
  readonly online = true;
  readonly reading = 21.5;
  readonly unit = "C";
}

class Barometer {
  readonly online = false;
  readonly reading = 1013;
}

class Flaky {
  online = true;
  reading: number | string = 1;
}

const AnySensor = existentialOf(SensorCapability);

// ---------------------------------------------------------------------------
// 1. Construction
// ---------------------------------------------------------------------------

describe("Construction", () => {
  it("erase wraps a conforming value with its witness", () => {
    const box = AnySensor.erase(new Thermometer());
    expect(box.__existential__).toBe(true);
    expect(box.__witness.typeName).toBe("Thermometer");
    expect(box.__witness.capability).toBe(SensorCapability);
  });

  it("all existentials over one capability share one static type", () => {
    const a = AnySensor.erase(new Thermometer());
    const b = AnySensor.erase(new Barometer());
    typeAssert<Equal<typeof a, Existential<Sensor>>>();
    typeAssert<Equal<typeof a, typeof b>>();
  });

  it("from rejects a value missing a requirement", () => {
    expect(() => AnySensor.from({ online: true })).toThrow(
      "`Object` does not satisfy `Sensor`: missing `reading`",
    );
  });

  it("from rejects a requirement of the wrong kind", () => {
    expect(() => AnySensor.from({ online: 1, reading: 2 })).toThrow(PrimerError);
  });

  it("erase without a kind still dispatches", () => {
    const box = erase(SensorCapability, { online: false, reading: 3 });
    expect(typeNameOf(box)).toBe("Object");
    expect(read(box, "reading")).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// 2. Witness tables
// ---------------------------------------------------------------------------

describe("Witness tables", () => {
  it("values of one concrete type share a witness", () => {
    const kind = existentialOf(SensorCapability);
    const a = kind.erase(new Thermometer());
    const b = kind.erase(new Thermometer());
    const c = kind.erase(new Barometer());
    expect(sameWitness(a, b)).toBe(true);
    expect(sameWitness(a, c)).toBe(false);
    expect(kind.witnesses().map((w) => w.typeName)).toEqual(["Thermometer", "Barometer"]);
  });

  it("witnessFor returns the cached table", () => {
    const kind = existentialOf(SensorCapability);
    expect(kind.witnessFor(new Barometer())).toBe(kind.witnessFor(new Barometer()));
  });
});

// ---------------------------------------------------------------------------
// 3. Dispatch
// ---------------------------------------------------------------------------

describe("Dispatch", () => {
  it("read returns the concrete implementer's value", () => {
    const box = AnySensor.erase(new Thermometer());
    expect(read(box, "online")).toBe(true);
    expect(read(box, "reading")).toBe(21.5);
  });

  it("readAll lists requirements in declaration order", () => {
    expect(readAll(AnySensor.erase(new Barometer()))).toEqual([
      ["online", false],
      ["reading", 1013],
    ]);
  });

  it("rejects a key outside the capability with EP1003", () => {
    const box = AnySensor.erase(new Thermometer());
    expect(hasRequirement(box, "unit")).toBe(false);
    expect(() => Reflect.apply(read, undefined, [box, "unit"])).toThrow(
      "`Sensor` has no requirement `unit`",
    );
  });

  it("re-checks the attribute kind on every read", () => {
    const flaky = new Flaky();
    const box = AnySensor.from(flaky);
    expect(read(box, "reading")).toBe(1);
    flaky.reading = "n/a";
    expect(() => read(box, "reading")).toThrow(
      "`Flaky` does not satisfy `Sensor`: `reading` must be number, found string",
    );
  });

  it("downcast recovers the concrete value only for the right type", () => {
    const box = AnySensor.erase(new Thermometer());
    expect(downcast(box, Thermometer)?.unit).toBe("C");
    expect(downcast(box, Barometer)).toBeUndefined();
  });

  it("matches whichever implementer was chosen at random", () => {
    const implementers = [() => new Thermometer(), () => new Barometer()];
    forAll(seededRandom, 50, (random) => {
      const chosen = implementers[Math.floor(random() * implementers.length)]();
      const box = AnySensor.erase(chosen);
      expect(read(box, "reading")).toBe(chosen.reading);
      expect(typeNameOf(box)).toBe(chosen.constructor.name);
    });
  });
});

// ---------------------------------------------------------------------------
// 4. Heterogeneous collections
// ---------------------------------------------------------------------------

describe("Collections", () => {
  const list: ExistentialList<Sensor> = [
    AnySensor.erase(new Thermometer()),
    AnySensor.erase(new Barometer()),
    AnySensor.erase(new Thermometer()),
  ];

  it("readEach dispatches per element", () => {
    expect(readEach(list, "reading")).toEqual([21.5, 1013, 21.5]);
  });

  it("mapExistential and filterExistential", () => {
    expect(mapExistential(list, typeNameOf)).toEqual(["Thermometer", "Barometer", "Thermometer"]);
    expect(filterExistential(list, (box) => read(box, "online"))).toHaveLength(2);
  });

  it("groups by concrete type in first-seen order", () => {
    const groups = groupByConcreteType(list);
    expect([...groups.keys()]).toEqual(["Thermometer", "Barometer"]);
    expect(groups.get("Thermometer")).toHaveLength(2);
    expect(distinctConcreteTypes(list)).toEqual(["Thermometer", "Barometer"]);
  });

  it("handles an empty list", () => {
    expect(readEach<Sensor, "reading">([], "reading")).toEqual([]);
    expect(groupByConcreteType([]).size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// 5. Widening
// ---------------------------------------------------------------------------

describe("Widening", () => {
  const Reading = existentialOf(
    defineCapability<{ readonly reading: number }>()("Reading", { reading: "number" }),
  );
  const Labelled = existentialOf(
    defineCapability<{ readonly label: string }>()("Labelled", { label: "string" }),
  );

  it("widen forgets requirements but keeps the concrete value", () => {
    const narrow = widen(AnySensor.erase(new Barometer()), Reading);
    expect(read(narrow, "reading")).toBe(1013);
    expect(typeNameOf(narrow)).toBe("Barometer");
    expect(hasRequirement(narrow, "online")).toBe(false);
  });

  it("rewrap returns undefined when the value lacks a requirement", () => {
    expect(rewrap(AnySensor.erase(new Barometer()), Labelled)).toBeUndefined();
  });
});
