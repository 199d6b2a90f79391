import { describe, it, expect } from "vitest";
import {
  forAll,
  seededRandom,
  sequenceRandom,
  typeAssert,
  type Equal,
  type Extends,
  type Not,
} from "../index.js";

describe("type utilities", () => {
  it("Equal distinguishes any from unknown", () => {
    typeAssert<Equal<number, number>>();
    typeAssert<Not<Equal<unknown, any>>>();
    typeAssert<Not<Equal<{ a: 1 }, { a: 1; b?: 2 }>>>();
  });

  it("Extends does not distribute over unions", () => {
    typeAssert<Extends<"a", string>>();
    typeAssert<Not<Extends<"a" | 1, string>>>();
  });
});

describe("forAll", () => {
  it("runs the property once per seed", () => {
    const seen: number[] = [];
    forAll((seed) => seed * 2, 4, (value) => {
      seen.push(value);
    });
    expect(seen).toEqual([0, 2, 4, 6]);
  });

  it("reports the failing seed", () => {
    expect(() =>
      forAll((seed) => seed, 10, (value) => {
        if (value === 3) throw new Error("three");
      }),
    ).toThrow("Property failed after 4 tests.\nFailing seed: 3\nError: three");
  });
});

describe("random sources", () => {
  it("seededRandom is deterministic and stays in [0, 1)", () => {
    const a = seededRandom(7);
    const b = seededRandom(7);
    for (let i = 0; i < 100; i++) {
      const x = a();
      expect(x).toBe(b());
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it("sequenceRandom replays then repeats the last value", () => {
    const random = sequenceRandom(0.1, 0.9);
    expect([random(), random(), random()]).toEqual([0.1, 0.9, 0.9]);
  });
});
