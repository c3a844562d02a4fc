import { describe, expect, test } from "vitest";
import {
  deriveSeed,
  normal,
  randomInt,
  seededRandom,
  triangular,
  uuidFromRng,
  weightedChoice,
} from "./random";

describe("seeded generator", () => {
  test("same seed gives the same stream", () => {
    const a = seededRandom(123);
    const b = seededRandom(123);
    const xs = Array.from({ length: 20 }, () => a());
    const ys = Array.from({ length: 20 }, () => b());
    expect(xs).toEqual(ys);
  });

  test("values stay in [0, 1)", () => {
    const rng = seededRandom(9);
    for (let i = 0; i < 1000; i += 1) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  test("derived seeds are stable and differ per index", () => {
    expect(deriveSeed(42, 0)).toBe(deriveSeed(42, 0));
    expect(deriveSeed(42, 0)).not.toBe(deriveSeed(42, 1));
    expect(deriveSeed(42, 0)).not.toBe(deriveSeed(43, 0));
  });
});

describe("distributions", () => {
  test("randomInt covers the closed interval", () => {
    const rng = seededRandom(5);
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i += 1) seen.add(randomInt(rng, 1, 3));
    expect(Array.from(seen).sort()).toEqual([1, 2, 3]);
  });

  test("normal uses Box-Muller on two uniforms", () => {
    // u1 = u2 = 0.5 -> z = -sqrt(2 ln 2)
    expect(normal(() => 0.5, 10, 2)).toBeCloseTo(7.64518, 4);
  });

  test("weightedChoice never picks a zero-weight item", () => {
    const rng = seededRandom(1);
    for (let i = 0; i < 200; i += 1) {
      expect(weightedChoice(rng, ["a", "b"], [0, 1])).toBe("b");
    }
  });

  test("triangular stays within its bounds", () => {
    const rng = seededRandom(2);
    for (let i = 0; i < 500; i += 1) {
      const v = triangular(rng, 65, 90, 72);
      expect(v).toBeGreaterThanOrEqual(65);
      expect(v).toBeLessThanOrEqual(90);
    }
  });

  test("uuidFromRng produces v4 UUIDs", () => {
    const rng = seededRandom(77);
    const id = uuidFromRng(rng);
    expect(id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(uuidFromRng(seededRandom(77))).toBe(id);
  });
});
