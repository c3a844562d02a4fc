import { describe, expect, test } from "vitest";
import type { TrendSpec } from "./domains";
import {
  declineLoad,
  drawDeclineFlag,
  linearTrend,
  practiceMultiplier,
  trendState,
} from "./trend";

const spec: TrendSpec = {
  practiceDays: 4,
  declineAfter: 10,
  impairmentCutoff: 0.6,
  declineChance: 0.5,
};

describe("trendState", () => {
  test("practice phase runs through the cutoff day", () => {
    expect(trendState(0, spec, false)).toEqual({
      phase: "practice",
      practiceDays: 0,
      declineDays: 0,
    });
    expect(trendState(4, spec, false)).toEqual({
      phase: "practice",
      practiceDays: 4,
      declineDays: 0,
    });
  });

  test("plateau holds the practice-end value", () => {
    expect(trendState(5, spec, false)).toEqual({
      phase: "plateau",
      practiceDays: 4,
      declineDays: 0,
    });
    expect(trendState(10, spec, true)).toEqual({
      phase: "plateau",
      practiceDays: 4,
      declineDays: 0,
    });
  });

  test("decline only for flagged patients past the threshold", () => {
    expect(trendState(12, spec, true)).toEqual({
      phase: "decline",
      practiceDays: 4,
      declineDays: 2,
    });
    expect(trendState(12, spec, false).phase).toBe("plateau");
  });

  test("rejects invalid day indices", () => {
    expect(() => trendState(-1, spec, false)).toThrow(RangeError);
    expect(() => trendState(1.5, spec, false)).toThrow(RangeError);
  });
});

describe("trend curves", () => {
  test("linear trend respects the improvement direction", () => {
    const state = { phase: "decline" as const, practiceDays: 4, declineDays: 2 };
    // Completion time: lower is better.
    expect(
      linearTrend(100, state, {
        practiceGain: 1,
        declineRate: 0.5,
        direction: -1,
      })
    ).toBe(97);
    expect(
      linearTrend(100, state, {
        practiceGain: 1,
        declineRate: 0.5,
        direction: 1,
      })
    ).toBe(103);
  });

  test("practice multiplier ramps to 1", () => {
    const at = (practiceDays: number) => ({
      phase: "practice" as const,
      practiceDays,
      declineDays: 0,
    });
    expect(practiceMultiplier(at(0))).toBe(0.75);
    expect(practiceMultiplier(at(2))).toBeCloseTo(0.89, 10);
    expect(practiceMultiplier(at(4))).toBe(1);
  });

  test("decline load grows 0.05 per day", () => {
    expect(
      declineLoad({ phase: "decline", practiceDays: 4, declineDays: 5 })
    ).toBeCloseTo(0.25, 10);
  });
});

describe("drawDeclineFlag", () => {
  test("never flags patients at or above the cutoff", () => {
    expect(drawDeclineFlag(() => 0, 0.9, spec)).toBe(false);
    expect(drawDeclineFlag(() => 0, 0.6, spec)).toBe(false);
  });

  test("flags impaired patients when the roll is under the chance", () => {
    expect(drawDeclineFlag(() => 0.1, 0.5, spec)).toBe(true);
    expect(drawDeclineFlag(() => 0.7, 0.5, spec)).toBe(false);
  });

  test("always consumes exactly one draw", () => {
    let calls = 0;
    const rng = () => {
      calls += 1;
      return 0.3;
    };
    drawDeclineFlag(rng, 0.95, spec);
    drawDeclineFlag(rng, 0.4, spec);
    expect(calls).toBe(2);
  });
});
