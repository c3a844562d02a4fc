import type { TrendSpec } from "./domains";
import type { Rng } from "./random";

export type TrendPhase = "practice" | "plateau" | "decline";

/**
 * Where a patient sits on the shared trend curve for one day.
 *
 * `practiceDays` stops growing at the practice cutoff, which is what holds the
 * plateau at the practice-phase end value.
 */
export type TrendState = {
  phase: TrendPhase;
  practiceDays: number;
  declineDays: number;
};

/** +1 when a larger value is better performance, -1 when smaller is. */
export type Direction = 1 | -1;

export type LinearTrend = {
  /** Improvement per practice day, in field units. */
  practiceGain: number;
  /** Worsening per decline day, in field units. */
  declineRate: number;
  direction: Direction;
};

/**
 * Draws the per-patient late-decline flag.
 *
 * Always consumes one uniform so the stream stays aligned whether or not the
 * patient is eligible.
 */
export function drawDeclineFlag(
  rng: Rng,
  cf: number,
  spec: TrendSpec
): boolean {
  const roll = rng();
  return cf < spec.impairmentCutoff && roll < spec.declineChance;
}

export function trendState(
  dayIndex: number,
  spec: TrendSpec,
  declining: boolean
): TrendState {
  if (!Number.isInteger(dayIndex) || dayIndex < 0) {
    throw new RangeError(`dayIndex must be an integer >= 0 (got ${dayIndex})`);
  }

  const practiceDays = Math.min(dayIndex, spec.practiceDays);
  const declineDays =
    declining && dayIndex > spec.declineAfter
      ? dayIndex - spec.declineAfter
      : 0;

  let phase: TrendPhase = "plateau";
  if (declineDays > 0) phase = "decline";
  else if (dayIndex <= spec.practiceDays) phase = "practice";

  return { phase, practiceDays, declineDays };
}

/**
 * Additive trend: baseline moved toward better performance while practising,
 * then away from it once declining.
 */
export function linearTrend(
  base: number,
  state: TrendState,
  trend: LinearTrend
): number {
  const delta =
    trend.practiceGain * state.practiceDays -
    trend.declineRate * state.declineDays;
  return base + trend.direction * delta;
}

/**
 * Multiplicative practice ramp used by the composite session: performance
 * starts at `start` of baseline and reaches baseline by the cutoff.
 */
export function practiceMultiplier(
  state: TrendState,
  start = 0.75,
  step = 0.07
): number {
  return Math.min(1, start + step * state.practiceDays);
}

/** Composite decline load, grows linearly past the threshold. */
export function declineLoad(state: TrendState, perDay = 0.05): number {
  return state.declineDays * perDay;
}
