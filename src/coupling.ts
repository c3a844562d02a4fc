import { clamp, roundTo } from "./bounds";
import { bernoulli, uniform, type Rng } from "./random";

export type IntrusionWeights = Readonly<{
  base: number;
  gapWeight: number;
  impairmentPivot: number;
  impairmentWeight: number;
  depressionScale: number;
  depressionWeight: number;
  min: number;
  max: number;
}>;

type OrientationItem = Readonly<{
  base: number;
  cfWeight: number;
  declineWeight: number;
}>;

export type OrientationWeights = Readonly<{
  cfPivot: number;
  pointsPerItem: number;
  date: OrientationItem;
  city: OrientationItem;
}>;

type MoodTerm = Readonly<{
  practiceWeight: number;
  declineWeight: number;
  depressionWeight: number;
}>;

export type MoodWeights = Readonly<{
  depressionScale: number;
  sentiment: MoodTerm;
  narrative: MoodTerm;
}>;

export type LanguageSignalWeights = Readonly<{
  longPauseMs: number;
  slowArticulationWps: number;
  penalty: number;
  jitter: number;
  floor: number;
}>;

export type CouplingWeights = Readonly<{
  intrusion: IntrusionWeights;
  missedTrials: Readonly<{ thresholdMs: number; scaleMs: number }>;
  attentionErrors: Readonly<{ pivotSpan: number; weight: number }>;
  executiveErrors: Readonly<{ offsetSec: number; scaleSec: number }>;
  orientation: OrientationWeights;
  mood: MoodWeights;
  languageSignal: LanguageSignalWeights;
}>;

function freezeDeep<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null) freezeDeep(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Coupling weights between same-session fields. Frozen; pass an override
 * object to change them.
 *
 * These are tunable defaults picked to keep outputs in a plausible range, not
 * a validated clinical model. Every coupling function takes an override.
 */
export const COUPLING_DEFAULTS: CouplingWeights = freezeDeep({
  intrusion: {
    base: 0.1,
    gapWeight: 0.05,
    impairmentPivot: 0.55,
    impairmentWeight: 0.16,
    depressionScale: 30,
    depressionWeight: 0.12,
    min: 0.01,
    max: 0.4,
  },
  missedTrials: { thresholdMs: 600, scaleMs: 160 },
  attentionErrors: { pivotSpan: 6, weight: 0.6 },
  executiveErrors: { offsetSec: 60, scaleSec: 50 },
  orientation: {
    cfPivot: 0.6,
    pointsPerItem: 4,
    date: { base: 0.85, cfWeight: 0.25, declineWeight: 0.05 },
    city: { base: 0.8, cfWeight: 0.3, declineWeight: 0.07 },
  },
  mood: {
    depressionScale: 30,
    sentiment: {
      practiceWeight: 0.05,
      declineWeight: 0.02,
      depressionWeight: 0.15,
    },
    narrative: {
      practiceWeight: 0.06,
      declineWeight: 0.03,
      depressionWeight: 0.12,
    },
  },
  languageSignal: {
    longPauseMs: 2500,
    slowArticulationWps: 1.0,
    penalty: 0.05,
    jitter: 0.05,
    floor: 0.75,
  },
});

export type IntrusionInput = {
  immediateRecall: number;
  delayedRecall: number;
  cf: number;
  depressionScore: number;
};

/**
 * Probability of at least one intrusion error in a recall session.
 *
 * Grows with the immediate/delayed recall gap, with impairment below the
 * pivot, and with depression; clipped to [min, max].
 */
export function intrusionProbability(
  input: IntrusionInput,
  w: IntrusionWeights = COUPLING_DEFAULTS.intrusion
): number {
  const gap = Math.max(0, input.immediateRecall - input.delayedRecall);
  const p =
    w.base +
    w.gapWeight * gap +
    w.impairmentWeight * Math.max(0, w.impairmentPivot - input.cf) +
    w.depressionWeight * (input.depressionScore / w.depressionScale);
  return clamp(p, w.min, w.max);
}

/** 1 if an intrusion occurred this session, else 0. */
export function drawIntrusion(rng: Rng, probability: number): number {
  return bernoulli(rng, probability) ? 1 : 0;
}

/**
 * Delayed recall can never exceed immediate recall in the same session.
 */
export function capDelayedRecall(delayed: number, immediate: number): number {
  return Math.max(0, Math.min(delayed, immediate));
}

/**
 * Mean of the missed-trials draw, or `null` when the reaction time is fast
 * enough that no trials are missed.
 */
export function missedTrialsMean(
  reactionTimeMs: number,
  c: CouplingWeights["missedTrials"] = COUPLING_DEFAULTS.missedTrials
): number | null {
  if (reactionTimeMs <= c.thresholdMs) return null;
  return (reactionTimeMs - c.thresholdMs) / c.scaleMs;
}

export function attentionErrorsMean(
  digitSpan: number,
  c: CouplingWeights["attentionErrors"] = COUPLING_DEFAULTS.attentionErrors
): number {
  return (c.pivotSpan - digitSpan) * c.weight;
}

/** Slower trail-making completion, more errors. */
export function executiveErrorsMean(
  completionSec: number,
  c: CouplingWeights["executiveErrors"] = COUPLING_DEFAULTS.executiveErrors
): number {
  return (completionSec - c.offsetSec) / c.scaleSec;
}

/**
 * Success probabilities for the two orientation items.
 *
 * Not clipped: a value above 1 (or below 0) simply makes the Bernoulli draw
 * certain.
 */
export function orientationProbabilities(
  cf: number,
  declineLoad: number,
  w: OrientationWeights = COUPLING_DEFAULTS.orientation
): { date: number; city: number } {
  const shift = cf - w.cfPivot;
  return {
    date:
      w.date.base +
      shift * w.date.cfWeight -
      declineLoad * w.date.declineWeight,
    city:
      w.city.base +
      shift * w.city.cfWeight -
      declineLoad * w.city.declineWeight,
  };
}

/** 0, 4 or 8 points. */
export function orientationScore(
  dateCorrect: boolean,
  cityCorrect: boolean,
  pointsPerItem = COUPLING_DEFAULTS.orientation.pointsPerItem
): number {
  return (Number(dateCorrect) + Number(cityCorrect)) * pointsPerItem;
}

/** Maps a 0..1 sentiment score onto a 1..5 mood rating. */
export function moodScore(sentiment: number): number {
  return clamp(Math.round(3 + (sentiment - 0.5) * 4), 1, 5);
}

function moodMean(
  base: number,
  practiceMult: number,
  declineLoad: number,
  depressionScore: number,
  term: MoodTerm,
  depressionScale: number
): number {
  return (
    base +
    (practiceMult - 1) * term.practiceWeight -
    declineLoad * term.declineWeight -
    (depressionScore / depressionScale) * term.depressionWeight
  );
}

/**
 * Session means for sentiment and narrative coherence, pulled down by the
 * early practice deficit, the decline load and depression.
 */
export function moodMeans(
  base: { sentiment: number; narrative: number },
  practiceMult: number,
  declineLoad: number,
  depressionScore: number,
  c: MoodWeights = COUPLING_DEFAULTS.mood
): { sentiment: number; narrative: number } {
  return {
    sentiment: moodMean(
      base.sentiment,
      practiceMult,
      declineLoad,
      depressionScore,
      c.sentiment,
      c.depressionScale
    ),
    narrative: moodMean(
      base.narrative,
      practiceMult,
      declineLoad,
      depressionScore,
      c.narrative,
      c.depressionScale
    ),
  };
}

/**
 * Speech pauses lengthen as fluency drops below its baseline.
 */
export function languagePauseMean(
  basePauseMs: number,
  baseFluency: number,
  fluencyMean: number
): number {
  return basePauseMs * (baseFluency / Math.max(1, fluencyMean));
}

/**
 * Audio capture quality, degraded by very long pauses or slow articulation.
 */
export function languageSignalQuality(
  rng: Rng,
  pauseMs: number,
  articulationWps: number,
  c: LanguageSignalWeights = COUPLING_DEFAULTS.languageSignal
): number {
  let penalty = 0;
  if (pauseMs > c.longPauseMs) penalty += c.penalty;
  if (articulationWps < c.slowArticulationWps) penalty += c.penalty;
  const jitter = uniform(rng, 0, c.jitter);
  return roundTo(Math.max(c.floor, 1 - penalty - jitter), 2);
}
