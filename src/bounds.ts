import { normal, type Rng } from "./random";

/**
 * Output rounding per field.
 * - `round`: nearest integer (counts, scores)
 * - `trunc`: toward zero (error tallies drawn from a skewed mean)
 * - `cents` / `tenths`: rates and fractions
 */
export type Rounding = "round" | "trunc" | "cents" | "tenths" | "none";

export type FieldSpec = {
  /** Standard deviation of the per-session Gaussian around the trend mean. */
  sd: number;
  min: number;
  max: number;
  rounding: Rounding;
};

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}

export function roundTo(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

export function applyRounding(value: number, rounding: Rounding): number {
  switch (rounding) {
    case "round":
      return Math.round(value);
    case "trunc":
      return Math.trunc(value);
    case "cents":
      return roundTo(value, 2);
    case "tenths":
      return roundTo(value, 1);
    case "none":
      return value;
  }
}

/**
 * Rounds then clips into the field's closed interval.
 *
 * Bounds are integers for integer fields, so clipping never breaks the
 * rounding contract.
 */
export function bound(value: number, spec: FieldSpec): number {
  return clamp(applyRounding(value, spec.rounding), spec.min, spec.max);
}

/**
 * One noisy, bounded observation around a trend-adjusted mean.
 */
export function sampleField(rng: Rng, mean: number, spec: FieldSpec): number {
  return bound(normal(rng, mean, spec.sd), spec);
}

export const COMPOSITE_FIELDS = {
  digitSpan: { sd: 0.5, min: 2, max: 8, rounding: "round" },
  attentionErrors: { sd: 0.7, min: 0, max: 10, rounding: "trunc" },
  attentionLatency: { sd: 0.12, min: 0.6, max: 5, rounding: "cents" },
  verbalFluency: { sd: 3, min: 3, max: 45, rounding: "round" },
  articulationRate: { sd: 0.15, min: 0.6, max: 4, rounding: "cents" },
  avgPause: { sd: 160, min: 300, max: 4000, rounding: "trunc" },
  immediateRecall: { sd: 0.6, min: 0, max: 5, rounding: "round" },
  delayedRecall: { sd: 0.7, min: 0, max: 5, rounding: "round" },
  reactionTime: { sd: 50, min: 350, max: 2500, rounding: "trunc" },
  missedTrials: { sd: 0.6, min: 0, max: 20, rounding: "trunc" },
  sentiment: { sd: 0.07, min: 0, max: 1, rounding: "cents" },
  narrative: { sd: 0.08, min: 0, max: 1, rounding: "cents" },
} as const satisfies Record<string, FieldSpec>;

export const MOBILITY_FIELDS = {
  gaitSpeed: { sd: 0.15, min: 0.4, max: 1.5, rounding: "cents" },
  strideVariability: { sd: 5, min: 5, max: 30, rounding: "tenths" },
  dailySteps: { sd: 1500, min: 500, max: 15000, rounding: "trunc" },
} as const satisfies Record<string, FieldSpec>;

export const EXECUTIVE_FIELDS = {
  tmtCompletion: { sd: 6, min: 55, max: 300, rounding: "round" },
  errors: { sd: 1, min: 0, max: 12, rounding: "trunc" },
  symbolDigit: { sd: 2.5, min: 10, max: 80, rounding: "round" },
  signalQuality: { sd: 0.02, min: 0.8, max: 1, rounding: "cents" },
} as const satisfies Record<string, FieldSpec>;

export const MEMORY_FIELDS = {
  immediateRecall: { sd: 0.5, min: 0, max: 5, rounding: "round" },
  delayedRecall: { sd: 0.6, min: 0, max: 5, rounding: "round" },
} as const satisfies Record<string, FieldSpec>;

export const LANGUAGE_FIELDS = {
  verbalFluency: { sd: 3, min: 3, max: 45, rounding: "round" },
  articulationRate: { sd: 0.15, min: 0.6, max: 3.8, rounding: "cents" },
  avgPause: { sd: 250, min: 300, max: 4000, rounding: "round" },
  sentiment: { sd: 0.07, min: 0, max: 1, rounding: "cents" },
} as const satisfies Record<string, FieldSpec>;

/** Clips without rounding, for latent baselines. */
export function clipTo(
  value: number,
  spec: { min: number; max: number }
): number {
  return clamp(value, spec.min, spec.max);
}
