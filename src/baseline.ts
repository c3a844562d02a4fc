import {
  clamp,
  clipTo,
  COMPOSITE_FIELDS,
  MEMORY_FIELDS,
} from "./bounds";
import { DOMAIN_SPECS, type TrendSpec } from "./domains";
import { normal, randomInt, uniform, type Rng } from "./random";
import { drawDeclineFlag, type LinearTrend } from "./trend";
import type {
  CognitiveBaseline,
  CognitiveDrivers,
  Domain,
  PatientProfile,
  ResolvedBaseline,
} from "./types";

/**
 * Substituted when a profile carries no (or a partial) `cognitive_baseline`.
 */
export const DEFAULT_COGNITIVE_BASELINE: CognitiveBaseline = {
  mmse: 26,
  moca: 24,
  depression_score: 6,
};

/** Screening-score prior for composite patients without a profile. */
const COMPOSITE_SCORE_PRIOR = {
  mmse: [22, 29],
  moca: [20, 28],
  depression_score: [0, 14],
} as const;

export function cognitiveFactor(mmse: number, moca: number): number {
  return clamp((mmse + moca) / 60, 0.3, 1.0);
}

/** The one penalty shared by every depression-sensitive baseline. */
export function depressionPenalty(depressionScore: number): number {
  return Math.min(0.15, depressionScore * 0.005);
}

function scoreOrDefault(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value)
    ? Math.trunc(value)
    : fallback;
}

/**
 * Resolves screening scores from a profile, or samples them when there is
 * none. Only the no-profile path consumes randomness.
 */
export function resolveBaseline(
  profile: PatientProfile | null,
  rng: Rng
): ResolvedBaseline {
  let mmse: number;
  let moca: number;
  let depressionScore: number;

  if (profile) {
    const cb = profile.cognitive_baseline ?? {};
    mmse = scoreOrDefault(cb.mmse, DEFAULT_COGNITIVE_BASELINE.mmse);
    moca = scoreOrDefault(cb.moca, DEFAULT_COGNITIVE_BASELINE.moca);
    depressionScore = scoreOrDefault(
      cb.depression_score,
      DEFAULT_COGNITIVE_BASELINE.depression_score
    );
  } else {
    const prior = COMPOSITE_SCORE_PRIOR;
    mmse = randomInt(rng, prior.mmse[0], prior.mmse[1]);
    moca = randomInt(rng, prior.moca[0], prior.moca[1]);
    depressionScore = randomInt(
      rng,
      prior.depression_score[0],
      prior.depression_score[1]
    );
  }

  return {
    mmse,
    moca,
    depressionScore,
    cf: cognitiveFactor(mmse, moca),
    depPenalty: depressionPenalty(depressionScore),
  };
}

/**
 * Drivers for a single-domain simulator: taken from the profile when there is
 * one, otherwise `cf` comes from the domain's uniform prior.
 */
export function resolveDrivers(
  profile: PatientProfile | null,
  rng: Rng,
  cfPrior: readonly [number, number]
): CognitiveDrivers {
  if (profile) {
    const { cf, depressionScore, depPenalty } = resolveBaseline(profile, rng);
    return { cf, depressionScore, depPenalty };
  }
  const cf = uniform(rng, cfPrior[0], cfPrior[1]);
  const depressionScore = randomInt(
    rng,
    COMPOSITE_SCORE_PRIOR.depression_score[0],
    COMPOSITE_SCORE_PRIOR.depression_score[1]
  );
  return {
    cf,
    depressionScore,
    depPenalty: depressionPenalty(depressionScore),
  };
}

function trendSpecFor(domain: Domain): TrendSpec {
  const spec = DOMAIN_SPECS[domain].trend;
  if (!spec) throw new Error(`Domain ${domain} has no trend constants`);
  return spec;
}

function cfPriorFor(domain: Domain): readonly [number, number] {
  const prior = DOMAIN_SPECS[domain].cfPrior;
  if (!prior) throw new Error(`Domain ${domain} has no cognitive prior`);
  return prior;
}

export type CompositeBaseline = Readonly<{
  drivers: ResolvedBaseline;
  declining: boolean;
  attentionSpan: number;
  attentionLatency: number;
  execFluency: number;
  execPause: number;
  execArticulation: number;
  memoryImmediate: number;
  memoryDelayed: number;
  sentiment: number;
  narrative: number;
  reactionTime: number;
}>;

/**
 * Per-patient latent means for the multi-domain session.
 *
 * Higher `cf` raises every "better is higher" mean and lowers latency, pause
 * and reaction time; the depression penalty pushes the other way.
 */
export function deriveCompositeBaseline(
  profile: PatientProfile | null,
  rng: Rng
): CompositeBaseline {
  const drivers = resolveBaseline(profile, rng);
  const { cf, depPenalty: dp } = drivers;
  const f = COMPOSITE_FIELDS;

  const attentionSpan = clipTo(
    normal(rng, 4.0 + cf * 3.0 - dp * 1.5, 0.55),
    f.digitSpan
  );
  const attentionLatency = clipTo(
    normal(rng, 1.65 - cf * 0.85 + dp * 0.4, 0.14),
    f.attentionLatency
  );
  const execFluency = clipTo(
    normal(rng, 12 + cf * 14 - dp * 6, 2.8),
    f.verbalFluency
  );
  const execPause = clipTo(
    normal(rng, 1420 - cf * 620 + dp * 220, 170),
    f.avgPause
  );
  const execArticulation = clipTo(
    normal(rng, 1.38 + cf * 0.92 - dp * 0.25, 0.18),
    f.articulationRate
  );
  const rawImmediate = normal(rng, 2.9 + cf * 2.0 - dp * 1.2, 0.48);
  const recallDrop = normal(rng, 0.9 - cf * 0.7 + dp * 0.3, 0.37);
  const memoryImmediate = clipTo(rawImmediate, f.immediateRecall);
  const memoryDelayed = clamp(rawImmediate - recallDrop, 0, memoryImmediate);
  const sentiment = clipTo(
    normal(rng, 0.47 + cf * 0.25 - dp * 1.1, 0.09),
    f.sentiment
  );
  const narrative = clipTo(
    normal(rng, 0.5 + cf * 0.34 - dp * 0.8, 0.09),
    f.narrative
  );
  const reactionTime = clipTo(
    normal(rng, 905 - cf * 355 + dp * 140, 58),
    f.reactionTime
  );

  const declining = drawDeclineFlag(rng, cf, trendSpecFor("composite"));

  return {
    drivers,
    declining,
    attentionSpan,
    attentionLatency,
    execFluency,
    execPause,
    execArticulation,
    memoryImmediate,
    memoryDelayed,
    sentiment,
    narrative,
    reactionTime,
  };
}

export type ExecutiveBaseline = Readonly<{
  drivers: CognitiveDrivers;
  declining: boolean;
  tmtCompletion: number;
  symbolDigit: number;
  tmtTrend: LinearTrend;
  symbolDigitTrend: LinearTrend;
}>;

export function deriveExecutiveBaseline(
  profile: PatientProfile | null,
  rng: Rng
): ExecutiveBaseline {
  const drivers = resolveDrivers(
    profile,
    rng,
    cfPriorFor("executive_function")
  );
  const { cf, depPenalty: dp } = drivers;

  const tmtCompletion = clipTo(normal(rng, 170 - cf * 80 + dp * 60, 15), {
    min: 65,
    max: 260,
  });
  const symbolDigit = clipTo(normal(rng, 30 + cf * 30 - dp * 12, 4), {
    min: 15,
    max: 70,
  });

  // Completion time: lower is better.
  const tmtTrend: LinearTrend = {
    practiceGain: uniform(rng, 0.5, 1.5),
    declineRate: uniform(rng, 0.05, 0.25),
    direction: -1,
  };
  const symbolDigitTrend: LinearTrend = {
    practiceGain: uniform(rng, 0.6, 1.4),
    declineRate: uniform(rng, 0.05, 0.2),
    direction: 1,
  };

  const declining = drawDeclineFlag(
    rng,
    cf,
    trendSpecFor("executive_function")
  );

  return {
    drivers,
    declining,
    tmtCompletion,
    symbolDigit,
    tmtTrend,
    symbolDigitTrend,
  };
}

export type MemoryBaseline = Readonly<{
  drivers: CognitiveDrivers;
  declining: boolean;
  immediate: number;
  delayed: number;
  immediateTrend: LinearTrend;
  delayedTrend: LinearTrend;
}>;

export function deriveMemoryBaseline(
  profile: PatientProfile | null,
  rng: Rng
): MemoryBaseline {
  const drivers = resolveDrivers(profile, rng, cfPriorFor("memory"));
  const { cf, depPenalty: dp } = drivers;

  const immediate = clipTo(normal(rng, 3.2 + 1.5 * cf - dp * 1.2, 0.6), {
    min: 0.5,
    max: MEMORY_FIELDS.immediateRecall.max,
  });
  const drop = normal(rng, 0.8 - 0.9 * cf + dp * 0.3, 0.4);
  const delayed = clamp(immediate - drop, 0, immediate);

  const declining = drawDeclineFlag(rng, cf, trendSpecFor("memory"));
  // Drawn for every patient so the stream does not depend on the flag.
  const rate = uniform(rng, 0.02, 0.08);
  const declineRate = declining ? rate : 0;

  return {
    drivers,
    declining,
    immediate,
    delayed,
    immediateTrend: {
      practiceGain: 0.25,
      declineRate: declineRate * 0.4,
      direction: 1,
    },
    delayedTrend: { practiceGain: 0.2, declineRate, direction: 1 },
  };
}

export type LanguageBaseline = Readonly<{
  drivers: CognitiveDrivers;
  declining: boolean;
  fluency: number;
  pauseMs: number;
  articulation: number;
  sentiment: number;
  fluencyTrend: LinearTrend;
  articulationTrend: LinearTrend;
  sentimentTrend: LinearTrend;
}>;

export function deriveLanguageBaseline(
  profile: PatientProfile | null,
  rng: Rng
): LanguageBaseline {
  const drivers = resolveDrivers(profile, rng, cfPriorFor("language"));
  const { cf, depPenalty: dp } = drivers;

  const fluency = clipTo(normal(rng, 6 + cf * 16 - dp * 6, 4), {
    min: 5,
    max: 40,
  });
  const pauseMs = clipTo(normal(rng, 1900 - cf * 900 + dp * 220, 250), {
    min: 400,
    max: 3000,
  });
  const articulation = clipTo(normal(rng, 1.4 + cf * 1.0 - dp * 0.25, 0.3), {
    min: 0.8,
    max: 3.5,
  });
  const sentiment = clipTo(normal(rng, 0.4 + cf * 0.2 - dp * 1.1, 0.12), {
    min: 0.1,
    max: 0.95,
  });

  const fluencyTrend: LinearTrend = {
    practiceGain: uniform(rng, 0.2, 0.6),
    declineRate: uniform(rng, 0.05, 0.15),
    direction: 1,
  };
  const articulationTrend: LinearTrend = {
    practiceGain: uniform(rng, 0.01, 0.03),
    declineRate: uniform(rng, 0.005, 0.015),
    direction: 1,
  };
  const sentimentTrend: LinearTrend = {
    practiceGain: 0.005,
    declineRate: uniform(rng, 0.002, 0.006),
    direction: 1,
  };

  const declining = drawDeclineFlag(rng, cf, trendSpecFor("language"));

  return {
    drivers,
    declining,
    fluency,
    pauseMs,
    articulation,
    sentiment,
    fluencyTrend,
    articulationTrend,
    sentimentTrend,
  };
}
