import {
  compositeRecord,
  executiveRecord,
  languageRecord,
  memoryRecord,
  mobilityRecord,
  sessionTimestamp,
} from "./assembler";
import {
  deriveCompositeBaseline,
  deriveExecutiveBaseline,
  deriveLanguageBaseline,
  deriveMemoryBaseline,
} from "./baseline";
import {
  COMPOSITE_FIELDS,
  EXECUTIVE_FIELDS,
  LANGUAGE_FIELDS,
  MEMORY_FIELDS,
  MOBILITY_FIELDS,
  roundTo,
  sampleField,
} from "./bounds";
import {
  attentionErrorsMean,
  capDelayedRecall,
  drawIntrusion,
  executiveErrorsMean,
  intrusionProbability,
  languagePauseMean,
  languageSignalQuality,
  missedTrialsMean,
  moodMeans,
  moodScore,
  orientationProbabilities,
  orientationScore,
} from "./coupling";
import { DOMAIN_SPECS, isDomain, type TrendSpec } from "./domains";
import {
  errorMessage,
  InvalidParametersError,
  RecordCountMismatchError,
} from "./errors";
import {
  bernoulli,
  deriveSeed,
  isSeed,
  MAX_SEED,
  pick,
  randomSeed,
  seededRandom,
  uniform,
  type Rng,
} from "./random";
import { resolveIdentities } from "./resolver";
import {
  declineLoad,
  linearTrend,
  practiceMultiplier,
  trendState,
} from "./trend";
import type {
  CompositeRecord,
  Domain,
  GenerationParams,
  GenerationResult,
  PatientProfile,
  ResolvedIdentity,
  SessionRecord,
} from "./types";

/**
 * Produces one record for a patient whose baseline is already fixed.
 * Called with ascending day indices.
 */
export type DaySimulator<R extends SessionRecord = SessionRecord> = (
  dayIndex: number,
  at: Date
) => R;

function trendFor(domain: Domain): TrendSpec {
  const trend = DOMAIN_SPECS[domain].trend;
  if (!trend) throw new Error(`Domain ${domain} has no trend constants`);
  return trend;
}

/**
 * Multi-domain session: attention, executive speech, memory, orientation,
 * processing speed and mood in one record.
 */
export function compositeSimulator(
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator<CompositeRecord> {
  const base = deriveCompositeBaseline(identity.profile, rng);
  const { cf, depressionScore } = base.drivers;
  const trend = trendFor("composite");
  const f = COMPOSITE_FIELDS;

  return (dayIndex, at) => {
    const state = trendState(dayIndex, trend, base.declining);
    const pm = practiceMultiplier(state);
    const load = declineLoad(state);

    const span = sampleField(rng, base.attentionSpan * pm - load, f.digitSpan);
    const attentionErrors = sampleField(
      rng,
      attentionErrorsMean(span),
      f.attentionErrors
    );
    const latency = sampleField(
      rng,
      base.attentionLatency / pm + load * 0.2,
      f.attentionLatency
    );

    const fluency = sampleField(
      rng,
      base.execFluency * pm - load * 2,
      f.verbalFluency
    );
    const articulation = sampleField(
      rng,
      base.execArticulation * pm - load * 0.05,
      f.articulationRate
    );
    const pause = sampleField(
      rng,
      base.execPause / pm + load * 120,
      f.avgPause
    );

    const immediate = sampleField(
      rng,
      base.memoryImmediate * pm - load * 0.2,
      f.immediateRecall
    );
    const delayed = capDelayedRecall(
      sampleField(rng, base.memoryDelayed * pm - load * 0.35, f.delayedRecall),
      immediate
    );
    const intrusions = drawIntrusion(
      rng,
      intrusionProbability({
        immediateRecall: immediate,
        delayedRecall: delayed,
        cf,
        depressionScore,
      })
    );

    const orientation = orientationProbabilities(cf, load);
    const dateCorrect = bernoulli(rng, orientation.date);
    const cityCorrect = bernoulli(rng, orientation.city);

    const reactionTime = sampleField(
      rng,
      base.reactionTime / pm + load * 40,
      f.reactionTime
    );
    const missedMean = missedTrialsMean(reactionTime);
    const missedTrials =
      missedMean === null ? 0 : sampleField(rng, missedMean, f.missedTrials);

    const mood = moodMeans(
      { sentiment: base.sentiment, narrative: base.narrative },
      pm,
      load,
      depressionScore
    );
    const sentiment = sampleField(rng, mood.sentiment, f.sentiment);
    const narrative = sampleField(rng, mood.narrative, f.narrative);

    return compositeRecord(identity, at, {
      attention: {
        digit_span_max: span,
        errors: attentionErrors,
        latency_sec: latency,
      },
      executive_function: {
        verbal_fluency_words: fluency,
        articulation_rate_wps: articulation,
        avg_pause_ms: pause,
      },
      memory: {
        immediate_recall: immediate,
        delayed_recall: delayed,
        intrusion_errors: intrusions,
      },
      orientation: {
        date_correct: dateCorrect,
        city_correct: cityCorrect,
        orientation_correct: orientationScore(dateCorrect, cityCorrect),
      },
      processing_speed: {
        avg_reaction_time_ms: reactionTime,
        missed_trials: missedTrials,
      },
      mood_behavior: {
        sentiment_score: sentiment,
        narrative_coherence: narrative,
        mood_score: moodScore(sentiment),
      },
    });
  };
}

// Passive gait monitoring has no cognitive baseline and no trend.
export function mobilitySimulator(
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator {
  const f = MOBILITY_FIELDS;
  return (_dayIndex, at) => {
    const gait = sampleField(rng, 0.9, f.gaitSpeed);
    const stride = sampleField(rng, 14, f.strideVariability);
    const steps = sampleField(rng, 4000, f.dailySteps);
    const fall = bernoulli(rng, 0.02);
    const signalQuality = roundTo(uniform(rng, 0.85, 1.0), 2);
    return mobilityRecord(
      identity,
      at,
      {
        gait_speed_mps: gait,
        stride_variability_pct: stride,
        daily_steps: steps,
        fall_detected: fall,
      },
      signalQuality
    );
  };
}

export function executiveSimulator(
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator {
  const base = deriveExecutiveBaseline(identity.profile, rng);
  const trend = trendFor("executive_function");
  const f = EXECUTIVE_FIELDS;

  return (dayIndex, at) => {
    const state = trendState(dayIndex, trend, base.declining);
    const tmt = sampleField(
      rng,
      linearTrend(base.tmtCompletion, state, base.tmtTrend),
      f.tmtCompletion
    );
    const symbolDigit = sampleField(
      rng,
      linearTrend(base.symbolDigit, state, base.symbolDigitTrend),
      f.symbolDigit
    );
    const errors = sampleField(rng, executiveErrorsMean(tmt), f.errors);
    const signalQuality = sampleField(rng, 0.95, f.signalQuality);

    return executiveRecord(
      identity,
      at,
      {
        tmt_b_completion_sec: tmt,
        errors,
        symbol_digit_correct: symbolDigit,
      },
      signalQuality
    );
  };
}

export function memorySimulator(
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator {
  const base = deriveMemoryBaseline(identity.profile, rng);
  const { cf, depressionScore } = base.drivers;
  const trend = trendFor("memory");
  const f = MEMORY_FIELDS;

  return (dayIndex, at) => {
    const state = trendState(dayIndex, trend, base.declining);
    const immediate = sampleField(
      rng,
      linearTrend(base.immediate, state, base.immediateTrend),
      f.immediateRecall
    );
    const delayed = capDelayedRecall(
      sampleField(
        rng,
        linearTrend(base.delayed, state, base.delayedTrend),
        f.delayedRecall
      ),
      immediate
    );
    const intrusions = drawIntrusion(
      rng,
      intrusionProbability({
        immediateRecall: immediate,
        delayedRecall: delayed,
        cf,
        depressionScore,
      })
    );
    const signalQuality = roundTo(uniform(rng, 0.9, 1.0), 2);

    return memoryRecord(
      identity,
      at,
      {
        immediate_recall_correct: immediate,
        delayed_recall_correct: delayed,
        intrusion_errors: intrusions,
      },
      signalQuality
    );
  };
}

export function languageSimulator(
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator {
  const base = deriveLanguageBaseline(identity.profile, rng);
  const trend = trendFor("language");
  const f = LANGUAGE_FIELDS;

  return (dayIndex, at) => {
    const state = trendState(dayIndex, trend, base.declining);
    const fluencyMean = linearTrend(base.fluency, state, base.fluencyTrend);
    const articulationMean = linearTrend(
      base.articulation,
      state,
      base.articulationTrend
    );
    const sentimentMean = linearTrend(
      base.sentiment,
      state,
      base.sentimentTrend
    );
    const pauseMean = languagePauseMean(base.pauseMs, base.fluency, fluencyMean);

    const fluency = sampleField(rng, fluencyMean, f.verbalFluency);
    const articulation = sampleField(rng, articulationMean, f.articulationRate);
    const pause = sampleField(rng, pauseMean, f.avgPause);
    const sentiment = sampleField(rng, sentimentMean, f.sentiment);
    const signalQuality = languageSignalQuality(rng, pause, articulation);

    return languageRecord(
      identity,
      at,
      {
        verbal_fluency_words: fluency,
        avg_pause_ms: pause,
        articulation_rate_wps: articulation,
        sentiment_score: sentiment,
      },
      signalQuality
    );
  };
}

/**
 * Derives the patient's baseline (consuming `rng`) and returns the day
 * simulator for the domain.
 */
export function createDaySimulator(
  domain: Domain,
  identity: ResolvedIdentity,
  rng: Rng
): DaySimulator {
  switch (domain) {
    case "composite":
      return compositeSimulator(identity, rng);
    case "mobility":
      return mobilitySimulator(identity, rng);
    case "executive_function":
      return executiveSimulator(identity, rng);
    case "memory":
      return memorySimulator(identity, rng);
    case "language":
      return languageSimulator(identity, rng);
  }
}

export function isCompositeRecord(
  record: SessionRecord
): record is CompositeRecord {
  return "session_date" in record;
}

/**
 * Checks run parameters before any record is generated.
 */
export function validateParams(params: GenerationParams): void {
  if (!isDomain(params.domain)) {
    throw new InvalidParametersError(`Unknown domain: ${String(params.domain)}`);
  }
  if (!Number.isInteger(params.patients) || params.patients <= 0) {
    throw new InvalidParametersError(
      `patients must be a positive integer (got ${params.patients})`
    );
  }
  if (!Number.isInteger(params.days) || params.days <= 0) {
    throw new InvalidParametersError(
      `days must be a positive integer (got ${params.days})`
    );
  }
  if (Number.isNaN(params.startDate.getTime())) {
    throw new InvalidParametersError("startDate is not a valid date");
  }
  if (params.seed !== null && !isSeed(params.seed)) {
    throw new InvalidParametersError(
      `seed must be an integer between 0 and ${MAX_SEED} (got ${params.seed})`
    );
  }
}

/**
 * Generates `days` records for every resolved patient, patient-major and
 * day-ascending.
 *
 * Each patient draws from its own generator seeded from the run seed and its
 * index, so one patient's records do not depend on any other patient's.
 * A patient that fails is skipped with a warning; a resulting count mismatch
 * is a warning too, or a `RecordCountMismatchError` under `strictCount`.
 */
export function generateDataset(params: GenerationParams): GenerationResult {
  validateParams(params);

  const spec = DOMAIN_SPECS[params.domain];
  const baseSeed = params.seed ?? randomSeed();
  const { identities, warnings } = resolveIdentities({
    requested: params.patients,
    profiles: params.profiles,
    role: spec.role,
    devicePrefix: spec.devicePrefix,
    useAllProfiles: params.useAllProfiles,
    rng: seededRandom(baseSeed),
  });

  const records: SessionRecord[] = [];
  let patientsUsed = 0;

  for (const identity of identities) {
    const rng = seededRandom(deriveSeed(baseSeed, identity.index));
    try {
      const simulate = createDaySimulator(params.domain, identity, rng);
      const patientRecords: SessionRecord[] = [];
      for (let day = 0; day < params.days; day += 1) {
        const at = sessionTimestamp(params.startDate, day, spec.window, rng);
        patientRecords.push(simulate(day, at));
      }
      records.push(...patientRecords);
      patientsUsed += 1;
    } catch (err) {
      warnings.push(
        `Skipped patient ${identity.patientId}: ${errorMessage(err)}`
      );
    }
  }

  const expected = identities.length * params.days;
  const actual = records.length;
  if (actual !== expected) {
    if (params.strictCount) throw new RecordCountMismatchError(expected, actual);
    warnings.push(
      `Record count mismatch: expected ${expected} vs actual ${actual}.`
    );
  }

  return { records, warnings, patientsUsed, expected, actual };
}

/**
 * One composite session "right now" for a randomly chosen profile.
 */
export function simulateLiveSession(
  profiles: PatientProfile[],
  rng: Rng,
  now: Date
): { record: CompositeRecord; warnings: string[] } {
  if (profiles.length === 0) {
    throw new InvalidParametersError("No patient profiles to simulate from");
  }
  const spec = DOMAIN_SPECS.composite;
  const resolved = resolveIdentities({
    requested: profiles.length,
    profiles,
    role: spec.role,
    devicePrefix: spec.devicePrefix,
    useAllProfiles: true,
    rng,
  });
  const identity = pick(rng, resolved.identities);
  const record = compositeSimulator(identity, rng)(0, now);
  const warnings = resolved.warnings.filter((w) =>
    w.includes(identity.patientId)
  );
  return { record, warnings };
}
