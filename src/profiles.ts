import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import rawCatalog from "../data/profile-catalog.json";
import { clamp } from "./bounds";
import { errorMessage, ProfileLoadError } from "./errors";
import {
  bernoulli,
  normal,
  pick,
  randomInt,
  triangular,
  uniform,
  uuidFromRng,
  weightedChoice,
  type Rng,
} from "./random";
import type { CognitiveBaseline, PatientProfile } from "./types";

const catalogSchema = z.object({
  sexOptions: z.array(z.string()).min(1),
  firstNames: z.array(z.string()).min(1),
  lastNames: z.array(z.string()).min(1),
  comorbidityWeights: z.record(z.number().positive()),
  medications: z.record(z.array(z.string())),
  supplements: z.array(z.string()).min(1),
});

const catalog = catalogSchema.parse(rawCatalog);

/** Turns `null` into `undefined` so parsed profiles match `PatientProfile`. */
function nullish<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((v) => v ?? undefined);
}

const score = (max: number) => nullish(z.number().min(0).max(max));

const profileSchema = z.object({
  patient_id: nullish(z.string().trim().min(1)),
  name: nullish(z.string()),
  dob: nullish(z.string()),
  sex: nullish(z.string()),
  education_years: nullish(z.number().min(0)),
  comorbidities: nullish(z.array(z.string())),
  medications: nullish(z.array(z.string())),
  device_ids: nullish(
    z.object({
      wearable: nullish(z.string().min(1)),
      speech: nullish(z.string().min(1)),
      app: nullish(z.string().min(1)),
      clinic: nullish(z.string().min(1)),
    })
  ),
  cognitive_baseline: nullish(
    z.object({
      mmse: score(30),
      moca: score(30),
      depression_score: score(27),
    })
  ),
});

/**
 * Validates an already-parsed JSON value as a profile list.
 *
 * Rejects anything that is not an array, entries that fail the schema, and
 * repeated `patient_id`s.
 */
export function parseProfiles(
  data: unknown,
  source: string | null = null
): PatientProfile[] {
  if (!Array.isArray(data)) {
    throw new ProfileLoadError(
      "Patient profiles JSON must be a list (array) of objects.",
      source
    );
  }

  const profiles: PatientProfile[] = [];
  const problems: string[] = [];
  data.forEach((entry, i) => {
    const parsed = profileSchema.safeParse(entry);
    if (parsed.success) {
      profiles.push(parsed.data);
      return;
    }
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "entry";
    problems.push(`[${i}] ${where}: ${issue.message}`);
  });

  if (problems.length > 0) {
    const shown = problems.slice(0, 5).join("; ");
    const more = problems.length > 5 ? ` (+${problems.length - 5} more)` : "";
    throw new ProfileLoadError(`Invalid patient profiles: ${shown}${more}`, source);
  }

  const duplicates = findDuplicatePatientIds(profiles);
  if (duplicates.length > 0) {
    throw new ProfileLoadError(
      `Duplicate patient_id values: ${duplicates.join(", ")}`,
      source
    );
  }

  return profiles;
}

export function findDuplicatePatientIds(profiles: PatientProfile[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const p of profiles) {
    if (!p.patient_id) continue;
    if (seen.has(p.patient_id)) dupes.add(p.patient_id);
    seen.add(p.patient_id);
  }
  return Array.from(dupes).sort((a, b) => a.localeCompare(b));
}

/**
 * Reads and validates a profiles file. Never returns a partial list.
 */
export function loadProfiles(path: string): PatientProfile[] {
  if (!existsSync(path)) {
    throw new ProfileLoadError("Patient profiles file does not exist", path);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ProfileLoadError(
      `Failed to parse patient profiles JSON: ${errorMessage(err)}`,
      path
    );
  }

  return parseProfiles(data, path);
}

/**
 * Returns the first candidate path that exists, or `null`.
 */
export function findProfilesFile(candidates: string[]): string | null {
  for (const c of candidates) {
    if (existsSync(c)) return c;
  }
  return null;
}

function sampleComorbidities(rng: Rng): string[] {
  const count = clamp(Math.trunc(normal(rng, 2.0, 1.2)), 0, 5);
  const names = Object.keys(catalog.comorbidityWeights);
  const weights = names.map((n) => catalog.comorbidityWeights[n]);

  // Oversample with replacement, keep first unique hits.
  const chosen: string[] = [];
  for (let i = 0; i < 10 && chosen.length < count; i += 1) {
    const c = weightedChoice(rng, names, weights);
    if (!chosen.includes(c)) chosen.push(c);
  }
  return chosen;
}

function deriveMedications(rng: Rng, comorbidities: string[]): string[] {
  const meds: string[] = [];
  for (const c of comorbidities) {
    const candidates = catalog.medications[c] ?? [];
    if (candidates.length > 0) meds.push(pick(rng, candidates));
  }
  if (bernoulli(rng, 0.15)) meds.push(pick(rng, catalog.supplements));
  return Array.from(new Set(meds)).sort();
}

function randomDob(rng: Rng, referenceDate: Date): string {
  const age = Math.trunc(triangular(rng, 65, 90, 72));
  const dayOffset = randomInt(rng, 0, 364);
  const birthYear = referenceDate.getUTCFullYear() - age;
  const dob = new Date(Date.UTC(birthYear, 0, 1 + dayOffset));
  return dob.toISOString().slice(0, 10);
}

/**
 * Screening scores shifted by education, cognitive impairment and
 * depression.
 */
export function sampleCognitiveBaseline(
  rng: Rng,
  educationYears: number,
  hasMci: boolean,
  hasDepression: boolean
): CognitiveBaseline {
  let mmse = normal(rng, 27.5, 2.0);
  let moca = normal(rng, 24.5, 2.5);
  const depression = normal(rng, 5, 3);

  const eduFactor = (educationYears - 12) * 0.15;
  mmse += eduFactor;
  moca += eduFactor * 1.1;

  if (hasMci) {
    mmse -= uniform(rng, 1.0, 3.0);
    moca -= uniform(rng, 2.0, 4.0);
  }
  if (hasDepression) {
    moca -= uniform(rng, 0.5, 1.5);
  }

  return {
    mmse: Math.round(clamp(mmse, 10, 30)),
    moca: Math.round(clamp(moca, 5, 30)),
    depression_score: Math.round(clamp(depression, 0, 27)),
  };
}

const pad3 = (n: number) => String(n).padStart(3, "0");

/**
 * Generates `n` synthetic profiles for downstream simulators.
 *
 * `referenceDate` anchors ages; pass a fixed date for reproducible output.
 */
export function generateProfiles(
  n: number,
  rng: Rng,
  opts: { referenceDate?: Date } = {}
): PatientProfile[] {
  const referenceDate = opts.referenceDate ?? new Date();
  const profiles: PatientProfile[] = [];

  for (let i = 1; i <= n; i += 1) {
    const patientId = uuidFromRng(rng);
    const name = `${pick(rng, catalog.firstNames)} ${pick(
      rng,
      catalog.lastNames
    )}`;
    const sex = pick(rng, catalog.sexOptions);
    const educationYears = Math.trunc(clamp(normal(rng, 13, 3), 4, 22));
    const comorbidities = sampleComorbidities(rng);
    const medications = deriveMedications(rng, comorbidities);
    const dob = randomDob(rng, referenceDate);
    const cognitiveBaseline = sampleCognitiveBaseline(
      rng,
      educationYears,
      comorbidities.includes("mild_cognitive_impairment"),
      comorbidities.includes("depression")
    );

    profiles.push({
      patient_id: patientId,
      name,
      dob,
      sex,
      education_years: educationYears,
      comorbidities,
      medications,
      device_ids: { wearable: `WEAR-${pad3(i)}`, speech: `SPK-${pad3(i)}` },
      cognitive_baseline: cognitiveBaseline,
    });
  }

  return profiles;
}
