import { join } from "node:path";
import { z } from "zod";
import { parseStartDate } from "./assembler";
import { DOMAINS, isDomain } from "./domains";
import { InvalidParametersError } from "./errors";
import { MAX_SEED } from "./random";
import type { Domain } from "./types";

export type Env = Record<string, string | undefined>;

export const DEFAULTS = {
  patients: 1000,
  days: 30,
  startDate: "2025-09-01",
  domain: "composite",
  outputDir: "data",
  profilesFile: "patient_profiles.json",
  recordsPerPatient: 5,
  port: 3000,
} as const;

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--days 20`
 * - `--days=20`
 *
 * Returns `null` if the flag is not present or has no value.
 */
export function getArgValue(argv: string[], flag: string): string | null {
  const idx = argv.findIndex((a) => a === flag || a.startsWith(`${flag}=`));
  if (idx === -1) return null;
  const a = argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * Checks whether argv includes a boolean flag (`--strict-count` or
 * `--strict-count=...`).
 */
export function hasFlag(argv: string[], flag: string): boolean {
  return argv.some((a) => a === flag || a.startsWith(`${flag}=`));
}

/** `1`, `true` and `yes` (any case) count as set. */
export function envFlag(env: Env, name: string): boolean {
  const v = env[name];
  if (!v) return false;
  const lower = v.toLowerCase();
  return lower === "1" || lower === "true" || lower === "yes";
}

/** Flag value first, then the environment variable. */
function setting(
  argv: string[],
  env: Env,
  flag: string,
  envName: string
): string | undefined {
  const fromArg = getArgValue(argv, flag);
  if (fromArg !== null) return fromArg;
  const fromEnv = env[envName];
  return fromEnv && fromEnv.trim() ? fromEnv.trim() : undefined;
}

function toggle(argv: string[], env: Env, flag: string, envName: string) {
  return hasFlag(argv, flag) || envFlag(env, envName);
}

export const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be > 0`);

export const dateString = (name: string) =>
  z.string().transform((value, ctx) => {
    const date = parseStartDate(value);
    if (!date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be a valid YYYY-MM-DD date (got "${value}")`,
      });
      return z.NEVER;
    }
    return date;
  });

export const domainSchema = z.string().transform((value, ctx): Domain => {
  if (!isDomain(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `domain must be one of ${DOMAINS.join(", ")} (got "${value}")`,
    });
    return z.NEVER;
  }
  return value;
});

const SEED_RANGE = `seed must be between 0 and ${MAX_SEED}`;

export const seedSchema = z.coerce
  .number({ invalid_type_error: "seed must be a number" })
  .int("seed must be an integer")
  .min(0, SEED_RANGE)
  .max(MAX_SEED, SEED_RANGE);

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParametersError(
      parsed.error.issues.map((i) => i.message).join("; ")
    );
  }
  return parsed.data;
}

const simulateSchema = z.object({
  domain: domainSchema.default(DEFAULTS.domain),
  patients: positiveInt("patients").default(DEFAULTS.patients),
  days: positiveInt("days").default(DEFAULTS.days),
  startDate: dateString("start date").default(DEFAULTS.startDate),
  seed: seedSchema.optional(),
  outputDir: z.string().min(1).default(DEFAULTS.outputDir),
  profilesPath: z.string().min(1).optional(),
  useAllProfiles: z.boolean(),
  allowSynthetic: z.boolean(),
  profilesSearch: z.boolean(),
  strictCount: z.boolean(),
});

export type SimulateConfig = {
  domain: Domain;
  patients: number;
  days: number;
  startDate: Date;
  seed: number | null;
  outputDir: string;
  profilesPath: string | null;
  useAllProfiles: boolean;
  allowSynthetic: boolean;
  profilesSearch: boolean;
  strictCount: boolean;
};

export function parseSimulateConfig(argv: string[], env: Env): SimulateConfig {
  const c = parseOrThrow(simulateSchema, {
    domain: setting(argv, env, "--domain", "COGSIM_DOMAIN"),
    patients: setting(argv, env, "--patients", "COGSIM_PATIENTS"),
    days: setting(argv, env, "--days", "COGSIM_DAYS"),
    startDate: setting(argv, env, "--start-date", "COGSIM_START_DATE"),
    seed: setting(argv, env, "--seed", "COGSIM_SEED"),
    outputDir: setting(argv, env, "--output-dir", "COGSIM_OUTPUT_DIR"),
    profilesPath: setting(
      argv,
      env,
      "--patient-profiles",
      "COGSIM_PATIENT_PROFILES"
    ),
    useAllProfiles: toggle(
      argv,
      env,
      "--use-all-profiles",
      "COGSIM_USE_ALL_PROFILES"
    ),
    allowSynthetic: toggle(
      argv,
      env,
      "--allow-synthetic",
      "COGSIM_ALLOW_SYNTHETIC"
    ),
    profilesSearch: hasFlag(argv, "--profiles-search"),
    strictCount: toggle(argv, env, "--strict-count", "COGSIM_STRICT_COUNT"),
  });
  return { ...c, seed: c.seed ?? null, profilesPath: c.profilesPath ?? null };
}

/** Where `simulate` looks for profiles when no path is given. */
export function profileSearchPaths(outputDir: string): string[] {
  const candidates = [
    join(outputDir, DEFAULTS.profilesFile),
    join(DEFAULTS.outputDir, DEFAULTS.profilesFile),
    DEFAULTS.profilesFile,
  ];
  return Array.from(new Set(candidates));
}

export function datasetFileName(domain: Domain): string {
  return domain === "composite"
    ? "multidomain_cognitive_dataset.json"
    : `${domain}_dataset.json`;
}

const profilesSchema = z.object({
  patients: positiveInt("patients").default(DEFAULTS.patients),
  seed: seedSchema.optional(),
  outputDir: z.string().min(1).default(DEFAULTS.outputDir),
});

export type ProfilesConfig = {
  patients: number;
  seed: number | null;
  outputDir: string;
};

export function parseProfilesConfig(argv: string[], env: Env): ProfilesConfig {
  const c = parseOrThrow(profilesSchema, {
    patients: setting(argv, env, "--patients", "COGSIM_PATIENTS"),
    seed: setting(argv, env, "--seed", "COGSIM_SEED"),
    outputDir: setting(argv, env, "--output-dir", "COGSIM_OUTPUT_DIR"),
  });
  return { ...c, seed: c.seed ?? null };
}

const pushSchema = z.object({
  profilesPath: z.string().min(1),
  recordsPerPatient: positiveInt("records per patient").default(
    DEFAULTS.recordsPerPatient
  ),
  seed: seedSchema.optional(),
  ingestUrl: z
    .string({ required_error: "ingest URL is required (COGSIM_INGEST_URL)" })
    .url("ingest URL must be a valid URL"),
  ingestKey: z.string().optional(),
  delayMs: z.coerce.number().int().nonnegative().default(50),
});

export type PushConfig = {
  profilesPath: string;
  recordsPerPatient: number;
  seed: number | null;
  ingestUrl: string;
  ingestKey: string | null;
  delayMs: number;
};

export function parsePushConfig(argv: string[], env: Env): PushConfig {
  const outputDir =
    setting(argv, env, "--output-dir", "COGSIM_OUTPUT_DIR") ??
    DEFAULTS.outputDir;
  const c = parseOrThrow(pushSchema, {
    profilesPath:
      setting(argv, env, "--patient-profiles", "COGSIM_PATIENT_PROFILES") ??
      join(outputDir, DEFAULTS.profilesFile),
    recordsPerPatient: getArgValue(argv, "--records-per-patient") ?? undefined,
    seed: setting(argv, env, "--seed", "COGSIM_SEED"),
    ingestUrl: setting(argv, env, "--ingest-url", "COGSIM_INGEST_URL"),
    ingestKey: setting(argv, env, "--ingest-key", "COGSIM_INGEST_KEY"),
    delayMs: getArgValue(argv, "--delay-ms") ?? undefined,
  });
  return { ...c, seed: c.seed ?? null, ingestKey: c.ingestKey ?? null };
}

export type ServerConfig = {
  port: number;
  ingestUrl: string | null;
  ingestKey: string | null;
  modelUrl: string | null;
  modelKey: string | null;
  profilesPath: string | null;
  /** Live tick period; `null` disables the timer. */
  liveIntervalMs: number | null;
};

const serverSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULTS.port),
  ingestUrl: z.string().url().optional(),
  ingestKey: z.string().optional(),
  modelUrl: z.string().url().optional(),
  modelKey: z.string().optional(),
  profilesPath: z.string().min(1).optional(),
  liveIntervalMs: positiveInt("live interval").optional(),
});

export function parseServerConfig(env: Env): ServerConfig {
  const c = parseOrThrow(serverSchema, {
    port: env.PORT || undefined,
    ingestUrl: env.COGSIM_INGEST_URL || undefined,
    ingestKey: env.COGSIM_INGEST_KEY || undefined,
    modelUrl: env.COGSIM_MODEL_URL || undefined,
    modelKey: env.COGSIM_MODEL_KEY || undefined,
    profilesPath: env.COGSIM_PATIENT_PROFILES || undefined,
    liveIntervalMs: env.COGSIM_LIVE_INTERVAL_MS || undefined,
  });
  return {
    port: c.port,
    ingestUrl: c.ingestUrl ?? null,
    ingestKey: c.ingestKey ?? null,
    modelUrl: c.modelUrl ?? null,
    modelKey: c.modelKey ?? null,
    profilesPath: c.profilesPath ?? null,
    liveIntervalMs: c.liveIntervalMs ?? null,
  };
}
