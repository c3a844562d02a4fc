import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  datasetFileName,
  parseProfilesConfig,
  parsePushConfig,
  parseSimulateConfig,
  profileSearchPaths,
  type Env,
  type SimulateConfig,
} from "./config";
import { DOMAIN_SPECS } from "./domains";
import { InvalidParametersError } from "./errors";
import { generateHistoricalSessions } from "./historical";
import { findProfilesFile, generateProfiles, loadProfiles } from "./profiles";
import { deriveSeed, randomSeed, seededRandom } from "./random";
import { resolveIdentities } from "./resolver";
import { IngestionClient, pushRecords, type RecordSink } from "./sink";
import { generateDataset } from "./simulators";
import type { CompositeRecord, PatientProfile } from "./types";

const USAGE = `Usage: cogsim <command> [options]

Commands:
  profiles   Generate synthetic patient profiles
  simulate   Generate a longitudinal session dataset (default)
  push       Send sparse historical sessions to the ingestion endpoint

Common options:
  --patients N  --days N  --start-date YYYY-MM-DD  --seed N
  --domain composite|mobility|executive_function|memory|language
  --output-dir DIR  --patient-profiles FILE  --use-all-profiles
  --allow-synthetic  --profiles-search  --strict-count
  --ingest-url URL  --ingest-key KEY  --records-per-patient N`;

function writeJson(path: string, data: unknown): void {
  writeFileSync(path, JSON.stringify(data, null, 2), "utf8");
}

/**
 * Profiles for `simulate`: explicit path > search > synthetic (only when
 * allowed). Load errors on an explicit path always abort.
 */
export function resolveProfileSource(
  config: SimulateConfig
): { profiles: PatientProfile[] | null; source: string | null } {
  if (config.profilesPath) {
    return {
      profiles: loadProfiles(config.profilesPath),
      source: config.profilesPath,
    };
  }

  if (config.profilesSearch || !config.allowSynthetic) {
    const candidates = profileSearchPaths(config.outputDir);
    const found = findProfilesFile(candidates);
    if (found) return { profiles: loadProfiles(found), source: found };
    if (!config.allowSynthetic) {
      throw new InvalidParametersError(
        `Could not locate patient_profiles.json in any of:\n  - ${candidates.join(
          "\n  - "
        )}\nProvide --patient-profiles or use --allow-synthetic to bypass.`
      );
    }
  }

  return { profiles: null, source: null };
}

function runProfiles(argv: string[], env: Env): void {
  const config = parseProfilesConfig(argv, env);
  const rng = seededRandom(config.seed ?? randomSeed());

  const profiles = generateProfiles(config.patients, rng);
  mkdirSync(config.outputDir, { recursive: true });
  const outPath = join(config.outputDir, "patient_profiles.json");
  writeJson(outPath, profiles);
  console.log(`Wrote ${profiles.length} patient profiles to ${outPath}`);
}

function runSimulate(argv: string[], env: Env): void {
  const config = parseSimulateConfig(argv, env);
  const { profiles, source } = resolveProfileSource(config);

  if (source) {
    console.log(`Loaded ${profiles?.length ?? 0} profiles from ${source}`);
  } else {
    console.warn(
      "Warning: proceeding with synthetic patient IDs (no profile correlation)."
    );
  }

  const result = generateDataset({
    domain: config.domain,
    patients: config.patients,
    days: config.days,
    startDate: config.startDate,
    seed: config.seed,
    profiles,
    useAllProfiles: config.useAllProfiles,
    strictCount: config.strictCount,
  });

  for (const w of result.warnings) console.warn(`Warning: ${w}`);

  mkdirSync(config.outputDir, { recursive: true });
  const outPath = join(config.outputDir, datasetFileName(config.domain));
  writeJson(outPath, result.records);

  console.log(`\nWrote ${outPath}`);
  console.log(`Patients: ${result.patientsUsed}`);
  console.log(`Records: ${result.actual} (expected ${result.expected})`);
}

/**
 * Sparse composite history for every profile, in profile order.
 */
export function buildHistoricalBatch(
  profiles: PatientProfile[],
  opts: { recordsPerPatient: number; seed: number; endDate: Date }
): { records: CompositeRecord[]; warnings: string[] } {
  const spec = DOMAIN_SPECS.composite;
  const { identities, warnings } = resolveIdentities({
    requested: profiles.length,
    profiles,
    role: spec.role,
    devicePrefix: spec.devicePrefix,
    useAllProfiles: true,
    rng: seededRandom(opts.seed),
  });

  const records: CompositeRecord[] = [];
  for (const identity of identities) {
    const rng = seededRandom(deriveSeed(opts.seed, identity.index));
    records.push(
      ...generateHistoricalSessions(identity, rng, {
        count: opts.recordsPerPatient,
        endDate: opts.endDate,
      })
    );
  }
  return { records, warnings };
}

async function runPush(
  argv: string[],
  env: Env,
  sink: RecordSink | null
): Promise<void> {
  const config = parsePushConfig(argv, env);
  const profiles = loadProfiles(config.profilesPath);
  console.log(`Loaded ${profiles.length} profiles from ${config.profilesPath}`);

  const { records, warnings } = buildHistoricalBatch(profiles, {
    recordsPerPatient: config.recordsPerPatient,
    seed: config.seed ?? randomSeed(),
    endDate: new Date(),
  });
  for (const w of warnings) console.warn(`Warning: ${w}`);

  const client =
    sink ??
    new IngestionClient({
      baseUrl: config.ingestUrl,
      apiKey: config.ingestKey ?? undefined,
    });

  console.log(
    `Pushing ${records.length} historical sessions to ${config.ingestUrl} ...`
  );
  const summary = await pushRecords(client, records, {
    delayMs: config.delayMs,
  });

  console.log(
    `Sent ${summary.sent}/${summary.total} records (${summary.failed} failed).`
  );
}

/**
 * CLI entrypoint. The first argument picks the command; `simulate` when
 * omitted.
 *
 * `sink` replaces the HTTP ingestion client for `push`.
 */
export async function runCli(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
  sink: RecordSink | null = null
): Promise<void> {
  const [first, ...rest] = argv;
  const command = first && !first.startsWith("--") ? first : "simulate";
  const args = command === first ? rest : argv;

  switch (command) {
    case "profiles":
      runProfiles(args, env);
      return;
    case "simulate":
      runSimulate(args, env);
      return;
    case "push":
      await runPush(args, env, sink);
      return;
    case "help":
      console.log(USAGE);
      return;
    default:
      throw new InvalidParametersError(
        `Unknown command: ${command}\n\n${USAGE}`
      );
  }
}

/**
 * Execute the CLI when this file is run directly.
 *
 * In tests, other modules can import and call `runCli()` instead.
 */
if (require.main === module) {
  runCli().catch((err) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
