import express from "express";
import { z } from "zod";
import {
  DEFAULTS,
  dateString,
  domainSchema,
  parseServerConfig,
  positiveInt,
  seedSchema,
} from "./config";
import {
  errorMessage,
  InvalidParametersError,
  ProfileLoadError,
  RecordConflictError,
  RecordCountMismatchError,
} from "./errors";
import {
  HttpCognitiveIndexModel,
  InMemoryRecordStore,
  ingestRecord,
  type CognitiveIndexModel,
  type RecordStore,
} from "./ingest";
import { generateProfiles, loadProfiles, parseProfiles } from "./profiles";
import { randomSeed, seededRandom, type Rng } from "./random";
import { IngestionClient, type RecordSink } from "./sink";
import { generateDataset, simulateLiveSession } from "./simulators";
import type { CompositeRecord, PatientProfile } from "./types";

export type AppDeps = {
  store: RecordStore;
  model: CognitiveIndexModel | null;
  /** Downstream target for live sessions; `null` keeps them local. */
  sink: RecordSink | null;
  profiles: PatientProfile[] | null;
  rng: Rng;
  now?: () => Date;
};

const generateBodySchema = z.object({
  domain: domainSchema.default(DEFAULTS.domain),
  patients: positiveInt("patients"),
  days: positiveInt("days"),
  startDate: dateString("startDate").default(DEFAULTS.startDate),
  seed: seedSchema.nullable().default(null),
  profiles: z.unknown().optional(),
  useAllProfiles: z.boolean().default(false),
  strictCount: z.boolean().default(false),
});

/**
 * HTTP status for an error thrown while handling a request.
 */
export function statusFor(err: unknown): number {
  if (err instanceof InvalidParametersError) return 400;
  if (err instanceof ProfileLoadError) return 400;
  if (err instanceof RecordConflictError) return 409;
  if (err instanceof RecordCountMismatchError) return 422;
  return 500;
}

/**
 * One live composite session, forwarded to the sink when there is one.
 * Sink failures are logged by the sink and never fail the tick.
 */
export async function liveTick(deps: AppDeps): Promise<{
  record: CompositeRecord;
  forwarded: boolean | null;
  warnings: string[];
}> {
  const now = deps.now ?? (() => new Date());
  const at = now();
  const profiles =
    deps.profiles && deps.profiles.length > 0
      ? deps.profiles
      : generateProfiles(1, deps.rng, { referenceDate: at });
  const { record, warnings } = simulateLiveSession(profiles, deps.rng, at);
  const forwarded = deps.sink ? await deps.sink.submitRecord(record) : null;
  return { record, forwarded, warnings };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  // POST /generate -> records for the requested run
  app.post("/generate", (req, res) => {
    const parsed = generateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        error: parsed.error.issues.map((i) => i.message).join("; "),
      });
    }
    const body = parsed.data;

    try {
      const profiles =
        body.profiles === undefined || body.profiles === null
          ? null
          : parseProfiles(body.profiles);
      const result = generateDataset({
        domain: body.domain,
        patients: body.patients,
        days: body.days,
        startDate: body.startDate,
        seed: body.seed,
        profiles,
        useAllProfiles: body.useAllProfiles,
        strictCount: body.strictCount,
      });
      return res.json({
        records: result.records,
        warnings: result.warnings,
        expected: result.expected,
        actual: result.actual,
      });
    } catch (err) {
      return res.status(statusFor(err)).json({ error: errorMessage(err) });
    }
  });

  // POST /ingest -> enrich with cognitive index and store
  app.post("/ingest", async (req, res) => {
    try {
      const result = await ingestRecord(req.body, {
        store: deps.store,
        model: deps.model,
        rng: deps.rng,
        now: deps.now,
      });
      return res.json(result);
    } catch (err) {
      const status = statusFor(err);
      if (status === 500) console.error("Ingestion failed:", err);
      return res.status(status).json({ error: errorMessage(err) });
    }
  });

  // POST /simulate -> one live session "now"
  app.post("/simulate", async (_req, res) => {
    try {
      const { record, forwarded, warnings } = await liveTick(deps);
      for (const w of warnings) console.warn(`Warning: ${w}`);
      if (forwarded === false) {
        console.warn(
          `Warning: live session for ${record.patient_id} not forwarded`
        );
      }
      return res.json(record);
    } catch (err) {
      return res.status(statusFor(err)).json({ error: errorMessage(err) });
    }
  });

  return app;
}

async function main(): Promise<void> {
  const config = parseServerConfig(process.env);
  const profiles = config.profilesPath
    ? loadProfiles(config.profilesPath)
    : null;

  const deps: AppDeps = {
    store: new InMemoryRecordStore(),
    model: config.modelUrl
      ? new HttpCognitiveIndexModel({
          baseUrl: config.modelUrl,
          apiKey: config.modelKey ?? undefined,
        })
      : null,
    sink: config.ingestUrl
      ? new IngestionClient({
          baseUrl: config.ingestUrl,
          apiKey: config.ingestKey ?? undefined,
        })
      : null,
    profiles,
    rng: seededRandom(randomSeed()),
  };

  const app = createApp(deps);
  app.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (profiles=${
        profiles?.length ?? 0
      }, model=${deps.model ? "on" : "off"}, sink=${deps.sink ? "on" : "off"})`
    );
  });

  if (config.liveIntervalMs !== null) {
    setInterval(() => {
      liveTick(deps)
        .then(({ record, forwarded }) => {
          console.log(
            `Live session for ${record.patient_id} at ${record.session_date} (forwarded=${forwarded})`
          );
        })
        .catch((err) => {
          console.error("Live tick failed:", errorMessage(err));
        });
    }, config.liveIntervalMs);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Fatal server error:", err);
    process.exit(1);
  });
}
