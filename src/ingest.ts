import { z } from "zod";
import { roundTo } from "./bounds";
import {
  errorMessage,
  InvalidParametersError,
  RecordConflictError,
} from "./errors";
import { uniform, uuidFromRng, type Rng } from "./random";
import { JsonClient, type JsonClientOptions } from "./sink";

/**
 * Scores one incoming record. Expected to answer `{ predictions: [number] }`.
 */
export interface CognitiveIndexModel {
  predict(record: Record<string, unknown>): Promise<unknown>;
}

/** Model served over HTTP with a bearer key. */
export class HttpCognitiveIndexModel implements CognitiveIndexModel {
  private readonly http: JsonClient;

  constructor(opts: Omit<JsonClientOptions, "auth">) {
    this.http = new JsonClient({ maxRetries: 0, ...opts, auth: "bearer" });
  }

  async predict(record: Record<string, unknown>): Promise<unknown> {
    const { body } = await this.http.postJson("", record);
    return body;
  }
}

export type StoredRecord = Record<string, unknown> & {
  id: string;
  patient_id: string;
  timestamp: string;
  cognitive_index: number;
};

export interface RecordStore {
  /** Rejects with `RecordConflictError` when `doc.id` is taken. */
  create(doc: StoredRecord): Promise<StoredRecord>;
  get(id: string): Promise<StoredRecord | null>;
}

export class InMemoryRecordStore implements RecordStore {
  private readonly docs = new Map<string, StoredRecord>();

  async create(doc: StoredRecord): Promise<StoredRecord> {
    if (this.docs.has(doc.id)) throw new RecordConflictError(doc.id);
    const copy = { ...doc };
    this.docs.set(doc.id, copy);
    return copy;
  }

  async get(id: string): Promise<StoredRecord | null> {
    return this.docs.get(id) ?? null;
  }

  get size(): number {
    return this.docs.size;
  }
}

const incomingSchema = z
  .object({ patient_id: z.string().trim().min(1) })
  .passthrough();

const predictionSchema = z.object({
  predictions: z.array(z.number()).nonempty(),
});

/**
 * First prediction from a model answer, or `null` for any other shape.
 * Tolerates a JSON document encoded as a string.
 */
export function extractPrediction(response: unknown): number | null {
  let value = response;
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch {
      return null;
    }
  }
  const parsed = predictionSchema.safeParse(value);
  return parsed.success ? parsed.data.predictions[0] : null;
}

export type IngestDeps = {
  store: RecordStore;
  /** `null` when no model is configured; every record then uses the fallback. */
  model: CognitiveIndexModel | null;
  rng: Rng;
  now?: () => Date;
  log?: (message: string) => void;
};

export type IngestResult = {
  status: "success";
  message: string;
  document_id: string;
  patient_id: string;
  cognitive_index: number;
  timestamp: string;
  ml_model_status: "success" | "fallback_used";
  ml_model_response?: unknown;
};

/**
 * Enriches a session record with a document id, ingestion time and a
 * cognitive index, then stores it.
 *
 * The model is best-effort: when it is missing, fails, or answers in an
 * unexpected shape the index is drawn from U(0.1, 1.0). Any answer the model
 * gave is echoed back as `ml_model_response`.
 */
export async function ingestRecord(
  body: unknown,
  deps: IngestDeps
): Promise<IngestResult> {
  const { store, model, rng } = deps;
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? ((m: string) => console.warn(m));

  // A batch body is accepted; only its first record is ingested.
  const candidate = Array.isArray(body) ? body[0] : body;
  const parsed = incomingSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new InvalidParametersError(
      "Request body must be a record object with a patient_id"
    );
  }
  const record = parsed.data;

  let prediction: number | null = null;
  let modelResponse: unknown = undefined;
  if (model) {
    try {
      modelResponse = await model.predict(record);
      prediction = extractPrediction(modelResponse);
      if (prediction === null) {
        log(`Unexpected model response: ${JSON.stringify(modelResponse)}`);
      }
    } catch (err) {
      log(`Model request failed: ${errorMessage(err)}`);
    }
  }

  const fallbackUsed = prediction === null;
  const cognitiveIndex = roundTo(prediction ?? uniform(rng, 0.1, 1.0), 4);

  const doc: StoredRecord = {
    ...record,
    timestamp: now().toISOString(),
    id: uuidFromRng(rng),
    cognitive_index: cognitiveIndex,
  };
  await store.create(doc);

  const result: IngestResult = {
    status: "success",
    message: "Cognitive health data processed and stored successfully",
    document_id: doc.id,
    patient_id: doc.patient_id,
    cognitive_index: cognitiveIndex,
    timestamp: doc.timestamp,
    ml_model_status: fallbackUsed ? "fallback_used" : "success",
  };
  if (modelResponse !== undefined) result.ml_model_response = modelResponse;
  return result;
}
