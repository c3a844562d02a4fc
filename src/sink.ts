/**
 * HTTP delivery of generated records, with retries, backoff and Retry-After
 * handling. Requires Node 18+ (global fetch).
 */
import { errorMessage } from "./errors";

/** First argument of the global `fetch`. */
export type FetchInput = Parameters<typeof fetch>[0];

export type FetchLike = (
  input: FetchInput,
  init?: RequestInit
) => Promise<Response>;

/** How the key is presented: `x-api-key` header or `Authorization: Bearer`. */
export type AuthScheme = "api-key" | "bearer";

export type JsonClientOptions = {
  baseUrl: string;
  apiKey?: string;
  auth?: AuthScheme;
  timeoutMs?: number;
  maxRetries?: number;
  minDelayMs?: number;
  fetchImpl?: FetchLike;
  sleepImpl?: (ms: number) => Promise<void>;
};

export type JsonResponse = { status: number; headers: Headers; body: unknown };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  const rand = Math.random() * 0.3 + 0.85; // 0.85..1.15
  return Math.round(ms * rand);
}

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Retry hint from a JSON error body, in seconds. */
function retryAfterFromBody(body: unknown): number {
  if (!body || typeof body !== "object") return NaN;
  for (const key of ["retry_after", "retryAfter", "retryAfterSeconds"]) {
    if (key in body) {
      const value: unknown = Reflect.get(body, key);
      const n = Number.parseInt(String(value ?? ""), 10);
      if (Number.isFinite(n)) return n;
    }
  }
  return NaN;
}

function describeBody(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body);
}

export class JsonClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly auth: AuthScheme;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly minDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleepImpl: (ms: number) => Promise<void>;

  constructor({
    baseUrl,
    apiKey = "",
    auth = "api-key",
    timeoutMs = 10000,
    maxRetries = 3,
    minDelayMs = 200,
    fetchImpl = fetch,
    sleepImpl = sleep,
  }: JsonClientOptions) {
    this.baseUrl = String(baseUrl || "").replace(/\/$/, "");
    this.apiKey = String(apiKey || "");
    this.auth = auth;
    this.timeoutMs = timeoutMs;
    this.maxRetries = maxRetries;
    this.minDelayMs = minDelayMs;
    this.fetchImpl = fetchImpl;
    this.sleepImpl = sleepImpl;
  }

  private authHeaders(): Record<string, string> {
    if (!this.apiKey) return {};
    return this.auth === "bearer"
      ? { authorization: `Bearer ${this.apiKey}` }
      : { "x-api-key": this.apiKey };
  }

  async requestJson(path: string, init: RequestInit = {}): Promise<JsonResponse> {
    const url = `${this.baseUrl}${path}`;

    let attempt = 0;
    let backoffMs = this.minDelayMs;

    while (true) {
      attempt += 1;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const res = await this.fetchImpl(url, {
          ...init,
          signal: controller.signal,
          headers: {
            ...(init.headers || {}),
            ...this.authHeaders(),
            accept: "application/json",
          },
        });

        const body = await readJsonResponse(res);

        if (res.ok) {
          clearTimeout(timer);
          return { status: res.status, headers: res.headers, body };
        }

        // 429 rate limiting
        if (res.status === 429) {
          const retryAfterHeader = res.headers.get("retry-after");
          const fromHeader = retryAfterHeader
            ? Number.parseInt(retryAfterHeader, 10)
            : NaN;
          const retryAfterSeconds = Number.isFinite(fromHeader)
            ? fromHeader
            : retryAfterFromBody(body);

          const waitMs = Number.isFinite(retryAfterSeconds)
            ? Math.max(retryAfterSeconds, 0) * 1000
            : backoffMs;

          if (attempt <= this.maxRetries) {
            clearTimeout(timer);
            await this.sleepImpl(jitter(Math.max(waitMs, backoffMs)));
            backoffMs = Math.min(backoffMs * 2, 8000);
            continue;
          }

          clearTimeout(timer);
          const extra = Number.isFinite(retryAfterSeconds)
            ? ` (suggested wait: ${retryAfterSeconds}s)`
            : "";
          throw new HttpError(
            429,
            `HTTP 429 Too Many Requests${extra}: ${describeBody(body)}`
          );
        }

        // transient server failures
        if (
          (res.status === 500 || res.status === 503) &&
          attempt <= this.maxRetries
        ) {
          clearTimeout(timer);
          await this.sleepImpl(jitter(backoffMs));
          backoffMs = Math.min(backoffMs * 2, 8000);
          continue;
        }

        clearTimeout(timer);
        throw new HttpError(
          res.status,
          `HTTP ${res.status} ${res.statusText}: ${describeBody(body)}`
        );
      } catch (err) {
        clearTimeout(timer);
        // Client errors are final; only network failures and exhausted
        // transient statuses fall through to here.
        if (err instanceof HttpError) throw err;
        if (attempt <= this.maxRetries) {
          await this.sleepImpl(jitter(backoffMs));
          backoffMs = Math.min(backoffMs * 2, 8000);
          continue;
        }
        throw err;
      }
    }
  }

  async postJson(path: string, payload: unknown): Promise<JsonResponse> {
    return this.requestJson(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
    });
  }
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/**
 * Downstream ingestion endpoint. One record per request.
 */
export class IngestionClient {
  private readonly http: JsonClient;
  private readonly log: (message: string) => void;

  constructor(
    opts: JsonClientOptions & { log?: (message: string) => void }
  ) {
    const { log = (m: string) => console.error(m), ...httpOpts } = opts;
    this.http = new JsonClient(httpOpts);
    this.log = log;
  }

  /**
   * Sends one record. Never throws: failures are logged and reported as
   * `false`.
   */
  async submitRecord(record: unknown): Promise<boolean> {
    try {
      await this.http.postJson("", record);
      return true;
    } catch (err) {
      this.log(`Failed to submit record: ${errorMessage(err)}`);
      return false;
    }
  }
}

/** Anything records can be handed to one at a time. */
export type RecordSink = Pick<IngestionClient, "submitRecord">;

export type PushSummary = { sent: number; failed: number; total: number };

/**
 * Submits records in order; a failed record does not stop the batch.
 */
export async function pushRecords(
  sink: RecordSink,
  records: readonly unknown[],
  opts: {
    delayMs?: number;
    sleepImpl?: (ms: number) => Promise<void>;
    onProgress?: (summary: PushSummary) => void;
  } = {}
): Promise<PushSummary> {
  const { delayMs = 0, sleepImpl = sleep, onProgress } = opts;
  const summary: PushSummary = { sent: 0, failed: 0, total: records.length };

  for (let i = 0; i < records.length; i += 1) {
    const ok = await sink.submitRecord(records[i]);
    if (ok) summary.sent += 1;
    else summary.failed += 1;
    onProgress?.({ ...summary });
    if (delayMs > 0 && i < records.length - 1) await sleepImpl(delayMs);
  }

  return summary;
}
