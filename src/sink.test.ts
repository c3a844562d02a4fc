import { describe, expect, test } from "vitest";
import {
  HttpError,
  IngestionClient,
  JsonClient,
  pushRecords,
  type FetchInput,
  type RecordSink,
} from "./sink";

const noSleep = async () => {};

describe("JsonClient retry behavior", () => {
  test("retries on 429 then succeeds", async () => {
    let calls = 0;

    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      if (calls === 1) {
        return new Response(JSON.stringify({ error: "rate limited" }), {
          status: 429,
          headers: {
            "retry-after": "0",
          },
        });
      }

      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    };

    const sleepCalls: number[] = [];
    const sleepImpl = async (ms: number) => {
      sleepCalls.push(ms);
    };

    const client = new JsonClient({
      baseUrl: "https://ingest.example.test/records",
      apiKey: "test-secret",
      fetchImpl,
      sleepImpl,
      maxRetries: 2,
      minDelayMs: 1,
    });

    const res = await client.postJson("", { patient_id: "p-1" });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(calls).toBe(2);
    expect(sleepCalls).toHaveLength(1);
  });

  test("retries on 503 then succeeds", async () => {
    let calls = 0;

    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      if (calls < 3) {
        return new Response("temporary", { status: 503 });
      }
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    };

    const client = new JsonClient({
      baseUrl: "https://ingest.example.test",
      fetchImpl,
      sleepImpl: noSleep,
      maxRetries: 5,
      minDelayMs: 1,
    });

    const res = await client.requestJson("/anything");
    expect(res.status).toBe(200);
    expect(calls).toBe(3);
  });

  test("client errors are not retried", async () => {
    let calls = 0;
    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      return new Response(JSON.stringify({ error: "bad" }), {
        status: 400,
        statusText: "Bad Request",
      });
    };

    const client = new JsonClient({
      baseUrl: "https://ingest.example.test",
      fetchImpl,
      sleepImpl: noSleep,
      maxRetries: 3,
    });

    await expect(client.requestJson("/x")).rejects.toThrow(
      'HTTP 400 Bad Request: {"error":"bad"}'
    );
    expect(calls).toBe(1);
  });

  test("network failures are retried until the budget runs out", async () => {
    let calls = 0;
    const fetchImpl = async (): Promise<Response> => {
      calls += 1;
      throw new TypeError("fetch failed");
    };

    const client = new JsonClient({
      baseUrl: "https://ingest.example.test",
      fetchImpl,
      sleepImpl: noSleep,
      maxRetries: 1,
    });

    await expect(client.requestJson("/x")).rejects.toThrow("fetch failed");
    expect(calls).toBe(2);
  });

  test("exhausted 429 reports the suggested wait", async () => {
    const fetchImpl = async (): Promise<Response> =>
      new Response(JSON.stringify({ retry_after: 7 }), { status: 429 });

    const client = new JsonClient({
      baseUrl: "https://ingest.example.test",
      fetchImpl,
      sleepImpl: noSleep,
      maxRetries: 0,
    });

    const err = await client.requestJson("/x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    if (!(err instanceof HttpError)) return;
    expect(err.status).toBe(429);
    expect(err.message).toBe(
      'HTTP 429 Too Many Requests (suggested wait: 7s): {"retry_after":7}'
    );
  });

  test("presents the key as a bearer token when asked", async () => {
    const seen: Headers[] = [];
    const fetchImpl = async (
      _input: FetchInput,
      init?: RequestInit
    ): Promise<Response> => {
      seen.push(new Headers(init?.headers));
      return new Response("{}", { status: 200 });
    };

    const client = new JsonClient({
      baseUrl: "https://model.example.test/",
      apiKey: "test-secret",
      auth: "bearer",
      fetchImpl,
    });
    await client.postJson("/predict", {});

    expect(seen[0].get("authorization")).toBe("Bearer test-secret");
    expect(seen[0].get("x-api-key")).toBeNull();
    expect(seen[0].get("content-type")).toBe("application/json");
  });
});

describe("IngestionClient", () => {
  test("posts the record with the api key header", async () => {
    const requests: { url: string; key: string | null; body: unknown }[] = [];
    const fetchImpl = async (
      input: FetchInput,
      init?: RequestInit
    ): Promise<Response> => {
      requests.push({
        url: String(input),
        key: new Headers(init?.headers).get("x-api-key"),
        body: JSON.parse(String(init?.body)),
      });
      return new Response(JSON.stringify({ status: "success" }), {
        status: 200,
      });
    };

    const client = new IngestionClient({
      baseUrl: "https://ingest.example.test/api/ingest",
      apiKey: "test-secret",
      fetchImpl,
    });

    expect(await client.submitRecord({ patient_id: "p-1" })).toBe(true);
    expect(requests).toEqual([
      {
        url: "https://ingest.example.test/api/ingest",
        key: "test-secret",
        body: { patient_id: "p-1" },
      },
    ]);
  });

  test("reports failure without throwing", async () => {
    const logged: string[] = [];
    const client = new IngestionClient({
      baseUrl: "https://ingest.example.test",
      fetchImpl: async () =>
        new Response("nope", { status: 401, statusText: "Unauthorized" }),
      sleepImpl: noSleep,
      log: (m) => logged.push(m),
    });

    expect(await client.submitRecord({ patient_id: "p-1" })).toBe(false);
    expect(logged).toEqual([
      "Failed to submit record: HTTP 401 Unauthorized: nope",
    ]);
  });
});

describe("pushRecords", () => {
  test("counts successes and failures and keeps going", async () => {
    const seen: unknown[] = [];
    const sink: RecordSink = {
      submitRecord: async (record) => {
        seen.push(record);
        return record !== "bad";
      },
    };
    const sleeps: number[] = [];
    const progress: number[] = [];

    const summary = await pushRecords(sink, ["a", "bad", "c"], {
      delayMs: 25,
      sleepImpl: async (ms) => {
        sleeps.push(ms);
      },
      onProgress: (s) => progress.push(s.sent + s.failed),
    });

    expect(summary).toEqual({ sent: 2, failed: 1, total: 3 });
    expect(seen).toEqual(["a", "bad", "c"]);
    expect(sleeps).toEqual([25, 25]);
    expect(progress).toEqual([1, 2, 3]);
  });

  test("an empty batch sends nothing", async () => {
    const sink: RecordSink = { submitRecord: async () => true };
    expect(await pushRecords(sink, [])).toEqual({
      sent: 0,
      failed: 0,
      total: 0,
    });
  });
});
