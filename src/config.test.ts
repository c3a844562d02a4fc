import { describe, expect, test } from "vitest";
import {
  datasetFileName,
  envFlag,
  getArgValue,
  hasFlag,
  parseProfilesConfig,
  parsePushConfig,
  parseServerConfig,
  parseSimulateConfig,
  profileSearchPaths,
} from "./config";
import { InvalidParametersError } from "./errors";

describe("argv helpers", () => {
  test("getArgValue reads both flag styles", () => {
    expect(getArgValue(["--days", "20"], "--days")).toBe("20");
    expect(getArgValue(["--days=20"], "--days")).toBe("20");
    expect(getArgValue(["--url=https://x.test/?a=b"], "--url")).toBe(
      "https://x.test/?a=b"
    );
    expect(getArgValue(["--days", "--seed", "1"], "--days")).toBeNull();
    expect(getArgValue([], "--days")).toBeNull();
  });

  test("hasFlag and envFlag", () => {
    expect(hasFlag(["--strict-count"], "--strict-count")).toBe(true);
    expect(hasFlag(["--strict"], "--strict-count")).toBe(false);
    expect(envFlag({ X: "TRUE" }, "X")).toBe(true);
    expect(envFlag({ X: "yes" }, "X")).toBe(true);
    expect(envFlag({ X: "0" }, "X")).toBe(false);
    expect(envFlag({}, "X")).toBe(false);
  });
});

describe("parseSimulateConfig", () => {
  test("defaults", () => {
    expect(parseSimulateConfig([], {})).toEqual({
      domain: "composite",
      patients: 1000,
      days: 30,
      startDate: new Date(Date.UTC(2025, 8, 1)),
      seed: null,
      outputDir: "data",
      profilesPath: null,
      useAllProfiles: false,
      allowSynthetic: false,
      profilesSearch: false,
      strictCount: false,
    });
  });

  test("flags win over the environment", () => {
    const c = parseSimulateConfig(["--patients", "5", "--days=3"], {
      COGSIM_PATIENTS: "9",
      COGSIM_SEED: "42",
      COGSIM_ALLOW_SYNTHETIC: "yes",
      COGSIM_DOMAIN: "memory",
    });
    expect(c.patients).toBe(5);
    expect(c.days).toBe(3);
    expect(c.seed).toBe(42);
    expect(c.allowSynthetic).toBe(true);
    expect(c.domain).toBe("memory");
  });

  test("collects every problem into one error", () => {
    expect(() =>
      parseSimulateConfig(["--patients", "0", "--days", "x"], {})
    ).toThrow("patients must be > 0; days must be a number");
    expect(() => parseSimulateConfig(["--days", "2.5"], {})).toThrow(
      "days must be an integer"
    );
  });

  test("rejects impossible dates and unknown domains", () => {
    expect(() =>
      parseSimulateConfig(["--start-date", "2025-02-30"], {})
    ).toThrow('start date must be a valid YYYY-MM-DD date (got "2025-02-30")');
    expect(() => parseSimulateConfig(["--domain", "vision"], {})).toThrow(
      'domain must be one of composite, mobility, executive_function, memory, language (got "vision")'
    );
    expect(() => parseSimulateConfig(["--seed", "1.5"], {})).toThrow(
      InvalidParametersError
    );
  });

  test("seeds must fit in 32 bits", () => {
    expect(parseSimulateConfig(["--seed", "4294967295"], {}).seed).toBe(
      4294967295
    );
    expect(() => parseSimulateConfig(["--seed", "4294967296"], {})).toThrow(
      "seed must be between 0 and 4294967295"
    );
    expect(() => parseSimulateConfig(["--seed=-1"], {})).toThrow(
      "seed must be between 0 and 4294967295"
    );
    expect(() => parseProfilesConfig(["--seed", "1e300"], {})).toThrow(
      "seed must be between 0 and 4294967295"
    );
  });
});

describe("file names", () => {
  test("profile search paths are deduplicated", () => {
    expect(profileSearchPaths("data")).toEqual([
      "data/patient_profiles.json",
      "patient_profiles.json",
    ]);
    expect(profileSearchPaths("out")).toEqual([
      "out/patient_profiles.json",
      "data/patient_profiles.json",
      "patient_profiles.json",
    ]);
  });

  test("dataset file per domain", () => {
    expect(datasetFileName("composite")).toBe(
      "multidomain_cognitive_dataset.json"
    );
    expect(datasetFileName("mobility")).toBe("mobility_dataset.json");
  });
});

test("parseProfilesConfig", () => {
  expect(
    parseProfilesConfig(["--patients", "12", "--output-dir", "out"], {})
  ).toEqual({ patients: 12, seed: null, outputDir: "out" });
});

describe("parsePushConfig", () => {
  test("requires an ingest URL", () => {
    expect(() => parsePushConfig([], {})).toThrow(
      "ingest URL is required (COGSIM_INGEST_URL)"
    );
  });

  test("defaults the profiles path from the output dir", () => {
    expect(
      parsePushConfig(["--output-dir", "out", "--records-per-patient", "3"], {
        COGSIM_INGEST_URL: "https://ingest.example.test/api/ingest",
        COGSIM_INGEST_KEY: "test-secret",
      })
    ).toEqual({
      profilesPath: "out/patient_profiles.json",
      recordsPerPatient: 3,
      seed: null,
      ingestUrl: "https://ingest.example.test/api/ingest",
      ingestKey: "test-secret",
      delayMs: 50,
    });
  });
});

describe("parseServerConfig", () => {
  test("everything optional but the port", () => {
    expect(parseServerConfig({})).toEqual({
      port: 3000,
      ingestUrl: null,
      ingestKey: null,
      modelUrl: null,
      modelKey: null,
      profilesPath: null,
      liveIntervalMs: null,
    });
  });

  test("reads the environment", () => {
    const c = parseServerConfig({
      PORT: "8080",
      COGSIM_MODEL_URL: "https://model.example.test/predict",
      COGSIM_LIVE_INTERVAL_MS: "5000",
    });
    expect(c.port).toBe(8080);
    expect(c.modelUrl).toBe("https://model.example.test/predict");
    expect(c.liveIntervalMs).toBe(5000);
  });

  test("rejects a bad port", () => {
    expect(() => parseServerConfig({ PORT: "70000" })).toThrow(
      InvalidParametersError
    );
  });
});
