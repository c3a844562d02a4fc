import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ProfileLoadError } from "./errors";
import {
  findDuplicatePatientIds,
  findProfilesFile,
  generateProfiles,
  loadProfiles,
  parseProfiles,
  sampleCognitiveBaseline,
} from "./profiles";
import { seededRandom } from "./random";

const referenceDate = new Date(Date.UTC(2025, 8, 1));

describe("generateProfiles", () => {
  test("is reproducible for a seed and reference date", () => {
    const a = generateProfiles(5, seededRandom(11), { referenceDate });
    const b = generateProfiles(5, seededRandom(11), { referenceDate });
    expect(a).toEqual(b);
  });

  test("fields stay within their ranges", () => {
    const profiles = generateProfiles(200, seededRandom(3), { referenceDate });
    expect(profiles).toHaveLength(200);
    expect(new Set(profiles.map((p) => p.patient_id)).size).toBe(200);
    expect(profiles[0].device_ids).toEqual({
      wearable: "WEAR-001",
      speech: "SPK-001",
    });
    expect(profiles[41].device_ids?.speech).toBe("SPK-042");

    for (const p of profiles) {
      expect(p.name).toMatch(/^\S+ \S+$/);
      expect(p.education_years).toBeGreaterThanOrEqual(4);
      expect(p.education_years).toBeLessThanOrEqual(22);

      const year = Number(p.dob?.slice(0, 4));
      expect(year).toBeGreaterThanOrEqual(1935);
      expect(year).toBeLessThanOrEqual(1960);

      const comorbidities = p.comorbidities ?? [];
      expect(comorbidities.length).toBeLessThanOrEqual(5);
      expect(new Set(comorbidities).size).toBe(comorbidities.length);

      const meds = p.medications ?? [];
      expect(meds).toEqual([...new Set(meds)].sort());

      const cb = p.cognitive_baseline;
      expect(cb?.mmse).toBeGreaterThanOrEqual(10);
      expect(cb?.mmse).toBeLessThanOrEqual(30);
      expect(cb?.moca).toBeGreaterThanOrEqual(5);
      expect(cb?.moca).toBeLessThanOrEqual(30);
      expect(cb?.depression_score).toBeGreaterThanOrEqual(0);
      expect(cb?.depression_score).toBeLessThanOrEqual(27);
    }
  });

  test("generated profiles pass validation", () => {
    const profiles = generateProfiles(20, seededRandom(8), { referenceDate });
    expect(parseProfiles(JSON.parse(JSON.stringify(profiles)))).toEqual(
      profiles
    );
  });
});

test("impairment lowers screening scores for the same draws", () => {
  for (let seed = 1; seed <= 30; seed += 1) {
    const healthy = sampleCognitiveBaseline(seededRandom(seed), 12, false, false);
    const mci = sampleCognitiveBaseline(seededRandom(seed), 12, true, false);
    expect(mci.mmse).toBeLessThanOrEqual(healthy.mmse);
    expect(mci.moca).toBeLessThanOrEqual(healthy.moca);
    expect(mci.depression_score).toBe(healthy.depression_score);
  }
});

describe("parseProfiles", () => {
  test("rejects anything but an array", () => {
    expect(() => parseProfiles({ patient_id: "a" })).toThrow(
      "Patient profiles JSON must be a list (array) of objects."
    );
  });

  test("null fields become absent and ids are trimmed", () => {
    expect(
      parseProfiles([{ patient_id: " a ", name: null, device_ids: null }])
    ).toEqual([{ patient_id: "a" }]);
  });

  test("reports the failing entry and field", () => {
    expect(() =>
      parseProfiles([
        { patient_id: "a" },
        { patient_id: "b", cognitive_baseline: { mmse: 31 } },
      ])
    ).toThrow(
      "Invalid patient profiles: [1] cognitive_baseline.mmse: Number must be less than or equal to 30"
    );
  });

  test("rejects duplicate ids", () => {
    expect(() =>
      parseProfiles([
        { patient_id: "b" },
        { patient_id: "a" },
        { patient_id: "b" },
        { patient_id: "a" },
      ])
    ).toThrow("Duplicate patient_id values: a, b");
  });

  test("findDuplicatePatientIds skips missing ids", () => {
    expect(findDuplicatePatientIds([{}, {}, { patient_id: "x" }])).toEqual([]);
  });
});

describe("loading from disk", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cogsim-profiles-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("loads a valid file", () => {
    const path = join(dir, "patient_profiles.json");
    writeFileSync(path, JSON.stringify([{ patient_id: "p-1" }]));
    expect(loadProfiles(path)).toEqual([{ patient_id: "p-1" }]);
  });

  test("a missing file names the path", () => {
    const path = join(dir, "missing.json");
    expect(() => loadProfiles(path)).toThrow(
      `Patient profiles file does not exist (${path})`
    );
  });

  test("invalid JSON is a load error", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{not json");
    let caught: unknown = null;
    try {
      loadProfiles(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProfileLoadError);
    if (!(caught instanceof ProfileLoadError)) return;
    expect(caught.path).toBe(path);
    expect(caught.message).toMatch(/^Failed to parse patient profiles JSON: /);
  });

  test("findProfilesFile returns the first existing candidate", () => {
    const path = join(dir, "b.json");
    writeFileSync(path, "[]");
    expect(findProfilesFile([join(dir, "a.json"), path])).toBe(path);
    expect(findProfilesFile([join(dir, "a.json")])).toBeNull();
  });
});
