import type { DeviceRole, Domain } from "./types";

/**
 * Phase constants for the shared rise -> plateau -> decline trend.
 */
export type TrendSpec = {
  /** Last day of the practice phase (inclusive). */
  practiceDays: number;
  /** Decline starts the day after this one. */
  declineAfter: number;
  /** Only patients with `cf` strictly below this can decline. */
  impairmentCutoff: number;
  /** Chance an eligible patient is flagged for decline. */
  declineChance: number;
};

/** UTC hour and minute ranges (inclusive) a session can start in. */
export type IntradayWindow = {
  hours: readonly [number, number];
  minutes: readonly [number, number];
};

export type DomainSpec = {
  domain: Domain;
  role: DeviceRole;
  devicePrefix: string;
  window: IntradayWindow;
  trend: TrendSpec | null;
  /**
   * Uniform prior for the cognitive factor when no profile is supplied.
   * `null` means the domain samples screening scores instead (composite) or
   * has no cognitive baseline at all (mobility).
   */
  cfPrior: readonly [number, number] | null;
};

export const DOMAIN_SPECS: Record<Domain, DomainSpec> = {
  composite: {
    domain: "composite",
    role: "speech",
    devicePrefix: "SPK",
    window: { hours: [8, 8], minutes: [0, 50] },
    trend: {
      practiceDays: 4,
      declineAfter: 20,
      impairmentCutoff: 0.55,
      declineChance: 1,
    },
    cfPrior: null,
  },
  mobility: {
    domain: "mobility",
    role: "wearable",
    devicePrefix: "WEAR",
    window: { hours: [6, 22], minutes: [0, 59] },
    trend: null,
    cfPrior: null,
  },
  executive_function: {
    domain: "executive_function",
    role: "app",
    devicePrefix: "APP",
    window: { hours: [9, 14], minutes: [0, 59] },
    trend: {
      practiceDays: 4,
      declineAfter: 10,
      impairmentCutoff: 0.6,
      declineChance: 0.5,
    },
    cfPrior: [0.55, 0.95],
  },
  memory: {
    domain: "memory",
    role: "clinic",
    devicePrefix: "CLIN",
    window: { hours: [10, 12], minutes: [0, 59] },
    trend: {
      practiceDays: 2,
      declineAfter: 15,
      impairmentCutoff: 0.6,
      declineChance: 0.5,
    },
    cfPrior: [0.45, 0.95],
  },
  language: {
    domain: "language",
    role: "speech",
    devicePrefix: "SPK",
    window: { hours: [8, 11], minutes: [0, 59] },
    trend: {
      practiceDays: 3,
      declineAfter: 15,
      impairmentCutoff: 0.6,
      declineChance: 0.5,
    },
    cfPrior: [0.5, 0.95],
  },
};

export const DOMAINS: readonly Domain[] = [
  "composite",
  "mobility",
  "executive_function",
  "memory",
  "language",
];

export function isDomain(value: unknown): value is Domain {
  return DOMAINS.some((d) => d === value);
}
