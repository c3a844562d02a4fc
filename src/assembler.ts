import type { IntradayWindow } from "./domains";
import { randomInt, type Rng } from "./random";
import type {
  CompositeMetrics,
  CompositeRecord,
  ExecutiveRecord,
  ExecutiveTestMetrics,
  LanguageMetrics,
  LanguageRecord,
  MemoryRecord,
  MobilityMetrics,
  MobilityRecord,
  RecallTestMetrics,
  ResolvedIdentity,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses `YYYY-MM-DD` into UTC midnight. Returns `null` for anything else,
 * including impossible calendar dates such as `2025-02-30`.
 */
export function parseStartDate(value: string): Date | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  if (
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day
  ) {
    return null;
  }
  return d;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Session start: calendar day `startDate + dayIndex`, at a random hour and
 * minute inside the domain's window.
 */
export function sessionTimestamp(
  startDate: Date,
  dayIndex: number,
  window: IntradayWindow,
  rng: Rng
): Date {
  const hour = randomInt(rng, window.hours[0], window.hours[1]);
  const minute = randomInt(rng, window.minutes[0], window.minutes[1]);
  const day = addDays(startDate, dayIndex);
  return new Date(
    Date.UTC(
      day.getUTCFullYear(),
      day.getUTCMonth(),
      day.getUTCDate(),
      hour,
      minute
    )
  );
}

export function compositeRecord(
  identity: ResolvedIdentity,
  at: Date,
  metrics: CompositeMetrics
): CompositeRecord {
  return {
    device_id: identity.deviceId,
    patient_id: identity.patientId,
    session_date: at.toISOString(),
    ...metrics,
  };
}

type Envelope = {
  device_id: string;
  patient_id: string;
  timestamp: string;
  signal_quality: number;
};

function envelope(
  identity: ResolvedIdentity,
  at: Date,
  signalQuality: number
): Envelope {
  return {
    device_id: identity.deviceId,
    patient_id: identity.patientId,
    timestamp: at.toISOString(),
    signal_quality: signalQuality,
  };
}

export function mobilityRecord(
  identity: ResolvedIdentity,
  at: Date,
  metrics: MobilityMetrics,
  signalQuality: number
): MobilityRecord {
  return {
    ...envelope(identity, at, signalQuality),
    domain: "mobility",
    metrics,
    task_type: "passive_gait_monitoring",
  };
}

export function executiveRecord(
  identity: ResolvedIdentity,
  at: Date,
  metrics: ExecutiveTestMetrics,
  signalQuality: number
): ExecutiveRecord {
  return {
    ...envelope(identity, at, signalQuality),
    domain: "executive_function",
    metrics,
    task_type: "trail_making_test_b",
  };
}

export function memoryRecord(
  identity: ResolvedIdentity,
  at: Date,
  metrics: RecallTestMetrics,
  signalQuality: number
): MemoryRecord {
  return {
    ...envelope(identity, at, signalQuality),
    domain: "memory",
    metrics,
    test_type: "MoCA_recall",
  };
}

export function languageRecord(
  identity: ResolvedIdentity,
  at: Date,
  metrics: LanguageMetrics,
  signalQuality: number
): LanguageRecord {
  return {
    ...envelope(identity, at, signalQuality),
    domain: "language",
    metrics,
    task_type: "verbal_fluency_test",
  };
}
