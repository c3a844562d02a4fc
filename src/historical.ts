import { addDays } from "./assembler";
import { randomInt, type Rng } from "./random";
import { compositeSimulator } from "./simulators";
import type { CompositeRecord, ResolvedIdentity } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
export const MIN_GAP_DAYS = 30;
const LOOKBACK_DAYS = 365;
const ATTEMPTS_PER_DATE = 100;

/** Most dates the lookback window can hold at the minimum spacing. */
export const MAX_SPACED_DATES = Math.floor(LOOKBACK_DAYS / MIN_GAP_DAYS) + 1;

function utcMidnight(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
}

/** Whole calendar days from `a` to `b` (UTC). */
export function calendarDaysBetween(a: Date, b: Date): number {
  return Math.round(
    (utcMidnight(b).getTime() - utcMidnight(a).getTime()) / DAY_MS
  );
}

/**
 * Up to `count` session times in the year before `endDate`, each between
 * 08:00 and 18:59 UTC and at least 30 calendar days from every other.
 * Sorted ascending. Fewer are returned when no room is left; requests above
 * `MAX_SPACED_DATES` are capped to it.
 */
export function wellSpacedDates(
  rng: Rng,
  count: number,
  endDate: Date
): Date[] {
  const windowStart = addDays(utcMidnight(endDate), -LOOKBACK_DAYS);
  const target = Math.min(count, MAX_SPACED_DATES);
  const dates: Date[] = [];

  for (
    let attempt = 0;
    dates.length < target && attempt < target * ATTEMPTS_PER_DATE;
    attempt += 1
  ) {
    const day = addDays(windowStart, randomInt(rng, 0, LOOKBACK_DAYS - 1));
    const candidate = new Date(
      day.getTime() +
        randomInt(rng, 8, 18) * 60 * 60 * 1000 +
        randomInt(rng, 0, 59) * 60 * 1000
    );
    const spaced = dates.every(
      (d) => Math.abs(calendarDaysBetween(d, candidate)) >= MIN_GAP_DAYS
    );
    if (spaced) dates.push(candidate);
  }

  return dates.sort((a, b) => a.getTime() - b.getTime());
}

/**
 * Sparse composite history for one patient. The day index of each session
 * is its offset from the first one.
 */
export function generateHistoricalSessions(
  identity: ResolvedIdentity,
  rng: Rng,
  opts: { count: number; endDate: Date }
): CompositeRecord[] {
  const dates = wellSpacedDates(rng, opts.count, opts.endDate);
  if (dates.length === 0) return [];

  const simulate = compositeSimulator(identity, rng);
  const first = dates[0];
  return dates.map((at) => simulate(calendarDaysBetween(first, at), at));
}
