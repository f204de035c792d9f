/**
 * Value parsing shared by the boolean language and the NL translator
 *
 * @module
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

const UNIT_MULTIPLIERS: Record<string, number> = {
  b: 1,
  byte: 1,
  bytes: 1,
  k: 1024,
  kb: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  t: 1024 ** 4,
  tb: 1024 ** 4,
};

export function unitMultiplier(unit: string | undefined): number | null {
  if (unit === undefined || unit === "") return 1;
  return UNIT_MULTIPLIERS[unit.toLowerCase()] ?? null;
}

/**
 * Parses `1048576`, `1.5MB`, `500 kb` into bytes (1024-based units).
 * Returns null for anything else.
 */
export function parseByteSize(value: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-z]*)\s*$/i.exec(value);
  if (!match) return null;
  const multiplier = unitMultiplier(match[2]);
  if (multiplier === null) return null;
  return Number(match[1]) * multiplier;
}

export function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Parses a date value from the query language into a UTC day or instant:
 * an ISO date or date-time, `today`, `yesterday`, or `<n>d` for n days ago.
 *
 * @returns The instant, and whether the value named a whole day
 */
export function parseDateValue(value: string, now: Date): { time: number; wholeDay: boolean } | null {
  const lower = value.trim().toLowerCase();
  const today = startOfUtcDay(now);

  if (lower === "today") return { time: today, wholeDay: true };
  if (lower === "yesterday") return { time: today - DAY_MS, wholeDay: true };

  const relative = /^(\d+)d$/.exec(lower);
  if (relative) {
    return { time: today - Number(relative[1]) * DAY_MS, wholeDay: true };
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(lower)) {
    const time = Date.parse(`${lower}T00:00:00.000Z`);
    return Number.isNaN(time) ? null : { time, wholeDay: true };
  }

  const time = Date.parse(value);
  return Number.isNaN(time) ? null : { time, wholeDay: false };
}

/**
 * ISO string for the first millisecond of a UTC day
 */
export function dayStartIso(time: number): string {
  return new Date(startOfUtcDay(new Date(time))).toISOString();
}

/**
 * ISO string for the last millisecond of a UTC day
 */
export function dayEndIso(time: number): string {
  return new Date(startOfUtcDay(new Date(time)) + DAY_MS - 1).toISOString();
}
