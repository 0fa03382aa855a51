import { ConfigurationError } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export function parseReferenceDate(raw: string | undefined): Date {
  if (!raw) {
    const now = new Date();
    return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  }
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) throw new ConfigurationError(`Invalid reference date "${raw}"`);
  return parsed;
}

export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function isoDateTime(d: Date): string {
  return `${d.toISOString().slice(0, 19)}+00:00`;
}

export function daysBefore(ref: Date, days: number): Date {
  return new Date(ref.getTime() - days * DAY_MS);
}

export function daysAfter(ref: Date, days: number): Date {
  return new Date(ref.getTime() + days * DAY_MS);
}

export function hoursAfter(ref: Date, hours: number): Date {
  return new Date(ref.getTime() + hours * 60 * 60 * 1000);
}

/** Same calendar day `years` earlier; Feb 29 falls back to Feb 28. */
export function yearsBefore(ref: Date, years: number): Date {
  const y = ref.getUTCFullYear() - years;
  const m = ref.getUTCMonth();
  const candidate = new Date(Date.UTC(y, m, ref.getUTCDate()));
  if (candidate.getUTCMonth() !== m) return new Date(Date.UTC(y, m + 1, 0));
  return candidate;
}

export function ageOn(dob: string | undefined, ref: Date): number | undefined {
  const raw = String(dob ?? "").trim();
  if (!raw) return undefined;
  const birth = new Date(raw);
  if (Number.isNaN(birth.getTime())) return undefined;
  let age = ref.getUTCFullYear() - birth.getUTCFullYear();
  const monthDiff = ref.getUTCMonth() - birth.getUTCMonth();
  const dayDiff = ref.getUTCDate() - birth.getUTCDate();
  if (monthDiff < 0 || (monthDiff === 0 && dayDiff < 0)) age -= 1;
  return age >= 0 ? age : undefined;
}
