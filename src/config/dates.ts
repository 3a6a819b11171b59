import { ConfigError } from "../core/errors";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Upper bound used when no modern cutoff is configured; sorts after every 14-digit timestamp. */
export const NO_CUTOFF_TIMESTAMP = "99999999999999";

function parseDate(value: string, field: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ConfigError(`${field} must be YYYY-MM-DD, got "${value}"`);
  }
  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (parsed.toISOString().slice(0, 10) !== value) {
    throw new ConfigError(`${field} is not a calendar date: "${value}"`);
  }
  return parsed;
}

function toTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 10).replace(/-/g, "")}000000`;
}

export function validateDate(value: string, field: string): void {
  parseDate(value, field);
}

/** Start of the given day as an archive timestamp. */
export function startOfDayTimestamp(value: string, field = "date"): string {
  return toTimestamp(parseDate(value, field));
}

/** Start of the following day, used as an exclusive upper bound. */
export function startOfNextDayTimestamp(value: string, field = "date"): string {
  const parsed = parseDate(value, field);
  parsed.setUTCDate(parsed.getUTCDate() + 1);
  return toTimestamp(parsed);
}

/** Last second of the given day; the index query bound is inclusive. */
export function endOfDayTimestamp(value: string, field = "date"): string {
  return `${startOfDayTimestamp(value, field).slice(0, 8)}235959`;
}

export function cutoffTimestamp(value: string | undefined): string {
  if (!value) {
    return NO_CUTOFF_TIMESTAMP;
  }
  return startOfDayTimestamp(value, "modernCutoffDate");
}
