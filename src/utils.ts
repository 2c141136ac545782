import type { YearSlice } from "./types";

const USERNAME_REGEX = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,38})$/;
const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_YEARS_BACK = 5;

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const isValidUsername = (value: string | undefined): value is string => {
  if (!value) return false;
  return USERNAME_REGEX.test(value);
};

export const isValidISODate = (value: string | undefined): value is string => {
  if (!value) return false;
  if (!ISO_DATE_REGEX.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) return false;
  // Date rolls 2023-02-30 over into March; reject instead.
  return formatISODate(parsed) === value;
};

export const parseISODate = (value: string): Date => {
  return new Date(`${value}T00:00:00Z`);
};

export const formatISODate = (date: Date): string => {
  return date.toISOString().slice(0, 10);
};

export const toISODateTime = (date: Date): string => {
  return `${date.toISOString().slice(0, 19)}Z`;
};

/**
 * Resolves the requested history window to GraphQL `DateTime` strings.
 * Explicit dates win; a missing bound is derived from `yearsBack` (365-day years) and `now`.
 */
export const resolveWindow = (options: {
  fromDate?: string;
  toDate?: string;
  yearsBack: number;
  now: Date;
}): { from: string; to: string } => {
  const { fromDate, toDate, yearsBack, now } = options;
  if (fromDate !== undefined && !isValidISODate(fromDate)) {
    throw new Error("Invalid from-date format. Use YYYY-MM-DD.");
  }
  if (toDate !== undefined && !isValidISODate(toDate)) {
    throw new Error("Invalid to-date format. Use YYYY-MM-DD.");
  }

  const end = toDate ? new Date(`${toDate}T23:59:59Z`) : new Date(Math.floor(now.getTime() / 1000) * 1000);
  const start = fromDate ? parseISODate(fromDate) : new Date(end.getTime() - yearsBack * 365 * DAY_MS);
  if (end < start) {
    throw new Error("The 'to' date must not be before 'from'.");
  }
  return { from: toISODateTime(start), to: toISODateTime(end) };
};

export const splitIntoYearSlices = (from: string, to: string): YearSlice[] => {
  const start = new Date(from);
  const end = new Date(to);
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new Error(`Invalid date range ${from} .. ${to}.`);
  }
  if (end < start) {
    throw new Error("The 'to' date must not be before 'from'.");
  }

  const slices: YearSlice[] = [];
  let cursor = start;
  do {
    const year = cursor.getUTCFullYear();
    const yearEnd = new Date(Date.UTC(year, 11, 31, 23, 59, 59));
    const sliceEnd = yearEnd < end ? yearEnd : end;
    slices.push({ year, from: toISODateTime(cursor), to: toISODateTime(sliceEnd) });
    cursor = new Date(Date.UTC(year + 1, 0, 1));
  } while (cursor <= end);

  return slices;
};

export const getEnvNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const formatCount = (value: number): string => {
  return Math.trunc(value).toLocaleString("en-US");
};

export const formatSigned = (value: number): string => {
  const rounded = Math.trunc(value);
  return `${rounded >= 0 ? "+" : "-"}${Math.abs(rounded).toLocaleString("en-US")}`;
};

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
