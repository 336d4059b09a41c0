// src/utils/dates.ts
export const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** yymmdd in UTC */
export function yymmdd(d: Date) {
  return `${pad(d.getUTCFullYear() % 100)}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
}

/** yymmddhhmm in UTC */
export function yymmddhhmm(d: Date) {
  return `${yymmdd(d)}${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}`;
}

/** ISO calendar date (YYYY-MM-DD) in UTC, the format of `date` columns */
export function isoDate(d: Date) {
  return d.toISOString().slice(0, 10);
}

export function addDays(d: Date, days: number) {
  return new Date(d.getTime() + days * DAY_MS);
}
