/**
 * Shot Date Helpers
 *
 * ShotDate is a plain local calendar date. These helpers build, compare and
 * print it so no other module has to re-derive dates from strings.
 */

import type { ShotDate } from "@ompd/types";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/**
 * Local calendar date of a timestamp
 */
export function shotDateFrom(time: Date): ShotDate {
  return {
    year: time.getFullYear(),
    month: time.getMonth() + 1,
    day: time.getDate(),
  };
}

/**
 * `YYYY-MM-DD`. Also the key used for set membership.
 */
export function formatShotDate(date: ShotDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export const shotDateKey = formatShotDate;

export function compareShotDates(a: ShotDate, b: ShotDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isSameShotDate(a: ShotDate, b: ShotDate): boolean {
  return compareShotDates(a, b) === 0;
}

/**
 * True when the triple names a real calendar day
 */
export function isValidShotDate(date: ShotDate): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) {
    return false;
  }
  const probe = new Date(year, month - 1, day);
  return (
    probe.getFullYear() === year && probe.getMonth() === month - 1 && probe.getDate() === day
  );
}

/**
 * Build a ShotDate from numeric strings, or null if they don't form a date
 */
export function parseShotDate(year: string, month: string, day: string): ShotDate | null {
  if (![year, month, day].every((part) => /^\d+$/.test(part))) {
    return null;
  }
  const date = { year: Number(year), month: Number(month), day: Number(day) };
  return isValidShotDate(date) ? date : null;
}
