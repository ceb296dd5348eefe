import type { Quarter } from "./types";

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

// Optional time part: HH:MM[:SS[.fff]] with an optional Z or numeric offset
const ISO_DATE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse `YYYY-MM-DD` (optionally followed by a time) or `M/D/YYYY`.
 * Returns null for anything else, including impossible dates like 2021-02-30.
 */
export function parseCalendarDate(raw: string): CalendarDate | null {
  const value = raw.trim();
  let year: number;
  let month: number;
  let day: number;

  const iso = ISO_DATE.exec(value);
  const us = iso ? null : US_DATE.exec(value);
  if (iso) {
    year = parseInt(iso[1], 10);
    month = parseInt(iso[2], 10);
    day = parseInt(iso[3], 10);
  } else if (us) {
    month = parseInt(us[1], 10);
    day = parseInt(us[2], 10);
    year = parseInt(us[3], 10);
  } else {
    return null;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

export function toIsoDate({ year, month, day }: CalendarDate): string {
  return `${toIsoMonth({ year, month, day })}-${String(day).padStart(2, "0")}`;
}

// Four-digit years keep ISO strings ordered
export function toIsoMonth({ year, month }: CalendarDate): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

// Q1: Jan-Mar, Q2: Apr-Jun, Q3: Jul-Sep, Q4: Oct-Dec
export function quarterOf(month: number): Quarter {
  if (month <= 3) return "Q1";
  if (month <= 6) return "Q2";
  if (month <= 9) return "Q3";
  return "Q4";
}

/** Normalize a user-supplied ISO date, or null when it is not one. */
export function normalizeIsoDate(raw: string): string | null {
  if (!ISO_DATE.test(raw.trim())) return null;
  const parsed = parseCalendarDate(raw);
  return parsed ? toIsoDate(parsed) : null;
}
