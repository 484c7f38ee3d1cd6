/**
 * Parses the date spellings accepted in task attributes into yyyy-MM-dd.
 * Supports: YYYY-MM-DD, YYYY/MM/DD, MM/DD and M/D (the last two take the
 * year of the processing date).
 */

import type { IsoDate } from '../types/task.js';

const FULL_DATE_RE = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/;
const MONTH_DAY_RE = /^(\d{1,2})\/(\d{1,2})$/;

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): IsoDate {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Build a date, or null when the components don't name a real day (e.g. feb30) */
function toIsoDate(year: number, month: number, day: number): IsoDate | null {
  if (month < 1 || month > 12 || day < 1) return null;

  const candidate = new Date(year, month - 1, day);
  // Years 0-99 are mapped to 1900-1999 by the Date constructor
  candidate.setFullYear(year);
  if (candidate.getMonth() !== month - 1 || candidate.getDate() !== day) {
    return null;
  }
  return formatDate(candidate);
}

function tryParseFull(input: string): IsoDate | null {
  const m = FULL_DATE_RE.exec(input);
  if (!m) return null;
  return toIsoDate(Number(m[1]), Number(m[3]), Number(m[4]));
}

function tryParseMonthDay(input: string, now: Date): IsoDate | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;
  return toIsoDate(now.getFullYear(), Number(m[1]), Number(m[2]));
}

/**
 * Parse an attribute date into yyyy-MM-dd.
 * Returns null if the input can't be parsed or names an impossible day.
 *
 * @param input - Date string (e.g. "2026-03-01", "2026/3/1", "03/01", "3/1")
 * @param now - Processing date; its year completes the two-part forms.
 */
export function parseDate(input: string | null | undefined, now: Date): IsoDate | null {
  if (!input?.trim()) return null;

  const trimmed = input.trim();
  return tryParseFull(trimmed) ?? tryParseMonthDay(trimmed, now);
}

/** Check that a string is a real yyyy-MM-dd date */
export function isIsoDate(input: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input);
  if (!m) return false;
  return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])) === input;
}
