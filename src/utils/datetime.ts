/**
 * Calendar date handling: every datetime is carried as whole seconds since
 * 1970-01-01 UTC and only rendered as M/D/YYYY at the boundary.
 */

import { ValidationError } from "./errors.js";

export const SECONDS_PER_DAY = 86_400;

const ISO_DATE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const US_DATE =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?)?$/i;
const TEXT_MONTH_FIRST = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i;
const TEXT_DAY_FIRST = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/i;

const MONTHS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
];

function monthFromName(name: string): number | undefined {
  if (name.length < 3) return undefined;
  const index = MONTHS.indexOf(name.slice(0, 3).toLowerCase());
  return index === -1 ? undefined : index + 1;
}

function toInt(part: string | undefined, fallback = 0): number {
  return part === undefined ? fallback : parseInt(part, 10);
}

/**
 * Seconds since epoch for a calendar moment, or undefined when a component is
 * out of range (e.g. February 30th)
 */
function utcSeconds(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): number | undefined {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(millis);
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return undefined;
  }
  return Math.floor(millis / 1000);
}

function offsetSeconds(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  return sign * (toInt(digits.slice(0, 2)) * 3600 + toInt(digits.slice(2, 4)) * 60);
}

/**
 * Parse a date or date-time string into epoch seconds.
 * Timestamps without an explicit offset are read as UTC.
 */
export function parseDatetime(text: string): number | undefined {
  const value = text.trim();

  const iso = ISO_DATE.exec(value);
  if (iso) {
    const seconds = utcSeconds(
      toInt(iso[1]),
      toInt(iso[2]),
      toInt(iso[3]),
      toInt(iso[4]),
      toInt(iso[5]),
      toInt(iso[6]),
    );
    return seconds === undefined ? undefined : seconds - offsetSeconds(iso[7]);
  }

  const us = US_DATE.exec(value);
  if (us) {
    let hour = toInt(us[4]);
    const meridiem = us[7]?.toLowerCase();
    if (meridiem === "pm" && hour < 12) hour += 12;
    if (meridiem === "am" && hour === 12) hour = 0;
    return utcSeconds(toInt(us[3]), toInt(us[1]), toInt(us[2]), hour, toInt(us[5]), toInt(us[6]));
  }

  const monthFirst = TEXT_MONTH_FIRST.exec(value);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1] ?? "");
    return month === undefined
      ? undefined
      : utcSeconds(toInt(monthFirst[3]), month, toInt(monthFirst[2]));
  }

  const dayFirst = TEXT_DAY_FIRST.exec(value);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2] ?? "");
    return month === undefined
      ? undefined
      : utcSeconds(toInt(dayFirst[3]), month, toInt(dayFirst[1]));
  }

  return undefined;
}

export function isDatetime(value: unknown): value is string {
  return typeof value === "string" && parseDatetime(value) !== undefined;
}

/**
 * Epoch seconds of a datetime string; throws when it does not parse
 */
export function toSeconds(text: string): number {
  const seconds = parseDatetime(text);
  if (seconds === undefined) {
    throw new ValidationError(`Not a recognized date: "${text}"`, { value: text });
  }
  return seconds;
}

/**
 * Truncate epoch seconds to the start of their UTC day
 */
export function toDaySeconds(seconds: number): number {
  return Math.floor(seconds / SECONDS_PER_DAY) * SECONDS_PER_DAY;
}

/**
 * Render epoch seconds as M/D/YYYY (no zero padding)
 *
 * @example
 * formatDate(1579046400) // "1/15/2020"
 */
export function formatDate(seconds: number): string {
  const date = new Date(Math.floor(seconds) * 1000);
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${date.getUTCFullYear()}`;
}
