import { WEEKDAY_ORDER } from "@shelter/shared";
import type { AdoptionRecord } from "@shelter/shared";

export interface CivilDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type CalendarFields = Pick<AdoptionRecord, "timestamp" | "date" | "hour" | "weekday" | "month" | "year">;

// 2024-03-09, 2024-03-09 14:05, 2024-03-09T14:05:33.120Z, 2024-03-09T14:05:33+02:00
const ISO_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// 03/09/2024, 03/09/2024 02:05:33 PM
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]M)?)?$/i;

const pad2 = (n: number) => String(n).padStart(2, "0");

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function toNumber(part: string | undefined): number {
  return part === undefined ? 0 : Number(part);
}

function isValidCivil(c: CivilDateTime): boolean {
  if (c.month < 1 || c.month > 12) return false;
  if (c.day < 1 || c.day > daysInMonth(c.year, c.month)) return false;
  if (c.hour < 0 || c.hour > 23) return false;
  if (c.minute < 0 || c.minute > 59) return false;
  return c.second >= 0 && c.second <= 59;
}

/**
 * Parse a logged DateTime cell into its wall-clock components.
 * Offsets are accepted but not applied: calendar fields follow the time as written.
 * Returns null when the value is not a real date-time.
 */
export function parseTimestamp(raw: string): CivilDateTime | null {
  const value = raw.trim();

  const iso = ISO_PATTERN.exec(value);
  if (iso) {
    const civil: CivilDateTime = {
      year: toNumber(iso[1]),
      month: toNumber(iso[2]),
      day: toNumber(iso[3]),
      hour: toNumber(iso[4]),
      minute: toNumber(iso[5]),
      second: toNumber(iso[6]),
    };
    return isValidCivil(civil) ? civil : null;
  }

  const us = US_PATTERN.exec(value);
  if (us) {
    let hour = toNumber(us[4]);
    const meridiem = us[7]?.toUpperCase();
    if (meridiem) {
      if (hour < 1 || hour > 12) return null;
      hour = (hour % 12) + (meridiem === "PM" ? 12 : 0);
    }
    const civil: CivilDateTime = {
      year: toNumber(us[3]),
      month: toNumber(us[1]),
      day: toNumber(us[2]),
      hour,
      minute: toNumber(us[5]),
      second: toNumber(us[6]),
    };
    return isValidCivil(civil) ? civil : null;
  }

  return null;
}

/**
 * Calendar columns for one record. Pure: the same components always give the same fields.
 */
export function deriveCalendarFields(c: CivilDateTime): CalendarFields {
  const date = `${String(c.year).padStart(4, "0")}-${pad2(c.month)}-${pad2(c.day)}`;
  const probe = new Date(0);
  probe.setUTCFullYear(c.year, c.month - 1, c.day);
  // getUTCDay: 0 = Sunday
  const weekday = WEEKDAY_ORDER[(probe.getUTCDay() + 6) % 7];

  return {
    timestamp: `${date}T${pad2(c.hour)}:${pad2(c.minute)}:${pad2(c.second)}`,
    date,
    hour: c.hour,
    weekday,
    month: c.month,
    year: c.year,
  };
}
