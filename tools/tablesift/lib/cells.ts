import type { CellValue } from "../pipeline/types.js";

export const NUMERIC_PATTERN = /^[\d.\-+]+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isEmptyCell(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return Number.isNaN(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime());
  }
  if (typeof value === "string") {
    return value.trim() === "";
  }
  return false;
}

export function cellToString(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  return String(value);
}

export function cellText(value: CellValue | undefined): string {
  return cellToString(value).trim();
}

export function looksNumeric(text: string): boolean {
  return NUMERIC_PATTERN.test(text);
}

/**
 * Reads a cell as a float literal. Booleans and dates are not numbers here,
 * and strings must be a complete literal after trimming.
 */
export function parseNumber(value: CellValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = value.trim();
  if (!FLOAT_LITERAL.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

// Truncates toward zero, so "3.9" reads as 3.
export function parseInteger(value: CellValue | undefined): number | null {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

const ISO_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export function parseDate(value: CellValue | undefined): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }
  const text = value.trim();

  const iso = text.match(ISO_DATE);
  if (iso) {
    const [, year, month, day, hour, minute, second, millis, zone] = iso;
    const base = Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      Number((millis ?? "0").padEnd(3, "0"))
    );
    if (!isValidCalendarDate(base, Number(year), Number(month), Number(day))) {
      return null;
    }
    return new Date(base - zoneOffsetMs(zone));
  }

  const us = text.match(US_DATE);
  if (us) {
    const [, month, day, year] = us;
    const base = Date.UTC(Number(year), Number(month) - 1, Number(day));
    return isValidCalendarDate(base, Number(year), Number(month), Number(day))
      ? new Date(base)
      : null;
  }

  return null;
}

function isValidCalendarDate(ms: number, year: number, month: number, day: number): boolean {
  const date = new Date(ms);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function zoneOffsetMs(zone: string | undefined): number {
  if (!zone || zone === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes) * 60_000;
}

export function formatDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return "";
  }
  const iso = date.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

export function cellKey(value: CellValue): string {
  if (isEmptyCell(value) && typeof value !== "string") {
    return "null";
  }
  if (value instanceof Date) {
    return `date:${value.getTime()}`;
  }
  return `${typeof value}:${String(value)}`;
}
