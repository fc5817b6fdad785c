import { InvalidDateError } from "./errors";

declare const dateCodeBrand: unique symbol;

/** Canonical `YYYYMMDD` code of a real calendar date. */
export type DateCode = string & { readonly [dateCodeBrand]: true };

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
] as const;

export function isDateCodeFormat(value: string): boolean {
  return /^\d{8}$/.test(value);
}

export function isDateCode(value: string): value is DateCode {
  if (!isDateCodeFormat(value)) {
    return false;
  }
  const { year, month, day } = splitParts(value);
  return year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function parseDateCode(value: string): DateCode {
  if (!isDateCode(value)) {
    throw new InvalidDateError(value);
  }
  return value;
}

export function formatDisplayDate(code: DateCode | string): string {
  const checked = parseDateCode(code);
  const { year, month, day } = splitParts(checked);
  return `${MONTH_NAMES[month - 1]} ${day}, ${String(year).padStart(4, "0")}`;
}

function splitParts(value: string) {
  return {
    year: Number(value.slice(0, 4)),
    month: Number(value.slice(4, 6)),
    day: Number(value.slice(6, 8))
  };
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}
