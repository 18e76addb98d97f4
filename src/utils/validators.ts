import { ValidationError } from './errors';

const PHONE_PATTERN = /^1\d{10}$/;
const DATE_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;

/** Company numbers are 11 digits starting with 1. Returns the trimmed value. */
export function normalizePhoneNumber(raw: string): string {
  const phone = raw.trim();
  if (!PHONE_PATTERN.test(phone)) {
    throw new ValidationError(`Invalid phone number "${phone}": expected 11 digits starting with 1`, 'INVALID_PHONE');
  }
  return phone;
}

/**
 * Normalizes YYYY-MM-DD (or YYYY/M/D) to zero-padded YYYY-MM-DD.
 * Rejects impossible calendar dates such as 2024-02-30.
 */
export function parseCalendarDate(raw: string, field = 'date'): string {
  const match = DATE_PATTERN.exec(raw.trim());
  if (!match) {
    throw new ValidationError(`Invalid ${field} "${raw}": expected YYYY-MM-DD`, 'INVALID_DATE');
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new ValidationError(`Invalid ${field} "${raw}": not a calendar date`, 'INVALID_DATE');
  }
  return date.toISOString().slice(0, 10);
}

export function requireNonBlank(value: string | undefined | null, field: string): string {
  const trimmed = (value ?? '').trim();
  if (!trimmed) {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
}

/** Trims and maps blank strings to null; undefined stays undefined (field not patched). */
export function optionalText(value: string | null | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}
