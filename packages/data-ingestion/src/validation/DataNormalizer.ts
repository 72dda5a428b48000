import type { CellValue } from '@retail-etl/types';

/**
 * Field normalizers for the cleaning pipeline.
 *
 * Every function here is total: malformed input maps to a documented default
 * and never throws, so one bad cell cannot abort a whole dataset.
 */

export const DEFAULT_DATE = '1900-01-01';

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const PUNCTUATION_PATTERN = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Convert `MM/DD/YYYY` to ISO `YYYY-MM-DD`.
 * Anything else, including impossible calendar dates, becomes DEFAULT_DATE.
 */
export function normalizeDate(raw: CellValue | undefined): string {
  if (typeof raw !== 'string') {
    return DEFAULT_DATE;
  }

  const match = raw.trim().match(US_DATE_PATTERN);
  if (!match) {
    return DEFAULT_DATE;
  }

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);

  // Date.UTC rolls 02/30 over into March; reject anything that moved
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    year < 1 ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return DEFAULT_DATE;
  }

  return `${match[3]}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

const ISO_DATE_PATTERN = /^(\d{4})-\d{2}-\d{2}$/;

/**
 * Year of an ISO `YYYY-MM-DD` date; the year of DEFAULT_DATE otherwise.
 */
export function extractYear(raw: CellValue | undefined): number {
  const match = typeof raw === 'string' ? raw.match(ISO_DATE_PATTERN) : null;
  return parseInt(match ? match[1] : DEFAULT_DATE.slice(0, 4), 10);
}

/**
 * Keep only the decimal digits of the value's string form. May return ''.
 */
export function normalizeNumeric(raw: CellValue | undefined): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  return String(raw).replace(/\D/g, '');
}

export function stripDigits(raw: CellValue): CellValue {
  return typeof raw === 'string' ? raw.replace(/\d/g, '') : raw;
}

export function stripPunctuation(raw: CellValue): CellValue {
  return typeof raw === 'string' ? raw.replace(PUNCTUATION_PATTERN, '') : raw;
}

/**
 * Domain part of an email address: the text after the first '@' and before
 * any further '@'. Values without an '@' have no domain and become null.
 */
export function emailDomain(raw: CellValue): CellValue {
  if (typeof raw !== 'string') {
    return raw;
  }
  const parts = raw.split('@');
  return parts.length > 1 ? parts[1] : null;
}

/**
 * 'Y' and 'true' (any case) are true; everything else, missing included, is false.
 */
export function toBoolean(raw: CellValue): boolean {
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw !== 'string') {
    return false;
  }
  const value = raw.trim();
  return value.toUpperCase() === 'Y' || value.toLowerCase() === 'true';
}

/**
 * Integer from the digits of a value. No digits at all counts as zero.
 */
export function parseQuantity(raw: CellValue): number {
  const digits = normalizeNumeric(raw);
  return digits === '' ? 0 : parseInt(digits, 10);
}

export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  return typeof value === 'string' && value.trim() === '';
}
