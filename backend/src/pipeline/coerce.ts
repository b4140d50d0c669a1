import type { CleanValue, ColumnType } from './dataset.js';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DAY_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function normalizeText(value: string | null): string | null {
  if (value == null) return null;
  const str = value.trim();
  return str.length ? str : null;
}

export function coerceNumber(value: string | null): number | null {
  const text = normalizeText(value);
  if (text == null) return null;
  const candidate = text.includes(',') && !text.includes('.') ? text.replace(',', '.') : text;
  if (!DECIMAL.test(candidate)) return null;
  const parsed = Number(candidate);
  return Number.isFinite(parsed) ? parsed : null;
}

export function coerceInteger(value: string | null): number | null {
  const parsed = coerceNumber(value);
  return parsed != null && Number.isSafeInteger(parsed) ? parsed : null;
}

function formatDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().split('T')[0];
}

/** `DD/MM/YYYY` or `YYYY-MM-DD` naming a real calendar day, as `YYYY-MM-DD`. */
export function coerceDate(value: string | null): string | null {
  const text = normalizeText(value);
  if (text == null) return null;
  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    return formatDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }
  const iso = ISO_DATE.exec(text);
  if (iso) {
    return formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  return null;
}

/** Returns null for a value that cannot be coerced; callers treat it as missing. */
export function coerceValue(type: ColumnType, value: string | null): CleanValue {
  switch (type) {
    case 'numeric':
      return coerceNumber(value);
    case 'integer':
      return coerceInteger(value);
    case 'date':
      return coerceDate(value);
    case 'text':
      return normalizeText(value);
  }
}
