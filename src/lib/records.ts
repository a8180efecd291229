/**
 * Record field helpers shared by the template renderer and the output
 * naming rule.
 */

import type { FieldValue, SheetRecord } from "../types/index.js";

/** `YYYY-MM-DD HH:MM:SS`, the shape of a datetime cell read as text. */
const DATETIME_TEXT = /^(\d{4})-(\d{2})-(\d{2})\s\d{2}:\d{2}:\d{2}$/;

/**
 * Normalise a field name for tolerant matching: diacritics removed,
 * lower-cased, punctuation turned into spaces, whitespace collapsed.
 *
 * @example normalizeFieldKey("Entreprise/Commune") === "entreprise commune"
 */
export function normalizeFieldKey(key: string): string {
  return key
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[\p{P}\p{S}]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Look a field up by exact name, then by normalised name.
 *
 * @returns The field value, or undefined when the record has no such field
 */
export function lookupField(record: SheetRecord, key: string): FieldValue | undefined {
  if (Object.prototype.hasOwnProperty.call(record, key)) {
    return record[key];
  }

  const wanted = normalizeFieldKey(key);
  if (!wanted) return undefined;

  for (const [name, value] of Object.entries(record)) {
    if (normalizeFieldKey(name) === wanted) {
      return value;
    }
  }
  return undefined;
}

/** A value that carries no content: absent, null, or whitespace only. */
export function isBlank(value: FieldValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

/**
 * List the required fields that are absent or blank in `record`.
 */
export function findMissingFields(record: SheetRecord, required: readonly string[]): string[] {
  return required.filter((field) => isBlank(lookupField(record, field)));
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Text written into a document for a field value.
 *
 * Dates, and datetime strings as spreadsheets export them, become DD-MM-YYYY.
 */
export function formatFieldValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return "";

  if (value instanceof Date) {
    return `${pad(value.getUTCDate())}-${pad(value.getUTCMonth() + 1)}-${value.getUTCFullYear()}`;
  }

  if (typeof value === "string") {
    const match = DATETIME_TEXT.exec(value);
    if (match) {
      const [, year, month, day] = match;
      return `${day}-${month}-${year}`;
    }
    return value;
  }

  return String(value);
}
