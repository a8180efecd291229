import { formatFieldValue, lookupField } from "./records.js";
import type { NamingRule, SheetRecord } from "../types/index.js";

/** Characters rejected by Windows, SharePoint or rclone paths. */
const UNSAFE_CHARS = /[\/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Turn a field value into a file stem: trimmed, lower-cased, with whitespace
 * runs and unsafe characters replaced by `_`.
 *
 * @returns The stem, or an empty string when nothing usable remains
 */
export function toSafeFileStem(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(UNSAFE_CHARS, "_");
}

function timestampStem(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/**
 * Build the output file name for a record.
 *
 * With `rule.field`, the stem comes from that field; otherwise from the batch
 * timestamp and the row number.
 *
 * @returns The file name, or null when the naming field is blank
 */
export function buildOutputFileName(
  record: SheetRecord,
  rule: NamingRule,
  rowNumber: number,
  now: Date
): string | null {
  let stem: string;

  if (rule.field) {
    stem = toSafeFileStem(formatFieldValue(lookupField(record, rule.field)));
    if (!stem) return null;
  } else {
    stem = `${timestampStem(now)}_${rowNumber}`;
  }

  return `${rule.prefix}${stem}${rule.suffix}${rule.extension}`;
}

/**
 * Ensure a file name is unique within a batch.
 *
 * Comparison is case-insensitive. Collisions get `_2`, `_3`, … before the
 * extension. The returned name is recorded in `usedNames`.
 */
export function claimUniqueFileName(fileName: string, usedNames: Set<string>): string {
  const dot = fileName.lastIndexOf(".");
  const base = dot > 0 ? fileName.slice(0, dot) : fileName;
  const extension = dot > 0 ? fileName.slice(dot) : "";

  let candidate = fileName;
  let counter = 2;
  while (usedNames.has(candidate.toLowerCase())) {
    candidate = `${base}_${counter}${extension}`;
    counter++;
  }

  usedNames.add(candidate.toLowerCase());
  return candidate;
}

/**
 * Replace the extension of a file name.
 */
export function replaceExtension(fileName: string, extension: string): string {
  const dot = fileName.lastIndexOf(".");
  const base = dot > 0 ? fileName.slice(0, dot) : fileName;
  return `${base}.${extension}`;
}
