import ExcelJS from "exceljs";
import { ParseError, errorMessage } from "../lib/errors.js";
import { isBlank } from "../lib/records.js";
import type { FieldValue, SheetRecord, SpreadsheetRow } from "../types/index.js";

/**
 * Options for reading a spreadsheet.
 */
export interface ReadSpreadsheetOptions {
  /** Worksheet to read; the first worksheet when omitted */
  sheetName?: string;
}

/**
 * Reduce an ExcelJS cell value to the value shown in the cell.
 *
 * Rich text becomes its concatenated text, hyperlinks their label, formulas
 * their cached result. Error cells and empty cells become null.
 */
export function normalizeCellValue(value: ExcelJS.CellValue): FieldValue {
  if (value === null || value === undefined) return null;

  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }

  if ("richText" in value) {
    return value.richText.map((run) => run.text).join("");
  }
  if ("hyperlink" in value) {
    return value.text;
  }
  if ("formula" in value || "sharedFormula" in value) {
    return normalizeCellValue(value.result ?? null);
  }

  // CellErrorValue (#N/A, #REF!, …)
  return null;
}

function headerText(value: ExcelJS.CellValue): string {
  const normalized = normalizeCellValue(value);
  if (normalized === null) return "";
  if (normalized instanceof Date) return normalized.toISOString().slice(0, 10);
  return String(normalized).trim();
}

/**
 * Map column numbers to field names from the header row.
 *
 * Empty header cells are dropped; repeated names get `_2`, `_3`, ….
 */
function readHeaders(row: ExcelJS.Row): Map<number, string> {
  const headers = new Map<number, string>();
  const used = new Set<string>();

  row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
    const name = headerText(cell.value);
    if (!name) return;

    // Suffix until the name is free, so a literal "x_2" header never collides.
    let candidate = name;
    let counter = 1;
    while (used.has(candidate)) {
      counter++;
      candidate = `${name}_${counter}`;
    }
    used.add(candidate);
    headers.set(colNumber, candidate);
  });

  return headers;
}

function pickWorksheet(workbook: ExcelJS.Workbook, sheetName?: string): ExcelJS.Worksheet {
  if (sheetName) {
    const sheet = workbook.getWorksheet(sheetName);
    if (!sheet) {
      throw new ParseError(`Worksheet "${sheetName}" not found`);
    }
    return sheet;
  }

  const [first] = workbook.worksheets;
  if (!first) {
    throw new ParseError("Workbook contains no worksheets");
  }
  return first;
}

/**
 * Read every non-blank data row of a spreadsheet.
 *
 * The first row holds the field names. Reading the same file twice yields
 * equal rows.
 *
 * @throws ParseError when the file is not a readable workbook, the sheet is
 * missing, or the header row is empty
 */
export async function readSpreadsheet(
  filePath: string,
  options: ReadSpreadsheetOptions = {}
): Promise<SpreadsheetRow[]> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new ParseError(`Cannot read spreadsheet ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const sheet = pickWorksheet(workbook, options.sheetName);
  const headers = readHeaders(sheet.getRow(1));

  if (headers.size === 0) {
    throw new ParseError(`Worksheet "${sheet.name}" has no header row`);
  }

  const rows: SpreadsheetRow[] = [];

  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;

    const fields: SheetRecord = {};
    for (const [colNumber, name] of headers) {
      fields[name] = normalizeCellValue(row.getCell(colNumber).value);
    }

    if (Object.values(fields).every((value) => isBlank(value))) return;

    rows.push({ rowNumber, fields });
  });

  return rows;
}
