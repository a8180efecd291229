/**
 * Test fixtures: workbooks written with ExcelJS and minimal .docx templates
 * assembled with PizZip, both in throwaway temp directories.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import PizZip from "pizzip";

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write an .xlsx file whose first row is `header` followed by `rows`.
 */
export async function writeWorkbook(
  filePath: string,
  header: string[],
  rows: ExcelJS.CellValue[][],
  sheetName = "Sheet1"
): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.addRow(header);
  for (const row of rows) {
    sheet.addRow(row);
  }
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

const CONTENT_TYPES_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`;

const RELS_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">
  <Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>
</Relationships>`;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

/**
 * Build a .docx with one paragraph per entry. An entry given as an array is
 * written as several runs in the same paragraph, the way Word splits text.
 */
export function buildDocx(paragraphs: Array<string | string[]>): Buffer {
  const body = paragraphs
    .map((paragraph) => {
      const runs = Array.isArray(paragraph) ? paragraph : [paragraph];
      const runXml = runs
        .map((text) => `<w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r>`)
        .join("");
      return `<w:p>${runXml}</w:p>`;
    })
    .join("");

  return buildDocxFromBody(body);
}

/**
 * Build a .docx whose `w:body` holds the given WordprocessingML.
 */
export function buildDocxFromBody(body: string): Buffer {
  const documentXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`;

  const zip = new PizZip();
  zip.file("[Content_Types].xml", CONTENT_TYPES_XML);
  zip.file("_rels/.rels", RELS_XML);
  zip.file("word/document.xml", documentXml);
  return zip.generate({ type: "nodebuffer" });
}

export async function writeDocx(
  filePath: string,
  paragraphs: Array<string | string[]>
): Promise<string> {
  await fs.writeFile(filePath, buildDocx(paragraphs));
  return filePath;
}

/**
 * Block-level content control with a tag and placeholder text.
 */
export function contentControlXml(tag: string, placeholder: string): string {
  return (
    `<w:sdt><w:sdtPr><w:tag w:val="${escapeXml(tag)}"/><w:showingPlcHdr/></w:sdtPr>` +
    `<w:sdtContent><w:p><w:r><w:t>${escapeXml(placeholder)}</w:t></w:r></w:p></w:sdtContent></w:sdt>`
  );
}

/**
 * Text of every paragraph of a .docx, runs joined.
 */
export function readDocxParagraphs(content: Buffer): string[] {
  const zip = new PizZip(content);
  const documentXml = zip.file("word/document.xml")?.asText() ?? "";
  const paragraphs = documentXml.match(/<w:p[\s>][\s\S]*?<\/w:p>/g) ?? [];

  return paragraphs.map((paragraph) =>
    Array.from(paragraph.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g))
      .map((match) => unescapeXml(match[1] ?? ""))
      .join("")
  );
}
