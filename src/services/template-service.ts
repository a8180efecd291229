/**
 * Word template rendering.
 *
 * Templates are ordinary .docx files with `{{field}}` placeholders (the
 * delimiters are configurable). docxtemplater resolves placeholders even when
 * Word has split them over several runs. Word content controls whose tag names
 * a column are filled as well.
 */

import fs from "node:fs/promises";
import path from "node:path";
import Docxtemplater from "docxtemplater";
import PizZip from "pizzip";
import { RenderError, errorMessage } from "../lib/errors.js";
import { formatFieldValue, lookupField } from "../lib/records.js";
import type { RenderedDocument, SheetRecord, TemplateDelimiters } from "../types/index.js";

/** Main document part of a WordprocessingML package. */
const MAIN_DOCUMENT_PART = "word/document.xml";

export interface DocumentTemplate {
  sourcePath: string;
  content: Buffer;
}

export interface RenderOptions {
  delimiters: TemplateDelimiters;
}

/**
 * Load a .docx template from disk.
 *
 * @throws RenderError when the file is not a Word document
 */
export async function loadTemplate(templatePath: string): Promise<DocumentTemplate> {
  let content: Buffer;
  try {
    content = await fs.readFile(templatePath);
  } catch (error) {
    throw new RenderError(`Cannot read template ${templatePath}: ${errorMessage(error)}`, [], {
      cause: error,
    });
  }

  let zip: PizZip;
  try {
    zip = new PizZip(content);
  } catch (error) {
    throw new RenderError(`Template ${templatePath} is not a .docx archive`, [], { cause: error });
  }

  if (!zip.file(MAIN_DOCUMENT_PART)) {
    throw new RenderError(`Template ${templatePath} has no ${MAIN_DOCUMENT_PART}`);
  }

  return { sourcePath: templatePath, content };
}

const CONTENT_CONTROL = /<w:sdt(?=[\s>])[\s\S]*?<\/w:sdt>/g;
const CONTROL_TAG = /<w:tag\s[^>]*?w:val="([^"]*)"/;
const TEXT_ELEMENT = /<w:t(?=[\s/>])[^>]*?(?:\/>|>[\s\S]*?<\/w:t>)/;
const PLACEHOLDER_FLAG = /<w:showingPlcHdr\s*\/>/g;

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
 * Write record values into the content controls (`w:sdt`) of a document part.
 *
 * A control is matched to a column by its tag, compared the same way as
 * placeholder names, and its first text element receives the formatted
 * value. Controls with no tag or no matching column are left as they are.
 */
export function fillContentControls(documentXml: string, record: SheetRecord): string {
  return documentXml.replace(CONTENT_CONTROL, (control) => {
    const tag = CONTROL_TAG.exec(control)?.[1];
    if (tag === undefined) return control;

    const value = lookupField(record, unescapeXml(tag).trim());
    if (value === undefined) return control;

    const contentStart = control.indexOf("<w:sdtContent");
    if (contentStart === -1) return control;

    const properties = control.slice(0, contentStart).replace(PLACEHOLDER_FLAG, "");
    const content = control.slice(contentStart);
    if (!TEXT_ELEMENT.test(content)) return control;

    const text = `<w:t xml:space="preserve">${escapeXml(formatFieldValue(value))}</w:t>`;
    return properties + content.replace(TEXT_ELEMENT, () => text);
  });
}

/**
 * Collect docxtemplater's per-tag explanations from a thrown error.
 */
function templateErrorExplanations(error: unknown): string[] {
  if (typeof error !== "object" || error === null || !("properties" in error)) {
    return [];
  }

  const { properties } = error;
  if (typeof properties !== "object" || properties === null) return [];

  if ("errors" in properties && Array.isArray(properties.errors)) {
    return properties.errors.flatMap((inner: unknown) => templateErrorExplanations(inner));
  }
  if ("explanation" in properties && typeof properties.explanation === "string") {
    return [properties.explanation];
  }
  return [];
}

/**
 * Fill a template with one record.
 *
 * Placeholders whose field is not in the record are written back literally,
 * delimiters included. Section and raw-XML tags with no value render empty.
 * Content controls are filled after the placeholders.
 *
 * @throws RenderError when the template's tags are malformed
 */
export function renderTemplate(
  template: DocumentTemplate,
  record: SheetRecord,
  options: RenderOptions
): Buffer {
  const { start, end } = options.delimiters;

  try {
    const doc = new Docxtemplater(new PizZip(template.content), {
      delimiters: { start, end },
      paragraphLoop: true,
      linebreaks: true,
      // Every tag resolves against the record itself; rows have no nested data
      parser: (tag: string) => ({
        get: () => {
          const value = lookupField(record, tag.trim());
          return value === undefined ? undefined : formatFieldValue(value);
        },
      }),
      nullGetter: (part) => {
        if (!part.module) {
          return `${start}${part.value}${end}`;
        }
        return "";
      },
    });

    doc.render(record);

    const zip = doc.getZip();
    const documentXml = zip.file(MAIN_DOCUMENT_PART)?.asText();
    if (documentXml !== undefined) {
      zip.file(MAIN_DOCUMENT_PART, fillContentControls(documentXml, record));
    }

    return zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
  } catch (error) {
    const explanations = templateErrorExplanations(error);
    const detail = explanations.length > 0 ? explanations.join("; ") : errorMessage(error);
    throw new RenderError(`Cannot render ${path.basename(template.sourcePath)}: ${detail}`, explanations, {
      cause: error,
    });
  }
}

/**
 * Render a record and write the result to `outputDir/fileName`.
 */
export async function renderDocument(
  template: DocumentTemplate,
  record: SheetRecord,
  target: { rowNumber: number; fileName: string; outputDir: string },
  options: RenderOptions
): Promise<RenderedDocument> {
  const content = renderTemplate(template, record, options);
  const outputPath = path.join(target.outputDir, target.fileName);

  await fs.mkdir(target.outputDir, { recursive: true });
  await fs.writeFile(outputPath, content);

  return { rowNumber: target.rowNumber, fileName: target.fileName, path: outputPath };
}
