import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import PizZip from "pizzip";
import {
  fillContentControls,
  loadTemplate,
  renderTemplate,
  renderDocument,
} from "../template-service.js";
import type { DocumentTemplate } from "../template-service.js";
import { RenderError } from "../../lib/errors.js";
import {
  buildDocx,
  buildDocxFromBody,
  contentControlXml,
  createTempDir,
  readDocxParagraphs,
  removeDir,
} from "../../__tests__/helpers/fixtures.js";

const curly = { delimiters: { start: "{{", end: "}}" } };

function template(paragraphs: Array<string | string[]>): DocumentTemplate {
  return { sourcePath: "template.docx", content: buildDocx(paragraphs) };
}

describe("renderTemplate", () => {
  it("substitutes placeholders with record fields", () => {
    const output = renderTemplate(
      template(["{{name}} - {{date}}"]),
      { name: "Alice", date: "2024-01-01" },
      curly
    );

    expect(readDocxParagraphs(output)).toEqual(["Alice - 2024-01-01"]);
  });

  it("leaves unmatched placeholders as literal text", () => {
    const output = renderTemplate(
      template(["Hello {{name}}, ref {{reference}}"]),
      { name: "Bob" },
      curly
    );

    expect(readDocxParagraphs(output)).toEqual(["Hello Bob, ref {{reference}}"]);
  });

  it("resolves placeholders split across runs", () => {
    const output = renderTemplate(
      template([["Dear {{na", "me}},"]]),
      { name: "Carol" },
      curly
    );

    expect(readDocxParagraphs(output).join("")).toBe("Dear Carol,");
  });

  it("matches tags to columns by normalised name", () => {
    const output = renderTemplate(
      template(["Client: {{Entreprise Commune}}"]),
      { "Entreprise/Commune": "Mairie de Lyon" },
      curly
    );

    expect(readDocxParagraphs(output)).toEqual(["Client: Mairie de Lyon"]);
  });

  it("formats dates and datetime text", () => {
    const output = renderTemplate(
      template(["{{visit}} / {{signed}}"]),
      { visit: new Date(Date.UTC(2024, 1, 29)), signed: "2024-03-01 10:30:00" },
      curly
    );

    expect(readDocxParagraphs(output)).toEqual(["29-02-2024 / 01-03-2024"]);
  });

  it("renders null fields as empty text", () => {
    const output = renderTemplate(template(["[{{email}}]"]), { email: null }, curly);
    expect(readDocxParagraphs(output)).toEqual(["[]"]);
  });

  it("escapes XML special characters in values", () => {
    const output = renderTemplate(template(["{{company}}"]), { company: "Smith & <Sons>" }, curly);
    expect(readDocxParagraphs(output)).toEqual(["Smith & <Sons>"]);
  });

  it("supports custom delimiters", () => {
    const output = renderTemplate(
      template(["Nom: ${nom}"]),
      { nom: "Test User" },
      { delimiters: { start: "${", end: "}" } }
    );

    expect(readDocxParagraphs(output)).toEqual(["Nom: Test User"]);
  });

  it("throws RenderError with explanations for an unclosed tag", () => {
    let caught: unknown;
    try {
      renderTemplate(template(["Hello {{name"]), { name: "Alice" }, curly);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RenderError);
    if (caught instanceof RenderError) {
      expect(caught.explanations.length).toBeGreaterThan(0);
      expect(caught.message).toMatch(/^Cannot render template\.docx: /);
    }
  });

  it("does not modify the template buffer", () => {
    const tpl = template(["{{name}}"]);
    const before = Buffer.from(tpl.content);

    renderTemplate(tpl, { name: "Alice" }, curly);

    expect(tpl.content.equals(before)).toBe(true);
  });
});

describe("content controls", () => {
  function documentXml(output: Buffer): string {
    return new PizZip(output).file("word/document.xml")?.asText() ?? "";
  }

  it("writes the matching field into a tagged control", () => {
    const content = buildDocxFromBody(
      `<w:p><w:r><w:t>Client:</w:t></w:r></w:p>${contentControlXml("name", "Click here")}`
    );

    const output = renderTemplate({ sourcePath: "template.docx", content }, { name: "Alice" }, curly);

    expect(readDocxParagraphs(output)).toEqual(["Client:", "Alice"]);
    expect(documentXml(output)).not.toContain("<w:showingPlcHdr/>");
  });

  it("leaves controls without a matching column untouched", () => {
    const content = buildDocxFromBody(contentControlXml("reference", "Click here"));

    const output = renderTemplate({ sourcePath: "template.docx", content }, { name: "Alice" }, curly);

    expect(readDocxParagraphs(output)).toEqual(["Click here"]);
    expect(documentXml(output)).toContain('<w:tag w:val="reference"/><w:showingPlcHdr/>');
  });

  it("matches tags by normalised name and escapes the value", () => {
    const xml = contentControlXml("Entreprise Commune", "Click here");

    const filled = fillContentControls(xml, { "Entreprise/Commune": "Smith & <Sons>" });

    expect(filled).toBe(
      '<w:sdt><w:sdtPr><w:tag w:val="Entreprise Commune"/></w:sdtPr>' +
        '<w:sdtContent><w:p><w:r><w:t xml:space="preserve">Smith &amp; &lt;Sons&gt;</w:t></w:r></w:p></w:sdtContent></w:sdt>'
    );
  });

  it("formats dates written into controls", () => {
    const xml = contentControlXml("visit", "date");

    const filled = fillContentControls(xml, { visit: new Date(Date.UTC(2024, 1, 29)) });

    expect(filled).toContain('<w:t xml:space="preserve">29-02-2024</w:t>');
  });

  it("ignores controls that carry no tag", () => {
    const xml =
      "<w:sdt><w:sdtPr/><w:sdtContent><w:p><w:r><w:t>keep</w:t></w:r></w:p></w:sdtContent></w:sdt>";

    expect(fillContentControls(xml, { keep: "changed" })).toBe(xml);
  });
});

describe("loadTemplate / renderDocument", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir("template-test");
  });

  afterEach(async () => {
    await removeDir(tmpDir);
  });

  it("loads a .docx from disk", async () => {
    const file = path.join(tmpDir, "model.docx");
    await fs.writeFile(file, buildDocx(["{{name}}"]));

    const loaded = await loadTemplate(file);

    expect(loaded.sourcePath).toBe(file);
    expect(loaded.content.length).toBeGreaterThan(0);
  });

  it("rejects a file that is not a zip archive", async () => {
    const file = path.join(tmpDir, "model.docx");
    await fs.writeFile(file, "plain text");

    await expect(loadTemplate(file)).rejects.toBeInstanceOf(RenderError);
  });

  it("rejects an archive without a main document", async () => {
    const zip = new PizZip();
    zip.file("readme.txt", "hello");
    const file = path.join(tmpDir, "model.docx");
    await fs.writeFile(file, zip.generate({ type: "nodebuffer" }));

    await expect(loadTemplate(file)).rejects.toThrow(`Template ${file} has no word/document.xml`);
  });

  it("rejects a missing file", async () => {
    await expect(loadTemplate(path.join(tmpDir, "absent.docx"))).rejects.toBeInstanceOf(
      RenderError
    );
  });

  it("writes the rendered document into the output directory", async () => {
    const outputDir = path.join(tmpDir, "out");

    const rendered = await renderDocument(
      template(["{{name}}"]),
      { name: "Alice" },
      { rowNumber: 2, fileName: "alice.docx", outputDir },
      curly
    );

    expect(rendered).toEqual({
      rowNumber: 2,
      fileName: "alice.docx",
      path: path.join(outputDir, "alice.docx"),
    });
    expect(readDocxParagraphs(await fs.readFile(rendered.path))).toEqual(["Alice"]);
  });
});
