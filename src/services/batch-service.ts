/**
 * Batch Runner
 *
 * One batch is a single pass over the spreadsheet:
 *
 *   fetch → parse → render all → convert all → upload all
 *
 * Fetching or parsing failures abort the batch with zero uploads. A record
 * that fails to render, convert or upload is recorded on the report and the
 * batch moves on. `run()` never throws; the next scheduled batch is the retry.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import { systemClock } from "../lib/clock.js";
import type { Clock } from "../lib/clock.js";
import { errorMessage } from "../lib/errors.js";
import { buildOutputFileName, claimUniqueFileName, replaceExtension } from "../lib/file-naming.js";
import { createBatchLogger, generateBatchId } from "../lib/logger.js";
import { findMissingFields } from "../lib/records.js";
import { captureBatchFailure } from "../lib/sentry.js";
import type { DocumentConverter } from "./conversion-service.js";
import { joinRemotePath, remoteBaseName } from "./remote-sync-service.js";
import type { RemoteSync } from "./remote-sync-service.js";
import { readSpreadsheet } from "./spreadsheet-service.js";
import { loadTemplate, renderDocument } from "./template-service.js";
import type { DocumentTemplate } from "./template-service.js";
import type {
  AppConfig,
  BatchReport,
  BatchStage,
  RenderedDocument,
  SheetRecord,
  SpreadsheetRow,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BatchRunnerDeps {
  config: AppConfig;
  sync: RemoteSync;
  /** Required when `config.conversion` is set */
  converter?: DocumentConverter | null;
  clock?: Clock;
}

/** A record cleared for rendering, with its claimed output name. */
interface PlannedDocument {
  rowNumber: number;
  fields: SheetRecord;
  fileName: string;
}

/** Whole-batch failure; carries the step that failed for Sentry. */
class BatchAbort extends Error {
  constructor(
    readonly stage: string,
    readonly error: unknown
  ) {
    super(`${stage}: ${errorMessage(error)}`);
    this.name = "BatchAbort";
  }
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export class BatchRunner {
  private readonly config: AppConfig;
  private readonly sync: RemoteSync;
  private readonly converter: DocumentConverter | null;
  private readonly clock: Clock;

  constructor(deps: BatchRunnerDeps) {
    this.config = deps.config;
    this.sync = deps.sync;
    this.converter = deps.converter ?? null;
    this.clock = deps.clock ?? systemClock;

    if (this.config.conversion && !this.converter) {
      throw new Error("A converter is required when conversion is configured");
    }
  }

  /** Scratch folder for downloaded inputs. */
  private get inputDir(): string {
    return path.join(this.config.workDir, "input");
  }

  /** Scratch folder for rendered and converted documents. */
  private get outputDir(): string {
    return path.join(this.config.workDir, "output");
  }

  /**
   * Execute one batch and report what happened.
   */
  async run(): Promise<BatchReport> {
    const batchId = generateBatchId();
    const log = createBatchLogger(batchId);
    const report: BatchReport = {
      batchId,
      status: "completed",
      startedAt: this.clock.now(),
      finishedAt: this.clock.now(),
      totalRecords: 0,
      rendered: 0,
      converted: 0,
      uploaded: [],
      skipped: [],
      failures: [],
    };

    log.info({ msg: "Batch started" });

    try {
      await this.execute(report, log);
    } catch (error) {
      const stage = error instanceof BatchAbort ? error.stage : "unexpected";
      const cause = error instanceof BatchAbort ? error.error : error;

      report.status = "aborted";
      report.abortReason = errorMessage(error);
      log.error({ msg: "Batch aborted", stage, err: cause });
      captureBatchFailure(cause, {
        batchId,
        stage,
        metadata: { workDir: this.config.workDir },
      });
    }

    report.finishedAt = this.clock.now();
    log.info({
      msg: "Batch finished",
      status: report.status,
      totalRecords: report.totalRecords,
      rendered: report.rendered,
      converted: report.converted,
      uploaded: report.uploaded.length,
      skipped: report.skipped.length,
      failed: report.failures.length,
      durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
    });

    return report;
  }

  private async execute(report: BatchReport, log: pino.Logger): Promise<void> {
    await this.step("prepare", () => this.prepareWorkDir());

    const { remotes } = this.config;
    const spreadsheetPath = await this.step("fetch", () =>
      this.sync.fetch(remotes.spreadsheet, path.join(this.inputDir, "sheet", remoteBaseName(remotes.spreadsheet)))
    );
    const templatePath = await this.step("fetch", () =>
      this.sync.fetch(remotes.template, path.join(this.inputDir, "template", remoteBaseName(remotes.template)))
    );

    const rows = await this.step("parse", () =>
      readSpreadsheet(spreadsheetPath, { sheetName: this.config.sheetName })
    );
    const template = await this.step("template", () => loadTemplate(templatePath));

    report.totalRecords = rows.length;
    if (rows.length === 0) {
      log.warn({ msg: "Spreadsheet has no records", spreadsheet: remotes.spreadsheet });
      return;
    }

    const planned = await this.plan(rows, report, log);
    const rendered = await this.renderAll(template, planned, report, log);
    const converted = await this.convertAll(rendered, report, log);
    await this.uploadAll(converted, report, log);
  }

  /**
   * Run a whole-batch step, turning its failure into a BatchAbort.
   */
  private async step<T>(stage: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw new BatchAbort(stage, error);
    }
  }

  /**
   * Empty the runner's own `input/` and `output/` folders. Anything else in
   * the scratch directory is left alone.
   */
  private async prepareWorkDir(): Promise<void> {
    await fs.rm(this.inputDir, { recursive: true, force: true });
    await fs.rm(this.outputDir, { recursive: true, force: true });
    await fs.mkdir(this.inputDir, { recursive: true });
    await fs.mkdir(this.outputDir, { recursive: true });
  }

  // -------------------------------------------------------------------------
  // Planning
  // -------------------------------------------------------------------------

  /**
   * Validate records, claim unique file names and drop records whose output
   * already exists when SKIP_EXISTING is on.
   */
  private async plan(
    rows: SpreadsheetRow[],
    report: BatchReport,
    log: pino.Logger
  ): Promise<PlannedDocument[]> {
    const { naming, requiredFields, conversion } = this.config;
    const required = naming.field ? [...requiredFields, naming.field] : requiredFields;
    const usedNames = new Set<string>();
    const planned: PlannedDocument[] = [];

    for (const row of rows) {
      const missing = [...new Set(findMissingFields(row.fields, required))];
      const candidate =
        missing.length === 0
          ? buildOutputFileName(row.fields, naming, row.rowNumber, report.startedAt)
          : null;

      if (candidate === null) {
        const detail = missing.length > 0 ? missing.join(", ") : (naming.field ?? "");
        report.skipped.push({ rowNumber: row.rowNumber, reason: "missing_fields", detail });
        log.warn({ msg: "Skipping record with missing fields", rowNumber: row.rowNumber, missing: detail });
        continue;
      }

      const fileName = claimUniqueFileName(candidate, usedNames);
      const uploadName = conversion ? replaceExtension(fileName, conversion.targetFormat) : fileName;

      if (this.config.skipExisting && (await this.existsRemotely(uploadName, log))) {
        report.skipped.push({ rowNumber: row.rowNumber, reason: "already_exists", detail: uploadName });
        log.info({ msg: "Skipping record already uploaded", rowNumber: row.rowNumber, fileName: uploadName });
        continue;
      }

      planned.push({ rowNumber: row.rowNumber, fields: row.fields, fileName });
    }

    return planned;
  }

  /**
   * A failed listing is treated as "not there": the document is regenerated
   * and overwritten.
   */
  private async existsRemotely(fileName: string, log: pino.Logger): Promise<boolean> {
    const remote = joinRemotePath(this.config.remotes.output, fileName);
    try {
      return await this.sync.exists(remote);
    } catch (error) {
      log.warn({ msg: "Could not check remote file", remote, err: error });
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Render / convert / upload
  // -------------------------------------------------------------------------

  private recordFailure(
    report: BatchReport,
    log: pino.Logger,
    doc: { rowNumber: number; fileName: string },
    stage: BatchStage,
    error: unknown
  ): void {
    const message = errorMessage(error);
    report.failures.push({ rowNumber: doc.rowNumber, fileName: doc.fileName, stage, message });
    log.error({ msg: `Record failed at ${stage}`, rowNumber: doc.rowNumber, fileName: doc.fileName, err: error });
  }

  private async renderAll(
    template: DocumentTemplate,
    planned: PlannedDocument[],
    report: BatchReport,
    log: pino.Logger
  ): Promise<RenderedDocument[]> {
    const rendered: RenderedDocument[] = [];

    for (const doc of planned) {
      try {
        rendered.push(
          await renderDocument(
            template,
            doc.fields,
            { rowNumber: doc.rowNumber, fileName: doc.fileName, outputDir: this.outputDir },
            { delimiters: this.config.delimiters }
          )
        );
        report.rendered++;
      } catch (error) {
        this.recordFailure(report, log, doc, "render", error);
      }
    }

    log.info({ msg: "Rendered documents", count: rendered.length });
    return rendered;
  }

  private async convertAll(
    documents: RenderedDocument[],
    report: BatchReport,
    log: pino.Logger
  ): Promise<RenderedDocument[]> {
    const { conversion } = this.config;
    if (!conversion || !this.converter) return documents;

    const converted: RenderedDocument[] = [];

    for (const doc of documents) {
      try {
        const outputPath = await this.converter.convert(doc.path, conversion.targetFormat);
        converted.push({ rowNumber: doc.rowNumber, fileName: path.basename(outputPath), path: outputPath });
        report.converted++;
      } catch (error) {
        this.recordFailure(report, log, doc, "convert", error);
      }
    }

    log.info({ msg: "Converted documents", count: converted.length, targetFormat: conversion.targetFormat });
    return converted;
  }

  private async uploadAll(
    documents: RenderedDocument[],
    report: BatchReport,
    log: pino.Logger
  ): Promise<void> {
    for (const doc of documents) {
      const remote = joinRemotePath(this.config.remotes.output, doc.fileName);

      try {
        await this.sync.push(doc.path, remote);
        if (this.config.verifyUploads && !(await this.sync.exists(remote))) {
          throw new Error(`${remote} is not listed after upload`);
        }
      } catch (error) {
        this.recordFailure(report, log, doc, "upload", error);
        continue;
      }

      report.uploaded.push(remote);
      try {
        await fs.rm(doc.path, { force: true });
      } catch (error) {
        log.warn({ msg: "Could not delete uploaded file", path: doc.path, err: error });
      }
    }
  }
}
