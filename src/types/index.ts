// Shared types for the spreadsheet-to-document worker

/**
 * A single cell value after normalisation. Dates keep their `Date` type;
 * rich text, hyperlinks and formulas are reduced to their displayed value.
 */
export type FieldValue = string | number | boolean | Date | null;

/**
 * One spreadsheet row keyed by header name.
 */
export type SheetRecord = Record<string, FieldValue>;

/**
 * A record together with the worksheet row it came from (1-based).
 */
export interface SpreadsheetRow {
  rowNumber: number;
  fields: SheetRecord;
}

/**
 * Opaque `remote:path` string understood by the sync tool.
 */
export type RemoteLocation = string;

/**
 * A rendered (and possibly converted) file in the scratch directory.
 */
export interface RenderedDocument {
  rowNumber: number;
  fileName: string;
  path: string;
}

/**
 * How output file names are derived from a record.
 */
export interface NamingRule {
  /** Column whose value becomes the file stem; timestamp + row when absent */
  field?: string;
  prefix: string;
  suffix: string;
  /** Extension including the leading dot, e.g. ".docx" */
  extension: string;
}

/**
 * Placeholder delimiters, `{{` / `}}` by default.
 */
export interface TemplateDelimiters {
  start: string;
  end: string;
}

export type ConverterKind = "pandoc" | "libreoffice";

export interface ConversionConfig {
  /** Target format / extension without the dot, e.g. "pdf" */
  targetFormat: string;
  converter: ConverterKind;
  /** Overrides the converter's default binary */
  binary?: string;
  /** PDF engine handed to pandoc for PDF targets */
  pdfEngine: string;
}

export interface SyncConfig {
  binary: string;
  /** rclone configuration file holding the remote credentials */
  configFile?: string;
  /** 0 disables the timeout */
  timeoutMs: number;
}

/**
 * Validated process configuration, built once at startup.
 */
export interface AppConfig {
  intervalMs: number;
  remotes: {
    spreadsheet: RemoteLocation;
    template: RemoteLocation;
    /** Folder receiving the generated documents */
    output: RemoteLocation;
  };
  sheetName?: string;
  workDir: string;
  naming: NamingRule;
  requiredFields: string[];
  delimiters: TemplateDelimiters;
  conversion: ConversionConfig | null;
  sync: SyncConfig;
  skipExisting: boolean;
  verifyUploads: boolean;
  runOnce: boolean;
}

// Batch reporting

export type BatchStatus = "completed" | "aborted";

/** Pipeline stage in which a record failed. */
export type BatchStage = "render" | "convert" | "upload";

export type SkipReason = "missing_fields" | "already_exists";

export interface SkippedRecord {
  rowNumber: number;
  reason: SkipReason;
  /** Missing field names for `missing_fields`, target file for `already_exists` */
  detail: string;
}

export interface RecordFailure {
  rowNumber: number;
  fileName: string;
  stage: BatchStage;
  message: string;
}

export interface BatchReport {
  batchId: string;
  status: BatchStatus;
  startedAt: Date;
  finishedAt: Date;
  /** Non-blank rows read from the spreadsheet */
  totalRecords: number;
  rendered: number;
  converted: number;
  uploaded: RemoteLocation[];
  skipped: SkippedRecord[];
  failures: RecordFailure[];
  /** Why the batch stopped early, when `status` is "aborted" */
  abortReason?: string;
}
