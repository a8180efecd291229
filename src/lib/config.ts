/**
 * Environment configuration.
 *
 * All settings are read once at startup, validated with zod and turned into
 * an {@link AppConfig} that is passed explicitly to every component.
 * See `.env.example` for the full list of variables.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { AppConfig } from "../types/index.js";

/** Blank strings count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const requiredString = z.string({ required_error: "is required" }).trim().min(1, "is required");

function booleanFlag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      const normalized = value?.trim().toLowerCase();
      if (!normalized) return defaultValue;
      if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
      if (normalized === "false" || normalized === "0" || normalized === "no") return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be true or false" });
      return z.NEVER;
    });
}

const envSchema = z.object({
  INTERVAL_MINUTES: z.coerce.number().int().positive().default(60),
  SPREADSHEET_REMOTE: requiredString,
  TEMPLATE_REMOTE: requiredString,
  OUTPUT_REMOTE: requiredString,
  SHEET_NAME: optionalString,
  WORK_DIR: optionalString.transform((value) => value ?? "temp"),
  OUTPUT_NAME_FIELD: optionalString,
  OUTPUT_NAME_PREFIX: z.string().default(""),
  OUTPUT_NAME_SUFFIX: z.string().default(""),
  REQUIRED_FIELDS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((field) => field.trim())
        .filter((field) => field.length > 0)
    ),
  PLACEHOLDER_START: optionalString.transform((value) => value ?? "{{"),
  PLACEHOLDER_END: optionalString.transform((value) => value ?? "}}"),
  CONVERT_TO: optionalString.pipe(
    z
      .string()
      .regex(/^[a-z0-9]+$/i, "must be a file extension such as pdf")
      .transform((value) => value.toLowerCase())
      .optional()
  ),
  CONVERTER: z.enum(["pandoc", "libreoffice"]).default("pandoc"),
  CONVERTER_BINARY: optionalString,
  PDF_ENGINE: optionalString.transform((value) => value ?? "wkhtmltopdf"),
  RCLONE_BINARY: optionalString.transform((value) => value ?? "rclone"),
  RCLONE_CONFIG: optionalString,
  COMMAND_TIMEOUT_SECONDS: z.coerce.number().nonnegative().default(0),
  SKIP_EXISTING: booleanFlag(false),
  VERIFY_UPLOADS: booleanFlag(false),
  RUN_ONCE: booleanFlag(false),
});

/**
 * Parse and validate the worker configuration.
 *
 * @param env - Environment to read, `process.env` by default
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return {
    intervalMs: vars.INTERVAL_MINUTES * 60_000,
    remotes: {
      spreadsheet: vars.SPREADSHEET_REMOTE,
      template: vars.TEMPLATE_REMOTE,
      output: vars.OUTPUT_REMOTE,
    },
    sheetName: vars.SHEET_NAME,
    workDir: vars.WORK_DIR,
    naming: {
      field: vars.OUTPUT_NAME_FIELD,
      prefix: vars.OUTPUT_NAME_PREFIX,
      suffix: vars.OUTPUT_NAME_SUFFIX,
      extension: ".docx",
    },
    requiredFields: vars.REQUIRED_FIELDS,
    delimiters: {
      start: vars.PLACEHOLDER_START,
      end: vars.PLACEHOLDER_END,
    },
    conversion: vars.CONVERT_TO
      ? {
          targetFormat: vars.CONVERT_TO,
          converter: vars.CONVERTER,
          binary: vars.CONVERTER_BINARY,
          pdfEngine: vars.PDF_ENGINE,
        }
      : null,
    sync: {
      binary: vars.RCLONE_BINARY,
      configFile: vars.RCLONE_CONFIG,
      timeoutMs: vars.COMMAND_TIMEOUT_SECONDS * 1000,
    },
    skipExisting: vars.SKIP_EXISTING,
    verifyUploads: vars.VERIFY_UPLOADS,
    runOnce: vars.RUN_ONCE,
  };
}
