/**
 * Format conversion of rendered documents through an external converter.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { runCommand, formatCommand, describeExit } from "../lib/command.js";
import type { CommandResult, CommandRunner } from "../lib/command.js";
import { ConversionError, errorMessage } from "../lib/errors.js";
import { createComponentLogger } from "../lib/logger.js";
import type { ConversionConfig } from "../types/index.js";

const logger = createComponentLogger("converter");

export interface DocumentConverter {
  /** Convert `inputPath`, returning the path of the converted file */
  convert(inputPath: string, targetFormat: string): Promise<string>;
}

export interface ConverterOptions {
  binary?: string;
  /** 0 disables the timeout */
  timeoutMs?: number;
  runner?: CommandRunner;
}

/**
 * `<dir>/<stem>.<format>` next to the input file.
 */
export function convertedPath(inputPath: string, targetFormat: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}.${targetFormat}`);
}

/**
 * Shared process handling for converters that shell out.
 */
abstract class CommandConverter implements DocumentConverter {
  protected readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  protected constructor(defaultBinary: string, options: ConverterOptions) {
    this.binary = options.binary ?? defaultBinary;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.run = options.runner ?? runCommand;
  }

  protected abstract buildArgs(inputPath: string, outputPath: string, targetFormat: string): string[];

  async convert(inputPath: string, targetFormat: string): Promise<string> {
    const outputPath = convertedPath(inputPath, targetFormat);
    const args = this.buildArgs(inputPath, outputPath, targetFormat);
    const name = path.basename(inputPath);

    logger.debug({ msg: "Running converter", command: formatCommand(this.binary, args) });

    let result: CommandResult;
    try {
      result = await this.run(this.binary, args, { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new ConversionError(
        `Cannot convert ${name}: could not start ${this.binary}: ${errorMessage(error)}`,
        "",
        null,
        { cause: error }
      );
    }

    if (result.timedOut) {
      throw new ConversionError(
        `Converting ${name} timed out after ${this.timeoutMs}ms`,
        result.stderr,
        result.exitCode
      );
    }

    if (result.exitCode !== 0) {
      throw new ConversionError(
        `Converting ${name} failed with ${describeExit(result)}: ${result.stderr.trim()}`,
        result.stderr,
        result.exitCode
      );
    }

    try {
      await fs.access(outputPath);
    } catch (error) {
      throw new ConversionError(
        `${this.binary} exited cleanly but ${outputPath} was not written`,
        result.stderr,
        result.exitCode,
        { cause: error }
      );
    }

    logger.info({ msg: "Converted document", inputPath, outputPath, targetFormat });
    return outputPath;
  }
}

export class PandocConverter extends CommandConverter {
  constructor(
    private readonly pdfEngine: string,
    options: ConverterOptions = {}
  ) {
    super("pandoc", options);
  }

  protected buildArgs(inputPath: string, outputPath: string, targetFormat: string): string[] {
    const args = [inputPath, "-o", outputPath];
    if (targetFormat === "pdf") {
      args.push(`--pdf-engine=${this.pdfEngine}`);
    }
    return args;
  }
}

export class LibreOfficeConverter extends CommandConverter {
  constructor(options: ConverterOptions = {}) {
    super("soffice", options);
  }

  protected buildArgs(inputPath: string, outputPath: string, targetFormat: string): string[] {
    return ["--headless", "--convert-to", targetFormat, "--outdir", path.dirname(outputPath), inputPath];
  }
}

export function createConverter(
  config: ConversionConfig,
  options: Omit<ConverterOptions, "binary"> = {}
): DocumentConverter {
  const converterOptions: ConverterOptions = { ...options, binary: config.binary };

  switch (config.converter) {
    case "pandoc":
      return new PandocConverter(config.pdfEngine, converterOptions);
    case "libreoffice":
      return new LibreOfficeConverter(converterOptions);
  }
}
