import { readFile, rm, stat, writeFile } from "node:fs/promises";
import { resolve } from "node:path";

import type { ExtractionConfig } from "../config/extraction_config";
import { resolveOutputFormat, type OutputFormat } from "../output/format";
import { serializeRecords } from "../output/serialize";
import { resolveSummarizer } from "../summarizer/registry";
import { ExtractionError, errorMessage } from "./errors";
import { buildRecords } from "./records";
import { compileSectionNumberPattern } from "./section_number";
import type { BuildRecordsOptions, ExtractionResult } from "./types";

export interface ExtractionRun extends ExtractionResult {
  inputPath: string;
  outputPath: string;
  format: OutputFormat;
}

export interface RunExtractionOptions {
  onDiagnostic?: BuildRecordsOptions["onDiagnostic"];
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function assertInputExists(inputPath: string): Promise<void> {
  try {
    const info = await stat(inputPath);
    if (!info.isFile()) {
      throw new ExtractionError("INPUT_NOT_FOUND", `Input file "${inputPath}" is not a regular file.`);
    }
  } catch (error) {
    if (error instanceof ExtractionError) {
      throw error;
    }
    if (hasErrorCode(error, "ENOENT")) {
      throw new ExtractionError("INPUT_NOT_FOUND", `Input file "${inputPath}" was not found.`, { cause: error });
    }
    throw new ExtractionError("INPUT_READ_FAILED", `Input file "${inputPath}" could not be inspected: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

async function readDocument(inputPath: string): Promise<string> {
  try {
    return await readFile(inputPath, "utf8");
  } catch (error) {
    throw new ExtractionError("INPUT_READ_FAILED", `Input file "${inputPath}" could not be read: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Reads the input document, splits it into section records and writes them to
 * the output path in the format its extension selects.
 *
 * Configuration problems and a missing input are raised before the output path
 * is touched. Past that point any existing output file is removed first, so a
 * failed rerun never leaves the previous run's file behind.
 */
export async function runExtraction(config: ExtractionConfig, options: RunExtractionOptions = {}): Promise<ExtractionRun> {
  const format = resolveOutputFormat(config.outputPath);
  const numberPattern = compileSectionNumberPattern(config.sectionNumberPattern);
  const summarizer = resolveSummarizer(config.summarizer);
  if (config.sectionMarker.length === 0) {
    throw new ExtractionError("INVALID_CONFIGURATION", "Section marker must be a non-empty string.");
  }
  if (resolve(config.inputPath) === resolve(config.outputPath)) {
    throw new ExtractionError(
      "INVALID_CONFIGURATION",
      `Output file "${config.outputPath}" is the input file; choose a different output path.`,
    );
  }

  await assertInputExists(config.inputPath);
  await rm(config.outputPath, { force: true });

  const document = await readDocument(config.inputPath);
  const result = buildRecords(document, config.sectionMarker, numberPattern, {
    summarizer,
    onDiagnostic: options.onDiagnostic,
  });

  await writeFile(config.outputPath, serializeRecords(result.records, { format, jsonLayout: config.jsonLayout }), "utf8");

  return {
    ...result,
    inputPath: config.inputPath,
    outputPath: config.outputPath,
    format,
  };
}
