import { extname } from "node:path";

import { ExtractionError } from "../extraction/errors";

export type OutputFormat = "csv" | "json";

export type JsonLayout = "records" | "columns";

export const JSON_LAYOUTS = ["records", "columns"] as const satisfies readonly JsonLayout[];

export function resolveOutputFormat(outputPath: string): OutputFormat {
  const extension = extname(outputPath).toLowerCase();
  if (extension === ".csv") {
    return "csv";
  }
  if (extension === ".json") {
    return "json";
  }

  throw new ExtractionError(
    "UNSUPPORTED_OUTPUT_FORMAT",
    `Output file "${outputPath}" must end in .json or .csv, got "${extension || "no extension"}".`,
  );
}
