import { z } from "zod";

import { ExtractionError } from "../extraction/errors";
import { DEFAULT_SECTION_NUMBER_PATTERN } from "../extraction/section_number";
import { DEFAULT_SECTION_MARKER } from "../extraction/segmenter";
import { JSON_LAYOUTS, type JsonLayout } from "../output/format";
import { DEFAULT_SUMMARIZER } from "../summarizer/registry";

export const DEFAULT_INPUT_FILE = "regulations.txt";
export const DEFAULT_OUTPUT_FILE = "extracted_requirements.json";

export interface ExtractionConfig {
  inputPath: string;
  outputPath: string;
  sectionNumberPattern: string;
  sectionMarker: string;
  jsonLayout: JsonLayout;
  summarizer: string;
}

// Raw values from flags or callers; validated together with env and defaults.
export type ExtractionConfigOverrides = Partial<Record<keyof ExtractionConfig, string>>;

const CONFIG_KEYS = [
  "inputPath",
  "outputPath",
  "sectionNumberPattern",
  "sectionMarker",
  "jsonLayout",
  "summarizer",
] as const satisfies readonly (keyof ExtractionConfig)[];

const ENV_KEYS: Record<keyof ExtractionConfig, string> = {
  inputPath: "REGULATIONS_INPUT_FILE",
  outputPath: "REGULATIONS_OUTPUT_FILE",
  sectionNumberPattern: "REGULATIONS_SECTION_PATTERN",
  sectionMarker: "REGULATIONS_SECTION_MARKER",
  jsonLayout: "REGULATIONS_JSON_LAYOUT",
  summarizer: "REGULATIONS_SUMMARIZER",
};

const DEFAULTS: ExtractionConfig = {
  inputPath: DEFAULT_INPUT_FILE,
  outputPath: DEFAULT_OUTPUT_FILE,
  sectionNumberPattern: DEFAULT_SECTION_NUMBER_PATTERN,
  sectionMarker: DEFAULT_SECTION_MARKER,
  jsonLayout: "records",
  summarizer: DEFAULT_SUMMARIZER,
};

export const extractionConfigSchema = z.object({
  inputPath: z.string().trim().min(1, "input path must not be empty"),
  outputPath: z.string().trim().min(1, "output path must not be empty"),
  sectionNumberPattern: z.string().min(1, "section number pattern must not be empty"),
  // The marker is matched literally, surrounding spaces included.
  sectionMarker: z.string().min(1, "section marker must not be empty"),
  jsonLayout: z.string().trim().toLowerCase().pipe(z.enum(JSON_LAYOUTS)),
  summarizer: z.string().trim().min(1, "summarizer must not be empty"),
});

function envValue(env: NodeJS.ProcessEnv | undefined, key: string): string | undefined {
  if (!env) {
    return undefined;
  }

  const raw = env[key];
  return typeof raw === "string" && raw.trim().length > 0 ? raw : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

export function resolveExtractionConfig(
  overrides: ExtractionConfigOverrides = {},
  env: NodeJS.ProcessEnv | undefined = process.env,
): ExtractionConfig {
  const merged: Record<keyof ExtractionConfig, string> = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    merged[key] = overrides[key] ?? envValue(env, ENV_KEYS[key]) ?? DEFAULTS[key];
  }

  const parsed = extractionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ExtractionError("INVALID_CONFIGURATION", `Invalid extraction configuration: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

export function configEnvKey(key: keyof ExtractionConfig): string {
  return ENV_KEYS[key];
}
