import { ExtractionError } from "../extraction/errors";
import { placeholderSummarizer } from "./placeholder";
import type { Summarizer } from "./types";

export const DEFAULT_SUMMARIZER = placeholderSummarizer.name;

const SUMMARIZERS = new Map<string, Summarizer>([[placeholderSummarizer.name, placeholderSummarizer]]);

export function summarizerOptions(): string[] {
  return [...SUMMARIZERS.keys()];
}

export function resolveSummarizer(name: string = DEFAULT_SUMMARIZER): Summarizer {
  const normalized = name.trim().toLowerCase();
  const summarizer = SUMMARIZERS.get(normalized);
  if (summarizer) {
    return summarizer;
  }

  throw new ExtractionError(
    "INVALID_CONFIGURATION",
    `Unknown summarizer "${name}". Available: ${summarizerOptions().join(", ")}.`,
  );
}
