import type { Summarizer } from "./types";

// Letters, digits, underscore, whitespace and the punctuation kept by the normalizer.
const DISALLOWED_CHARACTERS = /[^\p{L}\p{N}_\s.,!@#$%^&*()=+~`-]/gu;
const LINE_BREAKS = /[\r\n]/g;
const WHITESPACE_RUNS = /\s+/g;

export function normalizeSectionText(sectionText: string): string {
  return sectionText
    .replace(DISALLOWED_CHARACTERS, " ")
    .replace(LINE_BREAKS, " ")
    .replace(WHITESPACE_RUNS, " ")
    .trim();
}

/**
 * Stand-in for an external summarization call: normalizes the text and returns
 * its words in reverse order.
 */
export function summarize(sectionText: string): string {
  const normalized = normalizeSectionText(sectionText);
  if (normalized.length === 0) {
    return "";
  }

  return normalized.split(" ").reverse().join(" ");
}

export const placeholderSummarizer: Summarizer = {
  name: "placeholder",
  summarize,
};
