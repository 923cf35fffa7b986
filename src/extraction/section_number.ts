import { ExtractionError } from "./errors";

export const DEFAULT_SECTION_NUMBER_PATTERN = "Section (\\d{1,2})";

const DECIMAL_DIGITS = /^[0-9]+$/;

const captureGroupCounts = new WeakMap<RegExp, number>();

export function countCaptureGroups(pattern: RegExp): number {
  const cached = captureGroupCounts.get(pattern);
  if (cached !== undefined) {
    return cached;
  }

  // An alternation with the empty string always matches, exposing every group slot.
  const probe = new RegExp(`${pattern.source}|`, pattern.flags.replace(/[gy]/g, ""));
  const match = probe.exec("");
  const count = match ? match.length - 1 : 0;
  captureGroupCounts.set(pattern, count);
  return count;
}

export function compileSectionNumberPattern(source: string): RegExp {
  if (source.trim().length === 0) {
    throw new ExtractionError("MALFORMED_PATTERN", "Section number pattern must not be empty.");
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (error) {
    throw new ExtractionError("MALFORMED_PATTERN", `Section number pattern is not a valid regular expression: ${source}`, {
      cause: error,
    });
  }

  assertSingleCaptureGroup(pattern);
  return pattern;
}

function assertSingleCaptureGroup(pattern: RegExp): void {
  const groups = countCaptureGroups(pattern);
  if (groups !== 1) {
    throw new ExtractionError(
      "MALFORMED_PATTERN",
      `Section number pattern must contain exactly one capturing group, found ${groups}: ${pattern.source}`,
    );
  }
}

/**
 * Returns the number captured by the first match of `pattern` in `sectionText`,
 * or null when the pattern does not match or its group captured nothing.
 *
 * @throws ExtractionError MALFORMED_PATTERN when the pattern has no single capture group,
 * NUMBER_PARSE_ERROR when the captured text is not a run of decimal digits or exceeds the safe integer range.
 */
export function extractSectionNumber(sectionText: string, pattern: RegExp): number | null {
  assertSingleCaptureGroup(pattern);

  // Stateful flags would make lastIndex leak between sections.
  const matcher = pattern.global || pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "")) : pattern;
  const captured = matcher.exec(sectionText)?.[1];

  if (captured === undefined || captured.length === 0) {
    return null;
  }

  if (!DECIMAL_DIGITS.test(captured)) {
    throw new ExtractionError("NUMBER_PARSE_ERROR", `Captured section number "${captured}" is not a decimal integer.`);
  }

  const value = Number.parseInt(captured, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ExtractionError("NUMBER_PARSE_ERROR", `Captured section number "${captured}" is too large to represent exactly.`);
  }

  return value;
}
