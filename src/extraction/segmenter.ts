import { ExtractionError } from "./errors";

export const DEFAULT_SECTION_MARKER = "Section";

export function findMarkerOffsets(document: string, marker: string): number[] {
  if (marker.length === 0) {
    throw new ExtractionError("INVALID_CONFIGURATION", "Section marker must be a non-empty string.");
  }

  const offsets: number[] = [];
  let cursor = document.indexOf(marker);

  while (cursor !== -1) {
    offsets.push(cursor);
    cursor = document.indexOf(marker, cursor + marker.length);
  }

  return offsets;
}

/**
 * Splits a document into marker-delimited spans. Each span starts at a marker
 * occurrence (marker included) and runs up to the next occurrence or the end of
 * the document. Text before the first marker belongs to no span.
 *
 * Matching is a case-sensitive substring search, so a marker embedded in a
 * longer word ("CrossSection") also starts a span.
 */
export function segment(document: string, marker: string = DEFAULT_SECTION_MARKER): string[] {
  const offsets = findMarkerOffsets(document, marker);

  return offsets.map((start, index) => {
    const end = offsets[index + 1] ?? document.length;
    return document.slice(start, end);
  });
}
