import { describe, expect, it } from "vitest";

import { findMarkerOffsets, segment } from "../../src/extraction/segmenter";
import { thrownBy } from "../helpers/errors";

const EXAMPLE = "Section 1. Widgets must comply.\nSection 2. Gadgets are exempt.";

describe("extraction/segmenter", () => {
  it("returns no spans for an empty document or one without the marker", () => {
    expect(segment("", "Section")).toEqual([]);
    expect(segment("Article 1. Nothing to see.", "Section")).toEqual([]);
  });

  it("splits at each marker and keeps the marker at the start of its span", () => {
    expect(segment(EXAMPLE, "Section")).toEqual(["Section 1. Widgets must comply.\n", "Section 2. Gadgets are exempt."]);
  });

  it("drops text before the first marker and reconstructs the rest exactly", () => {
    const document = "Preamble text.\nSection 1 first\n\nSection 2 second\nSection 3 third\n";
    const spans = segment(document, "Section");

    expect(spans).toHaveLength(3);
    expect(spans.join("")).toBe(document.slice(document.indexOf("Section")));
    expect(spans[2]).toBe("Section 3 third\n");
  });

  it("treats a marker embedded in another word as a delimiter", () => {
    expect(segment("Section 1 rules. CrossSection 4 applies.", "Section")).toEqual([
      "Section 1 rules. Cross",
      "Section 4 applies.",
    ]);
  });

  it("matches the marker case-sensitively", () => {
    expect(segment("section 1 lower case only", "Section")).toEqual([]);
  });

  it("finds non-overlapping occurrences", () => {
    expect(findMarkerOffsets("aaaa", "aa")).toEqual([0, 2]);
    expect(segment("aaa", "aa")).toEqual(["aaa"]);
    expect(findMarkerOffsets("Section 1\nSection 2", "Section")).toEqual([0, 10]);
  });

  it("supports custom markers", () => {
    expect(segment("Article 1 x Article 2 y", "Article")).toEqual(["Article 1 x ", "Article 2 y"]);
  });

  it("rejects an empty marker", () => {
    expect(thrownBy(() => segment(EXAMPLE, ""))).toMatchObject({ code: "INVALID_CONFIGURATION" });
  });
});
