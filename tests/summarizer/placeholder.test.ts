import { describe, expect, it } from "vitest";

import { normalizeSectionText, placeholderSummarizer, summarize } from "../../src/summarizer/placeholder";
import { resolveSummarizer, summarizerOptions } from "../../src/summarizer/registry";
import { thrownBy } from "../helpers/errors";

describe("summarizer/placeholder", () => {
  it("reverses word order after normalizing whitespace", () => {
    expect(summarize("Section 1. Widgets must comply.\n")).toBe("comply. must Widgets 1. Section");
    expect(summarize("one\r\ntwo\t\tthree")).toBe("three two one");
  });

  it("returns an empty string for empty or blank input", () => {
    expect(summarize("")).toBe("");
    expect(summarize("  \n\t ")).toBe("");
  });

  it("returns a single normalized word unchanged", () => {
    expect(summarize("word")).toBe("word");
  });

  it("replaces unsupported symbols with spaces", () => {
    expect(normalizeSectionText("Fees: $5 / month; see §3")).toBe("Fees $5 month see 3");
    expect(summarize("Fees: $5 / month; see §3")).toBe("3 see month $5 Fees");
  });

  it("keeps underscores, non-ASCII letters and the allowed punctuation", () => {
    expect(summarize("Règle_1 für Bürger")).toBe("Bürger für Règle_1");
    expect(summarize("a-b (c) x=y+z ~w `q`")).toBe("`q` ~w x=y+z (c) a-b");
  });

  it("is deterministic and restores word order when applied twice", () => {
    const text = "Section 2. Gadgets: are exempt!";

    expect(summarize(text)).toBe(summarize(text));
    expect(summarize(summarize(text))).toBe("Section 2. Gadgets are exempt!");
    expect(summarize(summarize(text))).not.toBe(text);
  });
});

describe("summarizer/registry", () => {
  it("resolves the placeholder summarizer by name", () => {
    expect(resolveSummarizer()).toBe(placeholderSummarizer);
    expect(resolveSummarizer(" Placeholder ")).toBe(placeholderSummarizer);
    expect(summarizerOptions()).toEqual(["placeholder"]);
  });

  it("rejects unknown summarizers", () => {
    expect(thrownBy(() => resolveSummarizer("gpt"))).toMatchObject({
      code: "INVALID_CONFIGURATION",
      message: 'Unknown summarizer "gpt". Available: placeholder.',
    });
  });
});
