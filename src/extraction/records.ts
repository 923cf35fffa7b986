import { placeholderSummarizer } from "../summarizer/placeholder";
import { isExtractionError } from "./errors";
import { extractSectionNumber } from "./section_number";
import { segment } from "./segmenter";
import type {
  BuildRecordsOptions,
  ExtractionDiagnostic,
  ExtractionDiagnosticCode,
  ExtractionDiagnosticSeverity,
  ExtractionResult,
  SectionRecord,
} from "./types";

function buildDiagnostic(
  code: ExtractionDiagnosticCode,
  severity: ExtractionDiagnosticSeverity,
  detail: string,
  sectionIndex?: number,
): ExtractionDiagnostic {
  return sectionIndex === undefined ? { code, severity, detail } : { code, severity, detail, section_index: sectionIndex };
}

function resolveSectionNumber(
  sectionText: string,
  sectionIndex: number,
  numberPattern: RegExp,
  report: (diagnostic: ExtractionDiagnostic) => void,
): number | null {
  try {
    const sectionNumber = extractSectionNumber(sectionText, numberPattern);
    if (sectionNumber === null) {
      report(
        buildDiagnostic(
          "SECTION_NUMBER_NOT_FOUND",
          "warning",
          `Section ${sectionIndex + 1}: number was not extracted. Check the section number pattern /${numberPattern.source}/.`,
          sectionIndex,
        ),
      );
    }
    return sectionNumber;
  } catch (error) {
    if (!isExtractionError(error, "NUMBER_PARSE_ERROR")) {
      throw error;
    }

    report(buildDiagnostic("SECTION_NUMBER_UNPARSEABLE", "warning", `Section ${sectionIndex + 1}: ${error.message}`, sectionIndex));
    return null;
  }
}

export function buildRecords(
  document: string,
  marker: string,
  numberPattern: RegExp,
  options: BuildRecordsOptions = {},
): ExtractionResult {
  const summarizer = options.summarizer ?? placeholderSummarizer;
  const diagnostics: ExtractionDiagnostic[] = [];
  const report = (diagnostic: ExtractionDiagnostic): void => {
    diagnostics.push(diagnostic);
    options.onDiagnostic?.(diagnostic);
  };

  const spans = segment(document, marker);
  if (spans.length === 0) {
    report(buildDiagnostic("NO_SECTIONS_FOUND", "warning", `No sections were extracted: marker "${marker}" does not occur in the document.`));
  } else {
    report(buildDiagnostic("SECTIONS_EXTRACTED", "info", `${spans.length} sections were extracted.`));
  }

  const records = spans.map(
    (span, index): SectionRecord => ({
      section_number: resolveSectionNumber(span, index, numberPattern, report),
      original_text: span,
      summarized_requirements: summarizer.summarize(span),
    }),
  );

  const numbered = records.filter((record) => record.section_number !== null).length;

  return {
    records,
    diagnostics,
    summary: {
      sections: records.length,
      numbered,
      unnumbered: records.length - numbered,
      warnings: diagnostics.filter((diagnostic) => diagnostic.severity === "warning").length,
    },
  };
}
