import type { Summarizer } from "../summarizer/types";

export interface SectionRecord {
  readonly section_number: number | null;
  readonly original_text: string;
  readonly summarized_requirements: string;
}

export const SECTION_RECORD_COLUMNS = ["section_number", "original_text", "summarized_requirements"] as const;

export type ExtractionDiagnosticCode =
  | "SECTIONS_EXTRACTED"
  | "NO_SECTIONS_FOUND"
  | "SECTION_NUMBER_NOT_FOUND"
  | "SECTION_NUMBER_UNPARSEABLE";

export type ExtractionDiagnosticSeverity = "info" | "warning";

export interface ExtractionDiagnostic {
  code: ExtractionDiagnosticCode;
  severity: ExtractionDiagnosticSeverity;
  detail: string;
  section_index?: number;
}

export interface ExtractionSummary {
  sections: number;
  numbered: number;
  unnumbered: number;
  warnings: number;
}

export interface ExtractionResult {
  records: SectionRecord[];
  diagnostics: ExtractionDiagnostic[];
  summary: ExtractionSummary;
}

export interface BuildRecordsOptions {
  summarizer?: Summarizer;
  onDiagnostic?: (diagnostic: ExtractionDiagnostic) => void;
}
