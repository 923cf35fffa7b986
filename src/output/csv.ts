import { SECTION_RECORD_COLUMNS, type SectionRecord } from "../extraction/types";

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }

  return `"${value.replace(/"/g, '""')}"`;
}

export function recordsToCsv(records: readonly SectionRecord[]): string {
  const header = SECTION_RECORD_COLUMNS.join(",");
  const rows = records.map((record) =>
    [
      record.section_number === null ? "" : String(record.section_number),
      record.original_text,
      record.summarized_requirements,
    ]
      .map(escapeCsvField)
      .join(","),
  );

  return [header, ...rows].map((line) => `${line}\n`).join("");
}
