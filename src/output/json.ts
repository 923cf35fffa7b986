import { SECTION_RECORD_COLUMNS, type SectionRecord } from "../extraction/types";
import type { JsonLayout } from "./format";

type ColumnValue = SectionRecord[(typeof SECTION_RECORD_COLUMNS)[number]];

function toColumns(records: readonly SectionRecord[]): Record<string, Record<string, ColumnValue>> {
  const columns: Record<string, Record<string, ColumnValue>> = {};

  for (const column of SECTION_RECORD_COLUMNS) {
    const cells: Record<string, ColumnValue> = {};
    records.forEach((record, index) => {
      cells[String(index)] = record[column];
    });
    columns[column] = cells;
  }

  return columns;
}

function toRecords(records: readonly SectionRecord[]): SectionRecord[] {
  return records.map((record) => ({
    section_number: record.section_number,
    original_text: record.original_text,
    summarized_requirements: record.summarized_requirements,
  }));
}

export function recordsToJson(records: readonly SectionRecord[], layout: JsonLayout = "records"): string {
  const payload = layout === "columns" ? toColumns(records) : toRecords(records);
  return `${JSON.stringify(payload, null, 2)}\n`;
}
