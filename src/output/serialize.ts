import type { SectionRecord } from "../extraction/types";
import { recordsToCsv } from "./csv";
import type { JsonLayout, OutputFormat } from "./format";
import { recordsToJson } from "./json";

export interface SerializeOptions {
  format: OutputFormat;
  jsonLayout?: JsonLayout;
}

export function serializeRecords(records: readonly SectionRecord[], options: SerializeOptions): string {
  if (options.format === "csv") {
    return recordsToCsv(records);
  }

  return recordsToJson(records, options.jsonLayout);
}
