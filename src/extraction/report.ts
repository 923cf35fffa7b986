import type { ExtractionRun } from "./run";

export function formatExtractionReport(run: ExtractionRun): string {
  const { summary } = run;
  const status = summary.sections === 0 ? "EMPTY" : summary.warnings > 0 ? "WARN" : "OK";
  const lines: string[] = [
    `Section extraction (${status})`,
    `Input: ${run.inputPath}`,
    `Output: ${run.outputPath} (${run.format})`,
    `Sections: ${summary.sections} | Numbered: ${summary.numbered} | Unnumbered: ${summary.unnumbered} | Warnings: ${summary.warnings}`,
  ];

  const warnings = run.diagnostics.filter((diagnostic) => diagnostic.severity === "warning");
  if (warnings.length === 0) {
    return lines.join("\n");
  }

  lines.push("");
  for (const warning of warnings) {
    lines.push(`[WARNING] ${warning.code} ${warning.detail}`);
  }

  return lines.join("\n");
}
