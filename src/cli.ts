import "dotenv/config";

import {
  configEnvKey,
  DEFAULT_INPUT_FILE,
  DEFAULT_OUTPUT_FILE,
  type ExtractionConfigOverrides,
  resolveExtractionConfig,
} from "./config/extraction_config";
import { isExtractionError } from "./extraction/errors";
import { formatExtractionReport } from "./extraction/report";
import { runExtraction } from "./extraction/run";
import type { ExtractionDiagnostic } from "./extraction/types";
import { JSON_LAYOUTS } from "./output/format";

interface CliArgs extends ExtractionConfigOverrides {
  help?: boolean;
}

const FLAG_TO_KEY = new Map<string, keyof ExtractionConfigOverrides>([
  ["--input", "inputPath"],
  ["--output", "outputPath"],
  ["--pattern", "sectionNumberPattern"],
  ["--marker", "sectionMarker"],
  ["--json-layout", "jsonLayout"],
  ["--summarizer", "summarizer"],
]);

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];

    if (current === "--help" || current === "-h") {
      args.help = true;
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined) {
      continue;
    }

    const key = FLAG_TO_KEY.get(current);
    if (key) {
      args[key] = next;
      i += 1;
    }
  }

  return args;
}

function usage(): string {
  return [
    "Usage: npm run extract -- [--input <file>] [--output <file.json|file.csv>] [options]",
    `  --input        Regulations text file (default ${DEFAULT_INPUT_FILE}, env ${configEnvKey("inputPath")})`,
    `  --output       Output file, .json or .csv (default ${DEFAULT_OUTPUT_FILE}, env ${configEnvKey("outputPath")})`,
    `  --pattern      Section number regex with one capture group (env ${configEnvKey("sectionNumberPattern")})`,
    `  --marker       Literal keyword starting each section (env ${configEnvKey("sectionMarker")})`,
    `  --json-layout  ${JSON_LAYOUTS.join(" | ")} (env ${configEnvKey("jsonLayout")})`,
    `  --summarizer   Summarizer backend (env ${configEnvKey("summarizer")})`,
  ].join("\n");
}

function logDiagnostic(diagnostic: ExtractionDiagnostic): void {
  if (diagnostic.severity === "warning") {
    console.warn(`[extract] ${diagnostic.detail}`);
    return;
  }

  console.info(`[extract] ${diagnostic.detail}`);
}

async function main(): Promise<void> {
  const { help, ...overrides } = parseArgs(process.argv.slice(2));

  if (help) {
    console.log(usage());
    return;
  }

  const config = resolveExtractionConfig(overrides);
  console.info(`[extract] reading ${config.inputPath}`);

  const run = await runExtraction(config, { onDiagnostic: logDiagnostic });
  console.log(formatExtractionReport(run));
}

main().catch((error) => {
  if (isExtractionError(error)) {
    console.error(`[extract] ${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
