export type ExtractionErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_READ_FAILED"
  | "UNSUPPORTED_OUTPUT_FORMAT"
  | "MALFORMED_PATTERN"
  | "NUMBER_PARSE_ERROR"
  | "INVALID_CONFIGURATION";

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionError";
    this.code = code;
  }
}

export function isExtractionError(error: unknown, code?: ExtractionErrorCode): error is ExtractionError {
  if (!(error instanceof ExtractionError)) {
    return false;
  }

  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }

  return "unknown error";
}
