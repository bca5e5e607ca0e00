type ErrorCode =
  | "invalid_reference"
  | "resolution_failure"
  | "no_segments"
  | "acquisition_setup_failed"
  | "assembly_failed"
  | "transcription_failed"
  | "invalid_config";

class DownloadError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DownloadError";
    this.code = code;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toDownloadError(error: unknown, fallback: ErrorCode): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  return new DownloadError(fallback, errorMessage(error), { cause: error });
}

export { DownloadError, errorMessage, toDownloadError };
export type { ErrorCode };
