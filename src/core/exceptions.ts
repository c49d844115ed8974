/**
 * Error taxonomy for the transcription workflow.
 *
 * Only ConfigurationError is thrown across component boundaries; the others
 * travel inside an Outcome and end up in the workflow result.
 */

export class ConfigurationError extends Error {
  missing: string[];

  constructor(missing: string[], message?: string) {
    super(
      message ??
        `Incomplete configuration, missing: ${missing.join(", ")}`,
    );
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

export class DownloadError extends Error {
  constructor(message?: string) {
    super(message ? `Download failed: ${message}` : "Download failed");
    this.name = "DownloadError";
  }
}

export class UploadError extends Error {
  /** The local file to upload does not exist. */
  fileNotFound: boolean;

  constructor(message?: string, opts: { fileNotFound?: boolean } = {}) {
    super(message ? `Upload failed: ${message}` : "Upload failed");
    this.name = "UploadError";
    this.fileNotFound = opts.fileNotFound ?? false;
  }
}

export type RecognitionErrorKind =
  | "job_failed"
  | "no_results"
  | "sub_result_failed"
  | "parse_failed"
  | "request_failed"
  | "timeout";

export class RecognitionError extends Error {
  kind: RecognitionErrorKind;
  /** Provider task status, when the provider reported one. */
  status?: string;

  constructor(kind: RecognitionErrorKind, message: string, status?: string) {
    super(`Recognition failed (${kind}): ${message}`);
    this.name = "RecognitionError";
    this.kind = kind;
    this.status = status;
  }
}

export type CleanupTarget = "cloud" | "local";

export class CleanupWarning extends Error {
  target: CleanupTarget;

  constructor(target: CleanupTarget, message: string) {
    super(`${target === "cloud" ? "Cloud" : "Local"} cleanup failed: ${message}`);
    this.name = "CleanupWarning";
    this.target = target;
  }
}

/** Render anything caught in a `catch` as a one-line message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
