/**
 * Workflow request / result types.
 */

/** Tagged result returned by every step-level operation. */
export type Outcome<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** The subset of `fetch` the provider clients call. */
export type Fetch = (url: string, init?: RequestInit) => Promise<Response>;

/** Object-store credentials; every field is required once resolved. */
export interface StorageCredentials {
  accessKey: string;
  secretKey: string;
  bucketName: string;
  bucketDomain: string;
}

export interface RecognitionCredentials {
  apiKey: string;
}

/** Per-request credential overrides, highest precedence during resolution. */
export interface CredentialOverrides {
  storage?: Partial<StorageCredentials>;
  recognition?: Partial<RecognitionCredentials>;
}

export interface WorkflowRequest {
  url: string;
  language?: string;
  keepTags?: boolean;
  /** Lifetime of the signed download link, in seconds. */
  linkExpires?: number;
  cleanup?: boolean;
  outputDir?: string;
  stripBrackets?: boolean;
  credentials?: CredentialOverrides;
}

export interface DownloadedFile {
  path: string;
  /** `newest_file` marks the directory-scan fallback. */
  source: "reported" | "newest_file";
}

export interface UploadResult {
  directLink: string;
  key: string;
  hash: string;
  expires: number;
}

export interface RecognitionResult {
  text: string;
  originalText: string;
  /** Transcript document of the first sub-result. */
  details?: unknown;
}

export type WorkflowStep =
  | "download"
  | "upload"
  | "recognition"
  | "cloud_cleanup"
  | "local_cleanup";

export type WorkflowState =
  | "start"
  | "downloaded"
  | "uploaded"
  | "recognized"
  | "done"
  | "failed";

export type WorkflowErrorKind =
  | "configuration"
  | "download"
  | "upload"
  | "recognition";

export interface WorkflowResult {
  success: boolean;
  state: WorkflowState;
  stepsCompleted: WorkflowStep[];
  error?: string;
  errorKind?: WorkflowErrorKind;
  audioFile?: string;
  uploadResult?: UploadResult;
  recognitionResult?: RecognitionResult;
  text: string;
  originalText?: string;
  /** Non-fatal cleanup problems. */
  warnings: string[];
}
