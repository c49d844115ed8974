/**
 * snake_case JSON shapes shared by the HTTP bodies and the CLI's saved
 * result files.
 */
import type {
  RecognitionResult,
  UploadResult,
  WorkflowErrorKind,
  WorkflowState,
  WorkflowStep,
  WorkflowResult,
} from "./types.js";

export interface UploadResultJson {
  direct_link: string;
  file_key: string;
  hash: string;
  expires: number;
}

export interface RecognitionResultJson {
  text: string;
  original_text: string;
  details?: unknown;
}

export interface WorkflowResultJson {
  success: boolean;
  state: WorkflowState;
  steps_completed: WorkflowStep[];
  error?: string;
  error_kind?: WorkflowErrorKind;
  audio_file?: string;
  upload_result?: UploadResultJson;
  download_url?: string;
  cloud_file_key?: string;
  recognition_result?: RecognitionResultJson;
  text: string;
  original_text?: string;
  warnings: string[];
}

export function uploadResultJson(result: UploadResult): UploadResultJson {
  return {
    direct_link: result.directLink,
    file_key: result.key,
    hash: result.hash,
    expires: result.expires,
  };
}

export function recognitionResultJson(
  result: RecognitionResult,
): RecognitionResultJson {
  return {
    text: result.text,
    original_text: result.originalText,
    details: result.details,
  };
}

export function workflowResultJson(result: WorkflowResult): WorkflowResultJson {
  const upload = result.uploadResult;
  return {
    success: result.success,
    state: result.state,
    steps_completed: result.stepsCompleted,
    error: result.error,
    error_kind: result.errorKind,
    audio_file: result.audioFile,
    upload_result: upload && uploadResultJson(upload),
    download_url: upload?.directLink,
    cloud_file_key: upload?.key,
    recognition_result:
      result.recognitionResult && recognitionResultJson(result.recognitionResult),
    text: result.text,
    original_text: result.originalText,
    warnings: result.warnings,
  };
}
