/**
 * Zod schemas for DashScope file-transcription payloads.
 */
import { z } from "zod";

export const TERMINAL_TASK_STATUSES = [
  "SUCCEEDED",
  "FAILED",
  "CANCELED",
  "UNKNOWN",
] as const;

export const SubmitResponseSchema = z.object({
  request_id: z.string().optional(),
  output: z.object({
    task_id: z.string(),
    task_status: z.string(),
  }),
});

export const SubResultSchema = z.object({
  file_url: z.string().optional(),
  transcription_url: z.string().optional().nullable(),
  subtask_status: z.string(),
  code: z.string().optional(),
  message: z.string().optional(),
});

export const TaskResponseSchema = z.object({
  request_id: z.string().optional(),
  output: z.object({
    task_id: z.string(),
    task_status: z.string(),
    results: z.array(SubResultSchema).optional().nullable(),
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export const TranscriptSchema = z
  .object({
    channel_id: z.number().optional(),
    text: z.string().optional(),
  })
  .passthrough();

export const TranscriptDocumentSchema = z
  .object({
    file_url: z.string().optional(),
    transcripts: z.array(TranscriptSchema).optional().nullable(),
  })
  .passthrough();

export const ErrorResponseSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

export type SubmitResponse = z.infer<typeof SubmitResponseSchema>;
export type SubResult = z.infer<typeof SubResultSchema>;
export type TaskResponse = z.infer<typeof TaskResponseSchema>;
export type TranscriptDocument = z.infer<typeof TranscriptDocumentSchema>;
