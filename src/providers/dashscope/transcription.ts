/**
 * DashScope file transcription client (SenseVoice).
 *
 * The provider only accepts publicly reachable URLs. A job is submitted
 * asynchronously, polled until it reaches a terminal status, and each
 * succeeded sub-result points at a transcript document that is fetched
 * separately.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { z } from "zod";

import {
  ConfigurationError,
  RecognitionError,
  describeError,
} from "../../core/exceptions.js";
import {
  fail,
  succeed,
  type Fetch,
  type Outcome,
  type RecognitionResult,
} from "../../core/types.js";
import { silentLogger, type Logger } from "../../logger.js";
import { createNormalizer, type TagStripOptions } from "../../text/normalizer.js";
import {
  ErrorResponseSchema,
  SubmitResponseSchema,
  TERMINAL_TASK_STATUSES,
  TaskResponseSchema,
  TranscriptDocumentSchema,
  type TaskResponse,
  type TranscriptDocument,
} from "./schemas.js";

export const DEFAULT_BASE_URL = "https://dashscope.aliyuncs.com/api/v1";
export const DEFAULT_MODEL = "sensevoice-v1";

export interface RecognizeOptions extends TagStripOptions {
  /** Language hint; "auto" lets the provider detect it. */
  language?: string;
}

export interface Transcriber {
  recognize(
    fileUrl: string,
    opts?: RecognizeOptions,
  ): Promise<Outcome<RecognitionResult, RecognitionError>>;
}

export interface DashScopeTranscriberOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  pollIntervalMs?: number;
  /** Upper bound on the whole call, every request included. */
  timeoutMs?: number;
  fetch?: Fetch;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function isTerminal(status: string): boolean {
  return TERMINAL_TASK_STATUSES.some((s) => s === status);
}

export class DashScopeTranscriber implements Transcriber {
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private pollIntervalMs: number;
  private timeoutMs: number;
  private fetch: Fetch;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(opts: DashScopeTranscriberOptions) {
    if (!opts.apiKey.trim()) throw new ConfigurationError(["DASHSCOPE_API_KEY"]);
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? DEFAULT_MODEL;
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.pollIntervalMs = opts.pollIntervalMs ?? 2_000;
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.fetch = opts.fetch ?? ((url, init) => fetch(url, init));
    this.logger = opts.logger ?? silentLogger;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
    this.now = opts.now ?? Date.now;
  }

  async recognize(
    fileUrl: string,
    opts: RecognizeOptions = {},
  ): Promise<Outcome<RecognitionResult, RecognitionError>> {
    const language = opts.language ?? "auto";
    const normalize = createNormalizer({
      removeTags: opts.removeTags ?? true,
      stripBrackets: opts.stripBrackets ?? false,
    });

    const deadline = this.now() + this.timeoutMs;
    try {
      this.logger.debug(`Recognizing ${fileUrl} (language: ${language})`);
      const taskId = await this.submit(fileUrl, language, deadline);
      const task = await this.wait(taskId, deadline);
      return succeed(await this.collect(task, normalize, deadline));
    } catch (err) {
      if (err instanceof RecognitionError) return fail(err);
      return fail(new RecognitionError("request_failed", describeError(err)));
    }
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async submit(fileUrl: string, language: string, deadline: number): Promise<string> {
    const res = await this.requestJson(
      `${this.baseUrl}/services/audio/asr/transcription`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-DashScope-Async": "enable" },
        body: JSON.stringify({
          model: this.model,
          input: { file_urls: [fileUrl] },
          parameters: { language_hints: [language] },
        }),
      },
      SubmitResponseSchema,
      deadline,
    );
    this.logger.debug(
      `Task ${res.output.task_id} submitted, status ${res.output.task_status}`,
    );
    return res.output.task_id;
  }

  private async wait(taskId: string, deadline: number): Promise<TaskResponse> {
    for (;;) {
      const task = await this.requestJson(
        `${this.baseUrl}/tasks/${encodeURIComponent(taskId)}`,
        { method: "GET" },
        TaskResponseSchema,
        deadline,
      );
      const status = task.output.task_status;
      if (isTerminal(status)) {
        this.logger.debug(`Task ${taskId} finished with status ${status}`);
        return task;
      }
      if (this.now() >= deadline) {
        throw new RecognitionError(
          "timeout",
          `task ${taskId} still ${status} after ${this.timeoutMs} ms`,
          status,
        );
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  private async collect(
    task: TaskResponse,
    normalize: (text: string) => string,
    deadline: number,
  ): Promise<RecognitionResult> {
    const { task_status: status, results, message } = task.output;
    if (status !== "SUCCEEDED") {
      throw new RecognitionError(
        "job_failed",
        `task status ${status}${message ? `: ${message}` : ""}`,
        status,
      );
    }
    if (!results || results.length === 0) {
      throw new RecognitionError("no_results", "task returned no results");
    }

    const originals: string[] = [];
    const cleaned: string[] = [];
    let details: TranscriptDocument | undefined;

    for (const [idx, item] of results.entries()) {
      if (item.subtask_status !== "SUCCEEDED") {
        const skipped = new RecognitionError(
          "sub_result_failed",
          `sub-result ${idx + 1}: ${item.message ?? "unknown error"}`,
          item.subtask_status,
        );
        this.logger.warn(skipped.message);
        continue;
      }
      if (!item.transcription_url) continue;

      try {
        const doc = await this.fetchTranscript(item.transcription_url, deadline);
        for (const transcript of doc.transcripts ?? []) {
          if (transcript.text === undefined) continue;
          originals.push(transcript.text);
          cleaned.push(normalize(transcript.text));
        }
        if (idx === 0) details = doc;
      } catch (err) {
        if (err instanceof RecognitionError && err.kind === "timeout") throw err;
        const skipped = new RecognitionError(
          "parse_failed",
          `sub-result ${idx + 1}: ${describeError(err)}`,
        );
        this.logger.warn(skipped.message);
      }
    }

    return {
      text: cleaned.join("\n"),
      originalText: originals.join("\n"),
      details,
    };
  }

  private async fetchTranscript(url: string, deadline: number): Promise<TranscriptDocument> {
    this.logger.debug(`Fetching transcript ${url}`);
    const res = await this.send(url, { method: "GET" }, deadline);
    if (!res.ok) throw new Error(`transcript download answered HTTP ${res.status}`);
    const raw: unknown = await res.json().catch((err: unknown) => {
      if (isAbort(err)) throw this.timedOut(url);
      throw err;
    });
    const parsed = TranscriptDocumentSchema.safeParse(raw);
    if (!parsed.success) throw new Error("malformed transcript document");
    return parsed.data;
  }

  private async requestJson<S extends z.ZodTypeAny>(
    url: string,
    init: RequestInit & { headers?: Record<string, string> },
    schema: S,
    deadline: number,
  ): Promise<z.infer<S>> {
    const res = await this.send(
      url,
      { ...init, headers: { ...init.headers, Authorization: `Bearer ${this.apiKey}` } },
      deadline,
    );
    const body: unknown = await res.json().catch((err: unknown) => {
      if (isAbort(err)) throw this.timedOut(url);
      return null;
    });

    if (!res.ok) {
      const err = ErrorResponseSchema.safeParse(body);
      const detail = err.success
        ? [err.data.code, err.data.message].filter(Boolean).join(": ")
        : "";
      throw new RecognitionError(
        "request_failed",
        `HTTP ${res.status}${detail ? ` (${detail})` : ""}`,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RecognitionError("request_failed", `unexpected response from ${url}`);
    }
    return parsed.data;
  }

  /** `fetch` bounded by whatever is left of the call's deadline. */
  private async send(url: string, init: RequestInit, deadline: number): Promise<Response> {
    const remaining = deadline - this.now();
    if (remaining <= 0) throw this.timedOut(url);
    try {
      return await this.fetch(url, { ...init, signal: AbortSignal.timeout(remaining) });
    } catch (err) {
      if (isAbort(err)) throw this.timedOut(url);
      throw err;
    }
  }

  private timedOut(url: string): RecognitionError {
    return new RecognitionError("timeout", `no answer from ${url} within ${this.timeoutMs} ms`);
  }
}
