/**
 * Unit tests for the DashScope transcription client against a faked API.
 */
import { describe, test, expect, vi } from "vitest";

import { ConfigurationError } from "../src/core/exceptions.js";
import type { Fetch } from "../src/core/types.js";
import { DashScopeTranscriber } from "../src/providers/dashscope/transcription.js";
import { recordingLogger } from "./fixtures.js";

const BASE = "https://dashscope.test/api/v1";
const SUBMIT_URL = `${BASE}/services/audio/asr/transcription`;
const AUDIO_URL = "https://s3.test.local/test-bucket/1700000000_talk.m4a?sig=1";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function task(status: string, results?: unknown[], message?: string) {
  return { request_id: "req-1", output: { task_id: "task-1", task_status: status, results, message } };
}

function succeededResult(n: number) {
  return {
    file_url: AUDIO_URL,
    transcription_url: `https://result.test/${n}.json`,
    subtask_status: "SUCCEEDED",
  };
}

/**
 * Fake API: the submit call answers PENDING, task polls answer `polls` in
 * order (the last one repeats), transcript URLs answer from `documents`.
 */
function fakeApi(opts: {
  polls: unknown[];
  documents?: Record<string, Response | (() => Response)>;
  submit?: () => Response;
}) {
  let poll = 0;
  return vi.fn<Fetch>(async (url) => {
    if (url === SUBMIT_URL) return opts.submit?.() ?? json(task("PENDING"));
    if (url === `${BASE}/tasks/task-1`) {
      const body = opts.polls[Math.min(poll, opts.polls.length - 1)];
      poll++;
      return json(body);
    }
    const doc = opts.documents?.[url];
    if (doc) return typeof doc === "function" ? doc() : doc;
    return new Response("not found", { status: 404 });
  });
}

/** A response that never arrives; only the abort signal ends it. */
function stalled(init?: RequestInit): Promise<Response> {
  const signal = init?.signal;
  return new Promise<Response>((_resolve, reject) => {
    if (signal) signal.addEventListener("abort", () => reject(signal.reason));
  });
}

function makeTranscriber(fetch: Fetch, extra: { timeoutMs?: number; now?: () => number } = {}) {
  const logger = recordingLogger();
  const transcriber = new DashScopeTranscriber({
    apiKey: "test-api-key",
    baseUrl: `${BASE}/`,
    pollIntervalMs: 0,
    sleep: async () => {},
    fetch,
    logger,
    ...extra,
  });
  return { transcriber, logger };
}

describe("DashScopeTranscriber", () => {
  test("blank API key is a configuration error", () => {
    expect(() => new DashScopeTranscriber({ apiKey: " " })).toThrow(ConfigurationError);
  });

  test("submits, polls and joins cleaned segments", async () => {
    const fetch = fakeApi({
      polls: [task("RUNNING"), task("SUCCEEDED", [succeededResult(1)])],
      documents: {
        "https://result.test/1.json": json({
          file_url: AUDIO_URL,
          transcripts: [
            { channel_id: 0, text: "<|en|>hello |HAPPY| world" },
            { channel_id: 1, text: "|Applause|second|/Applause| line" },
          ],
        }),
      },
    });
    const { transcriber } = makeTranscriber(fetch);
    const res = await transcriber.recognize(AUDIO_URL, { language: "en" });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.text).toBe("hello world\nsecond line");
    expect(res.value.originalText).toBe(
      "<|en|>hello |HAPPY| world\n|Applause|second|/Applause| line",
    );
    expect(res.value.details).toMatchObject({ file_url: AUDIO_URL });

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(SUBMIT_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer test-api-key",
      "X-DashScope-Async": "enable",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "sensevoice-v1",
      input: { file_urls: [AUDIO_URL] },
      parameters: { language_hints: ["en"] },
    });
    // submit, two polls, one transcript download
    expect(fetch).toHaveBeenCalledTimes(4);
  });

  test("language defaults to auto and tags can be kept", async () => {
    const fetch = fakeApi({
      polls: [task("SUCCEEDED", [succeededResult(1)])],
      documents: { "https://result.test/1.json": json({ transcripts: [{ text: "|SAD|fine" }] }) },
    });
    const { transcriber } = makeTranscriber(fetch);
    const res = await transcriber.recognize(AUDIO_URL, { removeTags: false });

    expect(res).toMatchObject({ ok: true, value: { text: "|SAD|fine", originalText: "|SAD|fine" } });
    const body = JSON.parse(String(fetch.mock.calls[0][1]?.body));
    expect(body.parameters.language_hints).toEqual(["auto"]);
  });

  test("failed task carries the status", async () => {
    const fetch = fakeApi({ polls: [task("FAILED", undefined, "file unreachable")] });
    const { transcriber } = makeTranscriber(fetch);
    const res = await transcriber.recognize(AUDIO_URL);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("job_failed");
    expect(res.error.status).toBe("FAILED");
    expect(res.error.message).toBe(
      "Recognition failed (job_failed): task status FAILED: file unreachable",
    );
  });

  test("no results", async () => {
    const fetch = fakeApi({ polls: [task("SUCCEEDED", [])] });
    const res = await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.kind).toBe("no_results");
  });

  test("failed sub-results are skipped and logged", async () => {
    const fetch = fakeApi({
      polls: [
        task("SUCCEEDED", [
          { file_url: AUDIO_URL, subtask_status: "FAILED", message: "decode error" },
          succeededResult(2),
        ]),
      ],
      documents: { "https://result.test/2.json": json({ transcripts: [{ text: "survivor" }] }) },
    });
    const { transcriber, logger } = makeTranscriber(fetch);
    const res = await transcriber.recognize(AUDIO_URL);

    expect(res).toMatchObject({ ok: true, value: { text: "survivor", originalText: "survivor" } });
    if (res.ok) expect(res.value.details).toBeUndefined();
    expect(logger.lines).toContain(
      "warn Recognition failed (sub_result_failed): sub-result 1: decode error",
    );
  });

  test("only failed sub-results give empty text, still a success", async () => {
    const fetch = fakeApi({
      polls: [task("SUCCEEDED", [{ subtask_status: "FAILED" }])],
    });
    const res = await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(res).toEqual({ ok: true, value: { text: "", originalText: "", details: undefined } });
  });

  test("unreadable transcript documents are skipped", async () => {
    const fetch = fakeApi({
      polls: [task("SUCCEEDED", [succeededResult(1), succeededResult(2)])],
      documents: {
        "https://result.test/1.json": () => new Response("<html>", { status: 200 }),
        "https://result.test/2.json": json({ transcripts: [{ text: "second" }] }),
      },
    });
    const { transcriber, logger } = makeTranscriber(fetch);
    const res = await transcriber.recognize(AUDIO_URL);

    expect(res).toMatchObject({ ok: true, value: { text: "second" } });
    expect(logger.lines.some((l) => l.startsWith("warn Recognition failed (parse_failed): sub-result 1:"))).toBe(true);
  });

  test("HTTP errors on submit are request failures", async () => {
    const fetch = fakeApi({
      polls: [],
      submit: () => json({ code: "InvalidApiKey", message: "Invalid API-key provided." }, 401),
    });
    const res = await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("request_failed");
      expect(res.error.message).toBe(
        "Recognition failed (request_failed): HTTP 401 (InvalidApiKey: Invalid API-key provided.)",
      );
    }
  });

  test("malformed submit response", async () => {
    const fetch = fakeApi({ polls: [], submit: () => json({ unexpected: true }) });
    const res = await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.message).toBe(
        `Recognition failed (request_failed): unexpected response from ${SUBMIT_URL}`,
      );
    }
  });

  test("gives up after the timeout", async () => {
    let clock = 0;
    const fetch = fakeApi({ polls: [task("RUNNING")] });
    const { transcriber } = makeTranscriber(fetch, {
      timeoutMs: 5_000,
      now: () => {
        clock += 2_000;
        return clock;
      },
    });
    const res = await transcriber.recognize(AUDIO_URL);

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("timeout");
      expect(res.error.message).toBe(
        "Recognition failed (timeout): task task-1 still RUNNING after 5000 ms",
      );
    }
  });

  test("a stalled request is cut off at the deadline", async () => {
    let polls = 0;
    const fetch = vi.fn<Fetch>((url, init) => {
      if (url === SUBMIT_URL) return Promise.resolve(json(task("PENDING")));
      polls++;
      return stalled(init);
    });
    const { transcriber } = makeTranscriber(fetch, { timeoutMs: 200 });
    const res = await transcriber.recognize(AUDIO_URL);

    expect(polls).toBe(1);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.kind).toBe("timeout");
      expect(res.error.message).toBe(
        `Recognition failed (timeout): no answer from ${BASE}/tasks/task-1 within 200 ms`,
      );
    }
  });

  test("a stalled transcript download is a timeout, not a skipped result", async () => {
    const fetch = vi.fn<Fetch>((url, init) => {
      if (url === SUBMIT_URL) return Promise.resolve(json(task("PENDING")));
      if (url === `${BASE}/tasks/task-1`) {
        return Promise.resolve(json(task("SUCCEEDED", [succeededResult(1)])));
      }
      return stalled(init);
    });
    const res = await makeTranscriber(fetch, { timeoutMs: 200 }).transcriber.recognize(AUDIO_URL);
    expect(res).toMatchObject({ ok: false, error: { kind: "timeout" } });
  });

  test("every request carries an abort signal", async () => {
    const fetch = fakeApi({
      polls: [task("SUCCEEDED", [succeededResult(1)])],
      documents: { "https://result.test/1.json": json({ transcripts: [{ text: "ok" }] }) },
    });
    await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(fetch).toHaveBeenCalledTimes(3);
    for (const [, init] of fetch.mock.calls) {
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    }
  });

  test("network errors are request failures", async () => {
    const fetch = vi.fn<Fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const res = await makeTranscriber(fetch).transcriber.recognize(AUDIO_URL);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe("Recognition failed (request_failed): fetch failed");
  });
});
