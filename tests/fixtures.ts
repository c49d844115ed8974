/**
 * Shared test fixtures: temp dirs, credentials, in-process client fakes.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { vi } from "vitest";

import { parseConfig, type ConfigSources, type Env } from "../src/config.js";
import { succeed } from "../src/core/types.js";
import type { ClientFactory } from "../src/core/workflow.js";
import type { Downloader } from "../src/download/ytdlp.js";
import { Audioscribe } from "../src/index.js";
import type { Logger } from "../src/logger.js";
import type { Transcriber } from "../src/providers/dashscope/transcription.js";
import type { ObjectStore } from "../src/storage/backend.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "audioscribe-test-"));
}

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

export const TEST_ENV: Env = {
  QINIU_ACCESS_KEY: "test-access",
  QINIU_SECRET_KEY: "test-secret",
  QINIU_BUCKET_NAME: "test-bucket",
  QINIU_BUCKET_DOMAIN: "s3.test.local",
  DASHSCOPE_API_KEY: "test-api-key",
};

export function makeSources(env: Env = TEST_ENV, raw: unknown = {}): ConfigSources {
  return { config: parseConfig(raw), env };
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(`debug ${m}`),
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`),
  };
}

// ---------------------------------------------------------------------------
// Client fakes
// ---------------------------------------------------------------------------

export const FAKE_KEY = "1700000000_episode.m4a";
export const FAKE_LINK = "https://s3.test.local/test-bucket/1700000000_episode.m4a?X-Amz-Signature=abc";

/**
 * Downloader that writes `episode.m4a` into the requested directory,
 * an object store and a transcriber that always succeed. Override
 * individual calls with `mockResolvedValueOnce` / `mockRejectedValueOnce`.
 */
export function makeFakes() {
  const downloader = {
    download: vi.fn<Downloader["download"]>(async (_url, outputDir) => {
      const dir = resolve(outputDir ?? "downloads_temp");
      mkdirSync(dir, { recursive: true });
      const path = join(dir, "episode.m4a");
      writeFileSync(path, "fake audio");
      return succeed({ path, source: "reported" });
    }),
  } satisfies Downloader;

  const store = {
    bucket: "test-bucket",
    uploadFile: vi.fn<ObjectStore["uploadFile"]>(async (_path, _name, expires = 3600) =>
      succeed({ directLink: FAKE_LINK, key: FAKE_KEY, hash: "etag-1", expires }),
    ),
    deleteObject: vi.fn<ObjectStore["deleteObject"]>(async () => succeed({ status: 204 })),
  } satisfies ObjectStore;

  const transcriber = {
    recognize: vi.fn<Transcriber["recognize"]>(async () =>
      succeed({
        text: "hello world",
        originalText: "<|en|>hello |HAPPY| world",
      }),
    ),
  } satisfies Transcriber;

  const clients = {
    downloader: vi.fn<ClientFactory["downloader"]>(() => downloader),
    objectStore: vi.fn<ClientFactory["objectStore"]>(() => store),
    transcriber: vi.fn<ClientFactory["transcriber"]>(() => transcriber),
  } satisfies ClientFactory;

  return { downloader, store, transcriber, clients };
}

/** Facade wired to the fakes, staging under `dir`. */
export function makeScribe(dir: string, env: Env = TEST_ENV) {
  const fakes = makeFakes();
  const scribe = new Audioscribe({
    config: parseConfig({ download: { outputDir: join(dir, "staging") } }),
    env,
    clients: fakes.clients,
  });
  return { scribe, ...fakes };
}
