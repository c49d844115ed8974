/**
 * Configuration validation and credential resolution.
 *
 * Every credential is resolved with the same precedence:
 * explicit value > environment variable > configuration file.
 * Whatever is still missing after that raises a ConfigurationError.
 */
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";

import { ConfigurationError, describeError } from "./core/exceptions.js";
import type {
  Fetch,
  RecognitionCredentials,
  StorageCredentials,
} from "./core/types.js";
import type { ClientFactory } from "./core/workflow.js";
import { YtDlpDownloader } from "./download/ytdlp.js";
import { DashScopeTranscriber } from "./providers/dashscope/transcription.js";
import { S3ObjectStore } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  accessKey: z.string().optional(),
  secretKey: z.string().optional(),
  bucketName: z.string().optional(),
  bucketDomain: z.string().optional(),
  region: z.string().default("cn-east-1"),
});

const RecognitionConfigSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().default("sensevoice-v1"),
  baseUrl: z.string().url().default("https://dashscope.aliyuncs.com/api/v1"),
  pollIntervalMs: z.number().int().nonnegative().default(2_000),
  timeoutMs: z.number().int().positive().default(600_000),
});

const DownloadConfigSchema = z.object({
  outputDir: z.string().default("downloads_temp"),
  command: z.string().default("yt-dlp"),
  timeoutMs: z.number().int().positive().default(600_000),
});

const ServerConfigSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.number().int().positive().default(8000),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  recognition: RecognitionConfigSchema.default({}),
  download: DownloadConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_FILE = "audioscribe.config.json";

/** Environment variable names, keyed by the credential they provide. */
export const STORAGE_ENV = {
  accessKey: "QINIU_ACCESS_KEY",
  secretKey: "QINIU_SECRET_KEY",
  bucketName: "QINIU_BUCKET_NAME",
  bucketDomain: "QINIU_BUCKET_DOMAIN",
} as const satisfies Record<keyof StorageCredentials, string>;

const STORAGE_FIELDS: (keyof StorageCredentials)[] = [
  "accessKey",
  "secretKey",
  "bucketName",
  "bucketDomain",
];

export const RECOGNITION_ENV = ["DASHSCOPE_API_KEY", "ALIYUN_API_KEY"] as const;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError([], `Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load the configuration file named by `path`, `AUDIOSCRIBE_CONFIG`, or
 * `./audioscribe.config.json`. A missing file yields the defaults.
 */
export function loadConfig(
  opts: { path?: string; env?: Env } = {},
): Config {
  const env = opts.env ?? process.env;
  const file = resolve(opts.path ?? env.AUDIOSCRIBE_CONFIG ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(file)) return parseConfig({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      [],
      `Cannot read configuration file ${file}: ${describeError(err)}`,
    );
  }
  return parseConfig(raw);
}

// ---------------------------------------------------------------------------
// Credential resolution
// ---------------------------------------------------------------------------

export interface ConfigSources {
  config: Config;
  env: Env;
}

function firstPresent(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export function resolveStorageCredentials(
  explicit: Partial<StorageCredentials> | undefined,
  sources: ConfigSources,
): StorageCredentials {
  const { config, env } = sources;
  const pick = (field: keyof StorageCredentials) =>
    firstPresent(explicit?.[field], env[STORAGE_ENV[field]], config.storage[field]);

  const accessKey = pick("accessKey");
  const secretKey = pick("secretKey");
  const bucketName = pick("bucketName");
  const bucketDomain = pick("bucketDomain");

  if (!accessKey || !secretKey || !bucketName || !bucketDomain) {
    const missing = STORAGE_FIELDS
      .filter((field) => !pick(field))
      .map((field) => STORAGE_ENV[field]);
    throw new ConfigurationError(missing);
  }
  return { accessKey, secretKey, bucketName, bucketDomain };
}

export function resolveRecognitionCredentials(
  explicit: Partial<RecognitionCredentials> | undefined,
  sources: ConfigSources,
): RecognitionCredentials {
  const apiKey = firstPresent(
    explicit?.apiKey,
    ...RECOGNITION_ENV.map((name) => sources.env[name]),
    sources.config.recognition.apiKey,
  );
  if (!apiKey) throw new ConfigurationError([RECOGNITION_ENV[0]]);
  return { apiKey };
}

export function resolveStorageRegion(sources: ConfigSources): string {
  return firstPresent(sources.env.QINIU_REGION) ?? sources.config.storage.region;
}

export function resolveServerAddress(sources: ConfigSources): {
  host: string;
  port: number;
} {
  const port = Number.parseInt(sources.env.API_PORT ?? "", 10);
  return {
    host: firstPresent(sources.env.API_HOST) ?? sources.config.server.host,
    port: Number.isInteger(port) && port > 0 ? port : sources.config.server.port,
  };
}

/** Which credentials are available, without revealing their values. */
export function describeConfiguration(
  sources: ConfigSources,
): { name: string; configured: boolean }[] {
  const { config, env } = sources;
  const rows: { name: string; configured: boolean }[] = STORAGE_FIELDS.map((field) => ({
    name: STORAGE_ENV[field],
    configured: Boolean(firstPresent(env[STORAGE_ENV[field]], config.storage[field])),
  }));
  rows.push({
    name: RECOGNITION_ENV[0],
    configured: Boolean(
      firstPresent(...RECOGNITION_ENV.map((name) => env[name]), config.recognition.apiKey),
    ),
  });
  return rows;
}

// ---------------------------------------------------------------------------
// Client factories
// ---------------------------------------------------------------------------

export function buildClients(
  sources: ConfigSources,
  opts: { fetch?: Fetch } = {},
): ClientFactory {
  const { config } = sources;
  const region = resolveStorageRegion(sources);
  return {
    downloader: (logger) =>
      new YtDlpDownloader({
        command: config.download.command,
        timeoutMs: config.download.timeoutMs,
        defaultOutputDir: config.download.outputDir,
        logger,
      }),
    objectStore: (credentials, logger) =>
      new S3ObjectStore(
        { ...credentials, region },
        { fetch: opts.fetch, logger },
      ),
    transcriber: (credentials, logger) =>
      new DashScopeTranscriber({
        apiKey: credentials.apiKey,
        model: config.recognition.model,
        baseUrl: config.recognition.baseUrl,
        pollIntervalMs: config.recognition.pollIntervalMs,
        timeoutMs: config.recognition.timeoutMs,
        fetch: opts.fetch,
        logger,
      }),
  };
}
