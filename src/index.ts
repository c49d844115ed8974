/**
 * audioscribe – download remote audio, stage it in object storage and
 * transcribe it.
 */
import {
  buildClients,
  loadConfig,
  resolveRecognitionCredentials,
  resolveStorageCredentials,
  type Config,
  type ConfigSources,
  type Env,
} from "./config.js";
import type {
  CleanupWarning,
  DownloadError,
  RecognitionError,
  UploadError,
} from "./core/exceptions.js";
import type {
  DownloadedFile,
  Fetch,
  Outcome,
  RecognitionCredentials,
  RecognitionResult,
  StorageCredentials,
  UploadResult,
  WorkflowRequest,
  WorkflowResult,
} from "./core/types.js";
import { WorkflowPipeline, type ClientFactory } from "./core/workflow.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RecognizeOptions } from "./providers/dashscope/transcription.js";
import { DEFAULT_LINK_EXPIRES } from "./storage/s3.js";

export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { ClientFactory } from "./core/workflow.js";
export type { Config, Env } from "./config.js";
export type { Logger } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";
export { cleanTranscript, createNormalizer } from "./text/normalizer.js";

export const VERSION = "1.0.0";

export interface AudioscribeOptions {
  config: Config;
  env?: Env;
  logger?: Logger;
  /** Replaces the yt-dlp / S3 / DashScope clients built from `config`. */
  clients?: ClientFactory;
  fetch?: Fetch;
}

export interface UploadOptions {
  remoteName?: string;
  expires?: number;
  credentials?: Partial<StorageCredentials>;
}

export interface RecognizeRequest extends RecognizeOptions {
  credentials?: Partial<RecognitionCredentials>;
}

export class Audioscribe {
  readonly config: Config;
  private sources: ConfigSources;
  private clients: ClientFactory;
  private logger: Logger;

  constructor(opts: AudioscribeOptions) {
    this.config = opts.config;
    this.sources = { config: opts.config, env: opts.env ?? process.env };
    this.clients = opts.clients ?? buildClients(this.sources, { fetch: opts.fetch });
    this.logger = opts.logger ?? silentLogger;
  }

  /** Load the configuration file and read credentials from `env`. */
  static fromEnvironment(
    opts: { configPath?: string; env?: Env; logger?: Logger } = {},
  ): Audioscribe {
    const env = opts.env ?? process.env;
    const config = loadConfig({ path: opts.configPath, env });
    return new Audioscribe({ config, env, logger: opts.logger });
  }

  /** Same configuration and clients, different logger (per-request verbosity). */
  withLogger(logger: Logger): Audioscribe {
    return new Audioscribe({
      config: this.config,
      env: this.sources.env,
      clients: this.clients,
      logger,
    });
  }

  get configSources(): ConfigSources {
    return this.sources;
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  async download(
    url: string,
    outputDir?: string,
  ): Promise<Outcome<DownloadedFile, DownloadError>> {
    return this.clients
      .downloader(this.logger)
      .download(url, outputDir ?? this.config.download.outputDir);
  }

  /** Throws ConfigurationError when storage credentials are incomplete. */
  async upload(
    localPath: string,
    opts: UploadOptions = {},
  ): Promise<Outcome<UploadResult, UploadError>> {
    const store = this.clients.objectStore(
      resolveStorageCredentials(opts.credentials, this.sources),
      this.logger,
    );
    return store.uploadFile(localPath, opts.remoteName, opts.expires ?? DEFAULT_LINK_EXPIRES);
  }

  async deleteObject(
    key: string,
    credentials?: Partial<StorageCredentials>,
  ): Promise<Outcome<{ status: number }, CleanupWarning>> {
    const store = this.clients.objectStore(
      resolveStorageCredentials(credentials, this.sources),
      this.logger,
    );
    return store.deleteObject(store.bucket, key);
  }

  /** Throws ConfigurationError when no API key can be resolved. */
  async recognize(
    fileUrl: string,
    opts: RecognizeRequest = {},
  ): Promise<Outcome<RecognitionResult, RecognitionError>> {
    const { credentials, ...recognizeOpts } = opts;
    const transcriber = this.clients.transcriber(
      resolveRecognitionCredentials(credentials, this.sources),
      this.logger,
    );
    return transcriber.recognize(fileUrl, recognizeOpts);
  }

  /** Run the whole workflow. Never throws. */
  async process(request: WorkflowRequest): Promise<WorkflowResult> {
    const pipeline = new WorkflowPipeline({
      clients: this.clients,
      sources: this.sources,
      logger: this.logger,
      defaultOutputDir: this.config.download.outputDir,
    });
    return pipeline.run(request);
  }
}
