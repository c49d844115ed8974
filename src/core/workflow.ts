/**
 * Workflow core – client factory interface and the sequential pipeline
 * runner: download → upload → recognize → cleanup.
 */
import {
  resolveRecognitionCredentials,
  resolveStorageCredentials,
  type ConfigSources,
} from "../config.js";
import type { Downloader } from "../download/ytdlp.js";
import type { Logger } from "../logger.js";
import type { Transcriber } from "../providers/dashscope/transcription.js";
import type { ObjectStore } from "../storage/backend.js";
import { DEFAULT_LINK_EXPIRES } from "../storage/s3.js";
import { LocalStaging } from "../storage/staging.js";
import {
  CleanupWarning,
  ConfigurationError,
  DownloadError,
  RecognitionError,
  UploadError,
  describeError,
} from "./exceptions.js";
import {
  fail,
  type Outcome,
  type RecognitionCredentials,
  type StorageCredentials,
  type WorkflowErrorKind,
  type WorkflowRequest,
  type WorkflowResult,
  type WorkflowState,
  type WorkflowStep,
} from "./types.js";

// ---------------------------------------------------------------------------
// Client factory
// ---------------------------------------------------------------------------

/**
 * Builds the clients a run talks to. Credentials are resolved per run, so
 * object-store and transcription clients are built per run as well.
 */
export interface ClientFactory {
  downloader(logger: Logger): Downloader;
  objectStore(credentials: StorageCredentials, logger: Logger): ObjectStore;
  transcriber(credentials: RecognitionCredentials, logger: Logger): Transcriber;
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export interface WorkflowPipelineOptions {
  clients: ClientFactory;
  sources: ConfigSources;
  logger: Logger;
  /** Staging directory when the request names none. */
  defaultOutputDir: string;
}

export class WorkflowPipeline {
  private clients: ClientFactory;
  private sources: ConfigSources;
  private logger: Logger;
  private defaultOutputDir: string;

  constructor(opts: WorkflowPipelineOptions) {
    this.clients = opts.clients;
    this.sources = opts.sources;
    this.logger = opts.logger;
    this.defaultOutputDir = opts.defaultOutputDir;
  }

  /**
   * Run every step in order. Never throws: the first failing step ends the
   * run with `success=false` and the steps completed so far.
   */
  async run(request: WorkflowRequest): Promise<WorkflowResult> {
    const result: WorkflowResult = {
      success: false,
      state: "start",
      stepsCompleted: [],
      text: "",
      warnings: [],
    };
    const staging = new LocalStaging(request.outputDir ?? this.defaultOutputDir);

    // 0. Configuration, before anything touches the network or the disk
    let store: ObjectStore;
    let transcriber: Transcriber;
    try {
      ({ store, transcriber } = this.openClients(request));
    } catch (err) {
      return this.failed(result, "configuration", err);
    }

    // 1. Download
    this.logger.debug("Step 1: download");
    const downloaded = await this.attempt(
      () => this.clients.downloader(this.logger).download(request.url, staging.basePath),
      (err) => new DownloadError(describeError(err)),
    );
    if (!downloaded.ok) return this.failed(result, "download", downloaded.error);
    const audioFile = downloaded.value.path;
    result.audioFile = audioFile;
    this.advance(result, "download", "downloaded");
    this.logger.debug(`Downloaded ${audioFile}`);

    // 2. Upload
    this.logger.debug("Step 2: upload");
    const uploaded = await this.attempt(
      () => store.uploadFile(audioFile, undefined, request.linkExpires ?? DEFAULT_LINK_EXPIRES),
      (err) => new UploadError(describeError(err)),
    );
    if (!uploaded.ok) return this.failed(result, "upload", uploaded.error);
    const upload = uploaded.value;
    result.uploadResult = upload;
    this.advance(result, "upload", "uploaded");
    this.logger.debug(`Uploaded as ${upload.key}, link valid ${upload.expires} s`);

    // 3. Recognition
    this.logger.debug("Step 3: recognition");
    const recognized = await this.attempt(
      () =>
        transcriber.recognize(upload.directLink, {
          language: request.language ?? "auto",
          removeTags: !(request.keepTags ?? false),
          stripBrackets: request.stripBrackets ?? false,
        }),
      (err) => new RecognitionError("request_failed", describeError(err)),
    );
    if (!recognized.ok) return this.failed(result, "recognition", recognized.error);
    result.recognitionResult = recognized.value;
    result.text = recognized.value.text;
    result.originalText = recognized.value.originalText;
    this.advance(result, "recognition", "recognized");
    result.success = true;

    // 4. Cleanup
    if (request.cleanup ?? true) {
      this.logger.debug("Step 4: cleanup");
      await this.cleanup(result, store, upload.key, audioFile, staging);
    }

    result.state = "done";
    return result;
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /**
   * Resolve both credential sets and build the clients. Throws one
   * ConfigurationError naming every missing variable.
   */
  private openClients(request: WorkflowRequest): {
    store: ObjectStore;
    transcriber: Transcriber;
  } {
    const missing: string[] = [];
    const resolve = <T>(fn: () => T): T | undefined => {
      try {
        return fn();
      } catch (err) {
        if (!(err instanceof ConfigurationError)) throw err;
        missing.push(...err.missing);
        return undefined;
      }
    };
    const storage = resolve(() =>
      resolveStorageCredentials(request.credentials?.storage, this.sources),
    );
    const recognition = resolve(() =>
      resolveRecognitionCredentials(request.credentials?.recognition, this.sources),
    );
    if (!storage || !recognition) throw new ConfigurationError(missing);
    return {
      store: this.clients.objectStore(storage, this.logger),
      transcriber: this.clients.transcriber(recognition, this.logger),
    };
  }

  private async cleanup(
    result: WorkflowResult,
    store: ObjectStore,
    key: string,
    audioFile: string,
    staging: LocalStaging,
  ): Promise<void> {
    const deleted = await this.attempt(
      () => store.deleteObject(store.bucket, key),
      (err) => new CleanupWarning("cloud", describeError(err)),
    );
    if (deleted.ok) {
      result.stepsCompleted.push("cloud_cleanup");
      this.logger.debug(`Deleted remote object ${key}`);
    } else {
      this.warn(result, deleted.error);
    }

    try {
      const dirRemoved = await staging.remove(audioFile);
      result.stepsCompleted.push("local_cleanup");
      this.logger.debug(
        dirRemoved ? `Removed ${audioFile} and ${staging.basePath}` : `Removed ${audioFile}`,
      );
    } catch (err) {
      this.warn(result, new CleanupWarning("local", describeError(err)));
    }
  }

  /** Run a step, turning anything it throws into a failed outcome. */
  private async attempt<T, E extends Error>(
    call: () => Promise<Outcome<T, E>>,
    wrap: (err: unknown) => E,
  ): Promise<Outcome<T, E>> {
    try {
      return await call();
    } catch (err) {
      return fail(wrap(err));
    }
  }

  private advance(result: WorkflowResult, step: WorkflowStep, state: WorkflowState): void {
    result.stepsCompleted.push(step);
    result.state = state;
  }

  private failed(result: WorkflowResult, step: WorkflowErrorKind, err: unknown): WorkflowResult {
    result.errorKind = err instanceof ConfigurationError ? "configuration" : step;
    result.error = describeError(err);
    result.state = "failed";
    this.logger.error(result.error);
    return result;
  }

  private warn(result: WorkflowResult, warning: CleanupWarning): void {
    result.warnings.push(warning.message);
    this.logger.warn(warning.message);
  }
}
