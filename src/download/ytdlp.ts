/**
 * Audio downloader backed by yt-dlp.
 *
 * yt-dlp is asked to print the final file path after post-processing, so
 * the produced file is known without scanning the directory. The scan
 * (newest file wins) only runs when nothing usable was printed.
 */
import { execFile } from "node:child_process";
import { join, resolve } from "node:path";

import { DownloadError, describeError } from "../core/exceptions.js";
import {
  fail,
  succeed,
  type DownloadedFile,
  type Outcome,
} from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { LocalStaging } from "../storage/staging.js";

export const DEFAULT_OUTPUT_DIR = "downloads_temp";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  opts: { timeoutMs: number },
) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  readonly exitCode: string | number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: string | number | null, stderr: string) {
    const tail = stderr.trim().split("\n").pop() ?? "";
    const reason =
      typeof exitCode === "string"
        ? `${command} could not run (${exitCode})`
        : `${command} exited with code ${exitCode ?? "unknown"}`;
    super(tail ? `${reason}: ${tail}` : reason);
    this.name = "CommandFailedError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
  HTTP_PROXY: process.env.HTTP_PROXY,
  HTTPS_PROXY: process.env.HTTPS_PROXY,
  NO_PROXY: process.env.NO_PROXY,
};

/** Run a command to completion, rejecting with CommandFailedError. */
export const runCommand: CommandRunner = (command, args, { timeoutMs }) =>
  new Promise((resolvePromise, reject) => {
    execFile(
      command,
      args,
      { env: SAFE_CHILD_ENV, timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          reject(new CommandFailedError(command, error.code ?? null, String(stderr)));
        } else {
          resolvePromise({ stdout: String(stdout), stderr: String(stderr) });
        }
      },
    );
  });

export interface Downloader {
  download(
    url: string,
    outputDir?: string,
  ): Promise<Outcome<DownloadedFile, DownloadError>>;
}

export interface YtDlpDownloaderOptions {
  command?: string;
  timeoutMs?: number;
  /** Used when a call passes no directory; relative to the cwd. */
  defaultOutputDir?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export function ytDlpArgs(url: string, dir: string): string[] {
  return [
    "-x",
    "--no-playlist",
    "-o",
    join(dir, "%(title)s.%(ext)s"),
    "--print",
    "after_move:filepath",
    url,
  ];
}

export class YtDlpDownloader implements Downloader {
  private command: string;
  private timeoutMs: number;
  private defaultOutputDir: string;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(opts: YtDlpDownloaderOptions = {}) {
    this.command = opts.command ?? "yt-dlp";
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.defaultOutputDir = opts.defaultOutputDir ?? DEFAULT_OUTPUT_DIR;
    this.runner = opts.runner ?? runCommand;
    this.logger = opts.logger ?? silentLogger;
  }

  async download(
    url: string,
    outputDir?: string,
  ): Promise<Outcome<DownloadedFile, DownloadError>> {
    if (!url.trim()) return fail(new DownloadError("URL must not be empty"));

    const staging = new LocalStaging(outputDir ?? this.defaultOutputDir);
    try {
      const dir = await staging.ensure();
      this.logger.debug(`Downloading ${url} into ${dir}`);

      const { stdout, stderr } = await this.runner(
        this.command,
        ytDlpArgs(url, dir),
        { timeoutMs: this.timeoutMs },
      );
      if (stderr.trim()) this.logger.debug(stderr.trim());

      const reported = await this.reportedFile(stdout, staging);
      if (reported) return succeed({ path: reported, source: "reported" });

      const newest = await staging.newestFile();
      if (newest) {
        this.logger.warn(
          `${this.command} did not report its output file, using newest file in ${dir}`,
        );
        return succeed({ path: newest, source: "newest_file" });
      }
      return fail(new DownloadError(`no file produced in ${dir}`));
    } catch (err) {
      return fail(new DownloadError(describeError(err)));
    }
  }

  /** Last printed line that names an existing file. */
  private async reportedFile(
    stdout: string,
    staging: LocalStaging,
  ): Promise<string | null> {
    const lines = stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean)
      .reverse();
    for (const line of lines) {
      const candidate = resolve(staging.basePath, line);
      if (await staging.isFile(candidate)) return candidate;
    }
    return null;
  }
}
