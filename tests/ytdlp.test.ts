/**
 * Unit tests for the yt-dlp downloader, with the command runner faked.
 */
import { describe, test, expect, vi } from "vitest";
import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  CommandFailedError,
  YtDlpDownloader,
  ytDlpArgs,
  type CommandRunner,
} from "../src/download/ytdlp.js";
import { makeTmpDir, recordingLogger } from "./fixtures.js";

/** Runner that writes `name` into the -o directory and prints its path. */
function producing(name: string, opts: { print?: boolean } = {}): CommandRunner {
  return async (_cmd, args) => {
    const template = args[args.indexOf("-o") + 1] ?? "";
    const path = join(template, "..", name);
    writeFileSync(path, "audio");
    return { stdout: opts.print === false ? "" : `${path}\n`, stderr: "" };
  };
}

describe("ytDlpArgs", () => {
  test("extracts audio into the directory and prints the final path", () => {
    expect(ytDlpArgs("https://example.com/v", "/tmp/out")).toEqual([
      "-x",
      "--no-playlist",
      "-o",
      "/tmp/out/%(title)s.%(ext)s",
      "--print",
      "after_move:filepath",
      "https://example.com/v",
    ]);
  });
});

describe("YtDlpDownloader", () => {
  test("empty URL fails without invoking the tool", async () => {
    const runner = vi.fn<CommandRunner>();
    const dl = new YtDlpDownloader({ runner });
    const res = await dl.download("   ", makeTmpDir());
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe("Download failed: URL must not be empty");
    expect(runner).not.toHaveBeenCalled();
  });

  test("uses the reported path", async () => {
    const dir = join(makeTmpDir(), "out");
    const dl = new YtDlpDownloader({ runner: producing("talk.m4a") });
    const res = await dl.download("https://example.com/v", dir);
    expect(res).toEqual({ ok: true, value: { path: join(dir, "talk.m4a"), source: "reported" } });
  });

  test("passes command, args and timeout to the runner", async () => {
    const dir = makeTmpDir();
    const runner = vi.fn<CommandRunner>(producing("a.opus"));
    const dl = new YtDlpDownloader({ runner, command: "/opt/yt-dlp", timeoutMs: 1234 });
    await dl.download("https://example.com/v", dir);
    expect(runner).toHaveBeenCalledWith("/opt/yt-dlp", ytDlpArgs("https://example.com/v", dir), {
      timeoutMs: 1234,
    });
  });

  test("ignores noise lines after the path", async () => {
    const dir = makeTmpDir();
    writeFileSync(join(dir, "clip.mp3"), "x");
    const runner: CommandRunner = async () => ({
      stdout: `${join(dir, "clip.mp3")}\nnot-a-file\n`,
      stderr: "",
    });
    const res = await new YtDlpDownloader({ runner }).download("https://example.com/v", dir);
    expect(res.ok && res.value.path).toBe(join(dir, "clip.mp3"));
  });

  test("falls back to the newest file and warns", async () => {
    const dir = makeTmpDir();
    const logger = recordingLogger();
    const dl = new YtDlpDownloader({ runner: producing("quiet.m4a", { print: false }), logger });
    const res = await dl.download("https://example.com/v", dir);
    expect(res).toEqual({
      ok: true,
      value: { path: join(dir, "quiet.m4a"), source: "newest_file" },
    });
    expect(logger.lines).toContain(
      `warn yt-dlp did not report its output file, using newest file in ${dir}`,
    );
  });

  test("no file produced", async () => {
    const dir = makeTmpDir();
    const runner: CommandRunner = async () => ({ stdout: "", stderr: "" });
    const res = await new YtDlpDownloader({ runner }).download("https://example.com/v", dir);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe(`Download failed: no file produced in ${dir}`);
  });

  test("tool failure carries exit code and stderr tail", async () => {
    const runner: CommandRunner = async () => {
      throw new CommandFailedError("yt-dlp", 1, "WARNING: x\nERROR: Unsupported URL\n");
    };
    const res = await new YtDlpDownloader({ runner }).download("https://example.com/v", makeTmpDir());
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.message).toBe(
        "Download failed: yt-dlp exited with code 1: ERROR: Unsupported URL",
      );
    }
  });

  test("creates the output directory", async () => {
    const dir = join(makeTmpDir(), "deep", "er");
    await new YtDlpDownloader({ runner: producing("x.m4a") }).download("https://example.com/v", dir);
    expect(existsSync(join(dir, "x.m4a"))).toBe(true);
  });
});

describe("CommandFailedError", () => {
  test("missing binary", () => {
    expect(new CommandFailedError("yt-dlp", "ENOENT", "").message).toBe(
      "yt-dlp could not run (ENOENT)",
    );
  });
});
