/**
 * Command implementations behind the `audioscribe` binary.
 *
 * Results go to stdout, diagnostics and failure lines to stderr. Every
 * command resolves to the process exit code instead of exiting itself.
 */
import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import {
  DEFAULT_CONFIG_FILE,
  describeConfiguration,
  resolveServerAddress,
  resolveStorageRegion,
  type Env,
} from "./config.js";
import { ConfigurationError, describeError } from "./core/exceptions.js";
import { recognitionResultJson } from "./core/serialize.js";
import type { RecognitionResult } from "./core/types.js";
import { Audioscribe, VERSION } from "./index.js";
import { createLogger, type Logger } from "./logger.js";
import { startServer, type ServerOptions } from "./server.js";

const USAGE = `
audioscribe v${VERSION}: download, upload and transcribe remote audio

Usage:
  audioscribe download <url> [-o dir] [-v]
  audioscribe upload <local_path> [remote_name] [expires]
  audioscribe recognize <url> [-k key] [-l lang] [-o outfile] [--keep-tags] [--strip-brackets] [-v]
  audioscribe process <url> [-o dir] [-l lang] [-e expires] [-s savefile] [--keep-tags] [--no-cleanup] [-v]
  audioscribe config
  audioscribe serve [--host host] [--port port]

Options:
  -o, --output <path>    Download directory (download, process) or JSON result file (recognize)
  -l, --language <code>  Language hint for recognition (default: auto)
  -k, --api-key <key>    DashScope API key (prefer DASHSCOPE_API_KEY)
  -e, --expires <secs>   Lifetime of the signed download link (default: 3600)
  -s, --save <path>      Write the recognition result as JSON
  --keep-tags            Keep emotion and audio-event markers in the text
  --strip-brackets       Also remove [...] spans from the text
  --no-cleanup           Keep the downloaded file and the uploaded object
  -v, --verbose          Print progress details
  -h, --help             Show this help

Environment:
  QINIU_ACCESS_KEY, QINIU_SECRET_KEY, QINIU_BUCKET_NAME, QINIU_BUCKET_DOMAIN,
  QINIU_REGION, DASHSCOPE_API_KEY, API_HOST, API_PORT,
  AUDIOSCRIBE_CONFIG (default: ./${DEFAULT_CONFIG_FILE})
`.trim();

const SYMBOLS = {
  check: "✔",
  cross: "✘",
  arrow: "→",
  line: "─",
} as const;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io?: CliIO;
  env?: Env;
  /** Builds the facade a command runs against. */
  openScribe?: (logger: Logger) => Audioscribe;
  serve?: (scribe: Audioscribe, opts: ServerOptions) => unknown;
  writeFile?: (path: string, data: string) => Promise<void>;
}

interface CommandContext {
  io: CliIO;
  openScribe: (logger: Logger) => Audioscribe;
  serve: (scribe: Audioscribe, opts: ServerOptions) => unknown;
  writeFile: (path: string, data: string) => Promise<void>;
  logger: (verbose: boolean) => Logger;
}

type Command = (args: string[], ctx: CommandContext) => Promise<number>;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ---------------------------------------------------------------------------
// Output helpers
// ---------------------------------------------------------------------------

function failure(io: CliIO, message: string): void {
  io.err(`${SYMBOLS.cross} ${message}`);
}

function framed(io: CliIO, title: string, text: string): void {
  const rule = SYMBOLS.line.repeat(60);
  io.out(title);
  io.out(rule);
  io.out(text);
  io.out(rule);
}

function isParseArgsError(err: unknown): boolean {
  return (
    err instanceof TypeError &&
    "code" in err &&
    String(err.code).startsWith("ERR_PARSE_ARGS")
  );
}

function positional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined) throw new UsageError(`missing argument <${name}>`);
  return value;
}

function seconds(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

async function saveRecognition(
  ctx: CommandContext,
  path: string,
  result: RecognitionResult,
): Promise<void> {
  try {
    await ctx.writeFile(path, `${JSON.stringify(recognitionResultJson(result), null, 2)}\n`);
    ctx.io.err(`${SYMBOLS.check} Result saved to ${path}`);
  } catch (err) {
    failure(ctx.io, `Could not save result to ${path}: ${describeError(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const download: Command = async (args, ctx) => {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });
  const url = positional(positionals, 0, "url");
  const scribe = ctx.openScribe(ctx.logger(values.verbose));

  const res = await scribe.download(url, values.output);
  if (!res.ok) {
    failure(ctx.io, res.error.message);
    return 1;
  }
  if (values.verbose) ctx.io.err(`${SYMBOLS.check} Downloaded (${res.value.source})`);
  ctx.io.out(res.value.path);
  return 0;
};

const upload: Command = async (args, ctx) => {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  const localPath = positional(positionals, 0, "local_path");
  const remoteName = positionals[1];
  const expires = seconds(positionals[2], "expires");
  const scribe = ctx.openScribe(ctx.logger(false));

  const res = await scribe.upload(localPath, { remoteName, expires });
  if (!res.ok) {
    failure(ctx.io, res.error.message);
    return 1;
  }
  const { directLink, key, hash } = res.value;
  ctx.io.out(`${SYMBOLS.check} Uploaded ${localPath}`);
  ctx.io.out(`  Link:    ${directLink}`);
  ctx.io.out(`  Expires: ${res.value.expires} s`);
  ctx.io.out(`  Key:     ${key}`);
  ctx.io.out(`  Hash:    ${hash}`);
  return 0;
};

const recognize: Command = async (args, ctx) => {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      "api-key": { type: "string", short: "k" },
      language: { type: "string", short: "l", default: "auto" },
      output: { type: "string", short: "o" },
      "keep-tags": { type: "boolean", default: false },
      "strip-brackets": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });
  const url = positional(positionals, 0, "url");
  const keepTags = values["keep-tags"];
  const scribe = ctx.openScribe(ctx.logger(values.verbose));

  const res = await scribe.recognize(url, {
    language: values.language,
    removeTags: !keepTags,
    stripBrackets: values["strip-brackets"],
    credentials: { apiKey: values["api-key"] },
  });
  if (!res.ok) {
    failure(ctx.io, res.error.message);
    return 1;
  }

  framed(ctx.io, "Recognition result:", res.value.text);
  if (keepTags) framed(ctx.io, "Original text (with markers):", res.value.originalText);
  if (values.output) await saveRecognition(ctx, values.output, res.value);
  return 0;
};

const processUrl: Command = async (args, ctx) => {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      language: { type: "string", short: "l", default: "auto" },
      expires: { type: "string", short: "e" },
      save: { type: "string", short: "s" },
      "keep-tags": { type: "boolean", default: false },
      "no-cleanup": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
    },
  });
  const url = positional(positionals, 0, "url");
  const keepTags = values["keep-tags"];
  const verbose = values.verbose;
  const scribe = ctx.openScribe(ctx.logger(verbose));

  if (verbose) ctx.io.err(`${SYMBOLS.arrow} Processing ${url}`);
  const result = await scribe.process({
    url,
    outputDir: values.output,
    language: values.language,
    keepTags,
    linkExpires: seconds(values.expires, "expires"),
    cleanup: !values["no-cleanup"],
  });

  if (values.save && result.recognitionResult) {
    await saveRecognition(ctx, values.save, result.recognitionResult);
  }

  if (!result.success) {
    failure(ctx.io, result.error ?? "Workflow failed");
    ctx.io.err(`  Steps completed: ${result.stepsCompleted.join(", ") || "none"}`);
    return 1;
  }

  if (!verbose) {
    ctx.io.out(result.text);
    return 0;
  }

  framed(ctx.io, "Recognition result:", result.text);
  if (keepTags && result.originalText !== undefined) {
    framed(ctx.io, "Original text (with markers):", result.originalText);
  }
  const cleanup = result.stepsCompleted.filter(
    (step) => step === "cloud_cleanup" || step === "local_cleanup",
  );
  if (cleanup.length > 0) ctx.io.out(`Cleanup done: ${cleanup.join(", ")}`);
  ctx.io.out(`${SYMBOLS.check} Done, ${result.stepsCompleted.length} steps completed`);
  return 0;
};

const config: Command = async (args, ctx) => {
  parseArgs({ args, options: {} });
  const scribe = ctx.openScribe(ctx.logger(false));

  ctx.io.out("Credentials:");
  for (const row of describeConfiguration(scribe.configSources)) {
    const mark = row.configured ? SYMBOLS.check : SYMBOLS.cross;
    ctx.io.out(`  ${mark} ${row.name}${row.configured ? "" : " (not set)"}`);
  }
  const settings = scribe.config;
  ctx.io.out(`Storage region:   ${resolveStorageRegion(scribe.configSources)}`);
  ctx.io.out(
    `Recognition:      ${settings.recognition.model} at ${settings.recognition.baseUrl}`,
  );
  ctx.io.out(
    `Download command: ${settings.download.command} into ${settings.download.outputDir}`,
  );
  return 0;
};

const serve: Command = async (args, ctx) => {
  const { values } = parseArgs({
    args,
    options: {
      host: { type: "string" },
      port: { type: "string" },
    },
  });
  const logger = ctx.logger(false);
  const scribe = ctx.openScribe(logger);
  const address = resolveServerAddress(scribe.configSources);

  ctx.serve(scribe, {
    host: values.host ?? address.host,
    port: seconds(values.port, "port") ?? address.port,
    logger,
  });
  return 0;
};

const COMMANDS: Record<string, Command> = {
  download,
  upload,
  recognize,
  process: processUrl,
  config,
  serve,
};

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  const env = deps.env ?? process.env;
  const logger = (verbose: boolean) =>
    createLogger({ verbose, write: (line) => io.err(line) });

  const [name, ...args] = argv;
  if (name === undefined) {
    io.err(USAGE);
    return 1;
  }
  if (name === "help" || name === "--help" || name === "-h") {
    io.out(USAGE);
    return 0;
  }
  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    failure(io, `Unknown command "${name}"`);
    io.err("Run `audioscribe --help` for usage.");
    return 1;
  }

  const ctx: CommandContext = {
    io,
    logger,
    openScribe:
      deps.openScribe ?? ((log) => Audioscribe.fromEnvironment({ env, logger: log })),
    serve: deps.serve ?? startServer,
    writeFile: deps.writeFile ?? ((path, data) => writeFile(path, data, "utf-8")),
  };

  try {
    return await command(args, ctx);
  } catch (err) {
    if (err instanceof UsageError || isParseArgsError(err)) {
      failure(io, describeError(err));
      io.err("Run `audioscribe --help` for usage.");
      return 1;
    }
    if (err instanceof ConfigurationError) {
      failure(io, err.message);
      if (err.missing.length > 0) {
        io.err("  Set these environment variables (or the matching config file entries):");
        for (const variable of err.missing) io.err(`    ${variable}`);
      }
      return 1;
    }
    failure(io, describeError(err));
    return 1;
  }
}
