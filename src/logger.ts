/**
 * stderr-only logger.
 *
 * stdout is reserved for command results (file paths, transcripts) so that
 * the CLI output stays pipeable. Diagnostics go to stderr.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Emit debug lines. */
  verbose?: boolean;
  prefix?: string;
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ?? "audioscribe";
  const write =
    options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const emit = (level: string, message: string) =>
    write(`[${prefix}] ${level} ${message}`);

  return {
    debug: (message) => {
      if (options.verbose) emit("debug", message);
    },
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
