#!/usr/bin/env node
/**
 * CLI entrypoint for audioscribe.
 *
 * Usage:
 *   audioscribe process https://example.com/episode -v
 *   audioscribe serve --port 8000
 */
import { runCli } from "./commands.js";

process.exitCode = await runCli(process.argv.slice(2));
