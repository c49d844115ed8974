/**
 * Node HTTP listener for the service.
 */
import { serve, type ServerType } from "@hono/node-server";

import { createApp, type AppOptions } from "./http/app.js";
import type { Audioscribe } from "./index.js";
import { createLogger } from "./logger.js";

export interface ServerOptions extends AppOptions {
  host: string;
  port: number;
}

export function startServer(scribe: Audioscribe, opts: ServerOptions): ServerType {
  const logger = opts.logger ?? createLogger();
  const app = createApp(scribe, { ...opts, logger });

  return serve({ fetch: app.fetch, hostname: opts.host, port: opts.port }, (info) => {
    logger.info(`Listening on http://${opts.host}:${info.port}`);
  });
}
