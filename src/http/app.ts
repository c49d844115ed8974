/**
 * HTTP service wrapping the workflow. Every route answers JSON except the
 * `/text` pair, which returns the bare transcript.
 */
import { Hono, type Context } from "hono";
import { logger as requestLogger } from "hono/logger";
import type { z } from "zod";

import { ConfigurationError, describeError } from "../core/exceptions.js";
import {
  recognitionResultJson,
  uploadResultJson,
  workflowResultJson,
} from "../core/serialize.js";
import type { WorkflowRequest } from "../core/types.js";
import { VERSION, type Audioscribe } from "../index.js";
import { createLogger, type Logger } from "../logger.js";
import {
  DownloadBodySchema,
  ProcessBodySchema,
  RecognizeBodySchema,
  TextBodySchema,
  TextQuerySchema,
  UploadBodySchema,
} from "./schemas.js";

export interface AppOptions {
  logger?: Logger;
  /** Used for requests that set `verbose: true`. */
  verboseLogger?: Logger;
}

const ENDPOINTS = [
  { path: "/download", method: "POST", description: "Download the audio of a URL" },
  { path: "/upload", method: "POST", description: "Upload a local file to object storage" },
  { path: "/recognize", method: "POST", description: "Transcribe a publicly reachable audio URL" },
  { path: "/process", method: "POST", description: "Run the whole workflow" },
  { path: "/text", method: "GET", description: "Run the whole workflow, return plain text" },
  { path: "/text", method: "POST", description: "Run the whole workflow, return plain text" },
];

class RequestValidationError extends Error {
  details: string[];

  constructor(message: string, details: string[]) {
    super(message);
    this.name = "RequestValidationError";
    this.details = details;
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(
      "Invalid request",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON body", [describeError(err)]);
  }
}

function textRequest(body: { url: string; language: string; keep_tags: boolean }): WorkflowRequest {
  return { url: body.url, language: body.language, keepTags: body.keep_tags, cleanup: true };
}

export function createApp(scribe: Audioscribe, opts: AppOptions = {}): Hono {
  const log = opts.logger ?? createLogger();
  const verboseLog = opts.verboseLogger ?? createLogger({ verbose: true });
  const scribeFor = (verbose: boolean) => scribe.withLogger(verbose ? verboseLog : log);

  const app = new Hono();
  app.use("*", requestLogger((line) => log.info(line)));

  app.onError((err, c) => {
    if (err instanceof RequestValidationError) {
      return c.json({ error: err.message, details: err.details }, 400);
    }
    if (err instanceof ConfigurationError) {
      return c.json({ error: err.message, missing: err.missing }, 400);
    }
    log.error(`${c.req.method} ${c.req.path}: ${describeError(err)}`);
    return c.json({ error: describeError(err) }, 500);
  });

  app.get("/", (c) =>
    c.json({ service: "audioscribe", version: VERSION, status: "running", endpoints: ENDPOINTS }),
  );

  app.post("/download", async (c) => {
    const body = validate(DownloadBodySchema, await readJson(c));
    const res = await scribeFor(body.verbose).download(body.url, body.output_dir);
    if (!res.ok) return c.json({ error: res.error.message }, 500);
    return c.json({ success: true, file_path: res.value.path });
  });

  app.post("/upload", async (c) => {
    const body = validate(UploadBodySchema, await readJson(c));
    const res = await scribeFor(false).upload(body.file_path, {
      remoteName: body.custom_filename,
      expires: body.link_expires,
      credentials: {
        accessKey: body.access_key,
        secretKey: body.secret_key,
        bucketName: body.bucket_name,
        bucketDomain: body.bucket_domain,
      },
    });
    if (!res.ok) {
      return c.json({ error: res.error.message }, res.error.fileNotFound ? 404 : 500);
    }
    return c.json({ success: true, ...uploadResultJson(res.value) });
  });

  app.post("/recognize", async (c) => {
    const body = validate(RecognizeBodySchema, await readJson(c));
    const res = await scribeFor(body.verbose).recognize(body.file_url, {
      language: body.language,
      removeTags: !body.keep_tags,
      credentials: { apiKey: body.api_key },
    });
    if (!res.ok) return c.json({ error: res.error.message }, 500);
    return c.json({ success: true, ...recognitionResultJson(res.value) });
  });

  app.post("/process", async (c) => {
    const body = validate(ProcessBodySchema, await readJson(c));
    const result = await scribeFor(body.verbose).process({
      url: body.url,
      outputDir: body.output_dir,
      language: body.language,
      keepTags: body.keep_tags,
      linkExpires: body.link_expires,
      cleanup: body.cleanup,
      credentials: {
        storage: {
          accessKey: body.qiniu_access_key,
          secretKey: body.qiniu_secret_key,
          bucketName: body.qiniu_bucket_name,
          bucketDomain: body.qiniu_bucket_domain,
        },
        recognition: { apiKey: body.aliyun_api_key },
      },
    });
    if (!result.success) {
      return c.json(
        { error: result.error ?? "Workflow failed", steps_completed: result.stepsCompleted },
        result.errorKind === "configuration" ? 400 : 500,
      );
    }
    return c.json(workflowResultJson(result));
  });

  const runText = async (c: Context, request: WorkflowRequest) => {
    const result = await scribeFor(false).process(request);
    if (!result.success) {
      return c.json(
        { error: result.error ?? "Workflow failed" },
        result.errorKind === "configuration" ? 400 : 500,
      );
    }
    return c.text(result.text);
  };

  app.get("/text", (c) =>
    runText(c, textRequest(validate(TextQuerySchema, c.req.query()))),
  );

  app.post("/text", async (c) =>
    runText(c, textRequest(validate(TextBodySchema, await readJson(c)))),
  );

  return app;
}
