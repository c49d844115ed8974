/**
 * Request bodies and query strings accepted by the HTTP service.
 */
import { z } from "zod";

const HttpUrl = z.string().trim().url();
const Expires = z.number().int().positive();
const OptionalSecret = z.string().optional();

export const DownloadBodySchema = z.object({
  url: HttpUrl,
  output_dir: z.string().optional(),
  verbose: z.boolean().default(false),
});

export const UploadBodySchema = z.object({
  file_path: z.string().min(1),
  custom_filename: z.string().min(1).optional(),
  link_expires: Expires.default(3600),
  access_key: OptionalSecret,
  secret_key: OptionalSecret,
  bucket_name: OptionalSecret,
  bucket_domain: OptionalSecret,
});

export const RecognizeBodySchema = z.object({
  file_url: HttpUrl,
  language: z.string().default("auto"),
  keep_tags: z.boolean().default(false),
  api_key: OptionalSecret,
  verbose: z.boolean().default(false),
});

export const ProcessBodySchema = z.object({
  url: HttpUrl,
  output_dir: z.string().optional(),
  language: z.string().default("auto"),
  keep_tags: z.boolean().default(false),
  link_expires: Expires.default(3600),
  verbose: z.boolean().default(false),
  cleanup: z.boolean().default(true),
  qiniu_access_key: OptionalSecret,
  qiniu_secret_key: OptionalSecret,
  qiniu_bucket_name: OptionalSecret,
  qiniu_bucket_domain: OptionalSecret,
  aliyun_api_key: OptionalSecret,
});

export const TextBodySchema = z.object({
  url: HttpUrl,
  language: z.string().default("auto"),
  keep_tags: z.boolean().default(false),
});

// Query strings carry booleans as text, in any letter case.
const QueryBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((value) => value === "true" || value === "1" || value === "yes" || value === "on");

export const TextQuerySchema = z.object({
  url: HttpUrl,
  language: z.string().default("auto"),
  keep_tags: QueryBoolean.default("false"),
});

export type DownloadBody = z.infer<typeof DownloadBodySchema>;
export type UploadBody = z.infer<typeof UploadBodySchema>;
export type RecognizeBody = z.infer<typeof RecognizeBodySchema>;
export type ProcessBody = z.infer<typeof ProcessBodySchema>;
export type TextBody = z.infer<typeof TextBodySchema>;
