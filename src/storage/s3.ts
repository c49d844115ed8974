/**
 * S3-compatible object store (Qiniu Kodo exposes one per region).
 *
 * Every request goes out through a presigned URL: the upload credential is
 * scoped to one bucket and one key and expires after an hour, the download
 * link after the caller-chosen lifetime.
 */
import {
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { readFile, stat } from "node:fs/promises";
import { basename } from "node:path";

import {
  CleanupWarning,
  UploadError,
  describeError,
} from "../core/exceptions.js";
import {
  fail,
  succeed,
  type Fetch,
  type Outcome,
  type StorageCredentials,
  type UploadResult,
} from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ObjectStore } from "./backend.js";

export const DEFAULT_LINK_EXPIRES = 3600;
const UPLOAD_CREDENTIAL_TTL = 3600;

export interface S3ObjectStoreConfig extends StorageCredentials {
  region?: string;
}

export interface S3ObjectStoreOptions {
  fetch?: Fetch;
  /** Clock in milliseconds, used for the key prefix. */
  now?: () => number;
  logger?: Logger;
}

/** `bucketDomain` may be a bare host or a full origin. */
export function endpointFor(bucketDomain: string): string {
  const trimmed = bucketDomain.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export class S3ObjectStore implements ObjectStore {
  readonly bucket: string;
  private client: S3Client;
  private fetch: Fetch;
  private now: () => number;
  private logger: Logger;

  constructor(config: S3ObjectStoreConfig, opts: S3ObjectStoreOptions = {}) {
    this.bucket = config.bucketName;
    this.client = new S3Client({
      endpoint: endpointFor(config.bucketDomain),
      region: config.region ?? "cn-east-1",
      forcePathStyle: true,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
      // Presigned PUTs carry no body checksum.
      requestChecksumCalculation: "WHEN_REQUIRED",
      responseChecksumValidation: "WHEN_REQUIRED",
    });
    this.fetch = opts.fetch ?? ((url, init) => fetch(url, init));
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Timestamp-prefixed key, so repeated uploads of one name never collide. */
  remoteKey(localPath: string, remoteName?: string): string {
    const seconds = Math.floor(this.now() / 1000);
    return `${seconds}_${remoteName ?? basename(localPath)}`;
  }

  async uploadFile(
    localPath: string,
    remoteName?: string,
    expires: number = DEFAULT_LINK_EXPIRES,
  ): Promise<Outcome<UploadResult, UploadError>> {
    const isFile = await stat(localPath).then(
      (s) => s.isFile(),
      () => false,
    );
    if (!isFile) {
      return fail(
        new UploadError(`file not found: ${localPath}`, { fileNotFound: true }),
      );
    }

    const key = this.remoteKey(localPath, remoteName);
    try {
      const uploadUrl = await getSignedUrl(
        this.client,
        new PutObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: UPLOAD_CREDENTIAL_TTL },
      );
      const body = await readFile(localPath);
      this.logger.debug(`Uploading ${localPath} (${body.byteLength} bytes) as ${key}`);
      const res = await this.fetch(uploadUrl, { method: "PUT", body });
      if (res.status !== 200) {
        const detail = (await res.text()).trim().slice(0, 200);
        return fail(
          new UploadError(
            `provider answered HTTP ${res.status}${detail ? `: ${detail}` : ""}`,
          ),
        );
      }

      const hash = (res.headers.get("etag") ?? "").replaceAll('"', "");
      const directLink = await getSignedUrl(
        this.client,
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn: expires },
      );
      return succeed({ directLink, key, hash, expires });
    } catch (err) {
      return fail(new UploadError(describeError(err)));
    }
  }

  async deleteObject(
    bucket: string,
    key: string,
  ): Promise<Outcome<{ status: number }, CleanupWarning>> {
    try {
      const url = await getSignedUrl(
        this.client,
        new DeleteObjectCommand({ Bucket: bucket, Key: key }),
        { expiresIn: UPLOAD_CREDENTIAL_TTL },
      );
      const res = await this.fetch(url, { method: "DELETE" });
      this.logger.debug(`Delete of ${bucket}/${key} answered HTTP ${res.status}`);
      if (!res.ok) {
        return fail(
          new CleanupWarning("cloud", `delete of ${key} answered HTTP ${res.status}`),
        );
      }
      return succeed({ status: res.status });
    } catch (err) {
      return fail(new CleanupWarning("cloud", describeError(err)));
    }
  }
}
