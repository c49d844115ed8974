/**
 * Object-store interface used to stage audio behind a temporary public URL.
 */
import type { CleanupWarning, UploadError } from "../core/exceptions.js";
import type { Outcome, UploadResult } from "../core/types.js";

export interface ObjectStore {
  /** Bucket every upload lands in. */
  readonly bucket: string;

  /**
   * Upload a local file under `<unix-seconds>_<remoteName>` and return a
   * signed download link valid for `expires` seconds.
   */
  uploadFile(
    localPath: string,
    remoteName?: string,
    expires?: number,
  ): Promise<Outcome<UploadResult, UploadError>>;

  /** Best-effort delete of an object by key. */
  deleteObject(
    bucket: string,
    key: string,
  ): Promise<Outcome<{ status: number }, CleanupWarning>>;
}
