/**
 * Local staging directory for downloaded audio.
 */
import { mkdir, readdir, rmdir, stat, unlink } from "node:fs/promises";
import { join, resolve } from "node:path";

export class LocalStaging {
  readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  async ensure(): Promise<string> {
    await mkdir(this.basePath, { recursive: true });
    return this.basePath;
  }

  /** Whether `path` is an existing regular file. */
  async isFile(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * The most recently modified regular file directly inside the directory,
   * or null. Only a fallback for when the downloader does not report the
   * file it produced: any unrelated file in the directory can win.
   */
  async newestFile(): Promise<string | null> {
    const entries = await readdir(this.basePath, { withFileTypes: true }).catch(
      () => null,
    );
    if (!entries) return null;

    let newest: { path: string; mtimeMs: number } | null = null;
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const full = join(this.basePath, entry.name);
      const { mtimeMs } = await stat(full);
      if (!newest || mtimeMs > newest.mtimeMs) newest = { path: full, mtimeMs };
    }
    return newest?.path ?? null;
  }

  /**
   * Delete `filePath`, then the staging directory itself if that left it
   * empty. Returns whether the directory was removed.
   */
  async remove(filePath: string): Promise<boolean> {
    await unlink(filePath);

    const remaining = await readdir(this.basePath).catch(() => null);
    if (remaining === null || remaining.length > 0) return false;
    await rmdir(this.basePath);
    return true;
  }
}
