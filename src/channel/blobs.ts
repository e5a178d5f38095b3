/**
 * Blob references: binary content written to disk once and passed between
 * stages by path. graphpipe never deletes these files, so a reference stays
 * valid for every later stage and every later shell invocation.
 */

import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { blobRef, collectBlobRefs, type BlobRef, type DataRecord } from "../records/index.js";

/**
 * Make a remote-supplied name safe to use as a single path segment.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = basename(name.replace(/\\/g, "/"))
    .replace(/[<>:"|?*\u0000-\u001f]/g, "_")
    .replace(/^\.+/, "_")
    .trim();
  return cleaned === "" ? "unnamed" : cleaned;
}

/**
 * First path in `dir` for `name` that does not exist yet: report.pdf,
 * report-1.pdf, report-2.pdf, ...
 */
export function uniquePath(dir: string, name: string): string {
  const ext = extname(name);
  const stem = name.slice(0, name.length - ext.length);
  let candidate = join(dir, name);
  for (let n = 1; existsSync(candidate); n++) {
    candidate = join(dir, `${stem}-${n}${ext}`);
  }
  return candidate;
}

export class BlobStore {
  public readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  /**
   * Write content under a sanitized, non-clobbering name and return a
   * reference with an absolute path.
   *
   * @param targetDir - Directory to write to instead of the store's own
   */
  async put(
    name: string,
    data: Uint8Array,
    contentType?: string,
    targetDir?: string
  ): Promise<BlobRef> {
    const dir = targetDir ? resolve(targetDir) : this.directory;
    await mkdir(dir, { recursive: true });
    const path = uniquePath(dir, sanitizeFileName(name));
    await writeFile(path, data);
    return blobRef(path, data.byteLength, contentType);
  }
}

/**
 * Blob references in a record whose file no longer exists.
 */
export function findDanglingBlobs(record: DataRecord): BlobRef[] {
  return collectBlobRefs(record).filter((ref) => !existsSync(ref.$blob));
}
