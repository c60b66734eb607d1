// src/archive.ts — Archive Packager
// Serializes a ResolvedFileSet into a ZIP. Entries are sorted by path and written with a fixed
// timestamp and compression level, so identical input yields byte-identical archives.

import { unzipSync, Zip, ZipDeflate } from "fflate";
import type { ResolvedFile } from "./types.js";
import { ArchiveIOError } from "./types.js";

export interface ArchiveOptions {
  /** Folder every entry is placed under. Empty string for none. */
  rootDir?: string;
  mtime?: Date | string | number;
}

export interface ArchiveEntry {
  path: string;
  content: Uint8Array;
}

// DOS timestamps cannot represent anything before 1980
export const ARCHIVE_MTIME = "2000-01-01T00:00:00.000Z";
const COMPRESSION_LEVEL = 6;

// Classic ZIP header field limits
const MAX_PATH_BYTES = 0xffff;
const MAX_ENTRIES = 0xffff;

/**
 * Package files into a ZIP byte stream. Throws ArchiveIOError; never retries.
 */
export function packageArchive(
  files: readonly ResolvedFile[],
  options: ArchiveOptions = {},
): Uint8Array {
  const root = options.rootDir ?? "";
  if (root !== "") {
    checkEntryPath(root);
  }

  if (files.length > MAX_ENTRIES) {
    throw new ArchiveIOError(
      `archive has ${files.length} entries; the format allows at most ${MAX_ENTRIES}`,
    );
  }

  const entries = files.map((f) => ({
    path: root === "" ? f.path : `${root}/${f.path}`,
    content: f.content,
  }));
  for (const entry of entries) {
    checkEntryPath(entry.path);
  }

  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  checkCollisions(entries);

  try {
    return writeZip(entries, options.mtime ?? ARCHIVE_MTIME);
  } catch (err: unknown) {
    if (err instanceof ArchiveIOError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new ArchiveIOError(`failed to write archive: ${msg}`, undefined, err);
  }
}

// Entries are added one by one so archive order is exactly the sorted order
function writeZip(entries: readonly ArchiveEntry[], mtime: Date | string | number): Uint8Array {
  const chunks: Uint8Array[] = [];
  const failures: Error[] = [];

  const zip = new Zip((err, data) => {
    if (err) {
      failures.push(err);
      return;
    }
    chunks.push(data);
  });

  for (const entry of entries) {
    const file = new ZipDeflate(entry.path, { level: COMPRESSION_LEVEL, mtime });
    zip.add(file);
    file.push(entry.content, true);
  }
  zip.end();

  if (failures.length > 0) throw failures[0];

  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/**
 * List the entries of a ZIP produced by packageArchive, in archive order.
 */
export function readArchive(bytes: Uint8Array): ArchiveEntry[] {
  const names: string[] = [];
  let unzipped: Record<string, Uint8Array>;
  try {
    unzipped = unzipSync(bytes, {
      filter: (file) => {
        names.push(file.name);
        return true;
      },
    });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ArchiveIOError(`failed to read archive: ${msg}`, undefined, err);
  }
  // Key order of the result object is not archive order for integer-like names.
  // A `__proto__` entry is stored through the prototype accessor and read back through it.
  return names.map((path) => ({ path, content: unzipped[path] }));
}

function checkCollisions(entries: readonly ArchiveEntry[]): void {
  const paths = new Set<string>();
  for (const entry of entries) {
    if (paths.has(entry.path)) {
      throw new ArchiveIOError(`duplicate archive entry: ${entry.path}`, entry.path);
    }
    paths.add(entry.path);
  }
  for (const entry of entries) {
    const segments = entry.path.split("/");
    for (let i = 1; i < segments.length; i++) {
      const dir = segments.slice(0, i).join("/");
      if (paths.has(dir)) {
        throw new ArchiveIOError(`archive entry ${dir} is also a directory of ${entry.path}`, dir);
      }
    }
  }
}

function checkEntryPath(path: string): void {
  if (path.length === 0) {
    throw new ArchiveIOError("archive entry path is empty", path);
  }
  if (path.startsWith("/")) {
    throw new ArchiveIOError(`archive entry path is absolute: ${path}`, path);
  }
  if (path.includes("\\")) {
    throw new ArchiveIOError(`archive entry path contains a backslash: ${path}`, path);
  }
  for (const segment of path.split("/")) {
    if (segment === "" || segment === "." || segment === "..") {
      throw new ArchiveIOError(`archive entry path has an invalid segment: ${path}`, path);
    }
  }
  if (Buffer.byteLength(path, "utf8") > MAX_PATH_BYTES) {
    throw new ArchiveIOError(
      `archive entry path exceeds ${MAX_PATH_BYTES} bytes: ${path.slice(0, 80)}...`,
      path,
    );
  }
}
