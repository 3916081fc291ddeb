/**
 * Durable blob storage for the offline cache.
 * The whole cache state is one serialized blob; stores only move bytes.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

export interface CacheStore {
  /** null when nothing has been written yet */
  read(): Promise<string | null>;
  write(blob: string): Promise<void>;
  remove(): Promise<void>;
}

export class FileCacheStore implements CacheStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async read(): Promise<string | null> {
    try {
      return await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(blob: string): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    // write-then-rename so a crash never leaves a half-written blob
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmp, blob, "utf8");
    await rename(tmp, this.filePath);
  }

  async remove(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

export class MemoryCacheStore implements CacheStore {
  private blob: string | null;
  writes = 0;

  constructor(initial: string | null = null) {
    this.blob = initial;
  }

  async read(): Promise<string | null> {
    return this.blob;
  }

  async write(blob: string): Promise<void> {
    this.blob = blob;
    this.writes += 1;
  }

  async remove(): Promise<void> {
    this.blob = null;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
