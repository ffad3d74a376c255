import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { StoreQueryError } from "../core/errors";
import { ObjectStore } from "./types";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Keys map to files under `rootDir`; `/` in a key becomes a subdirectory. */
export class LocalDirObjectStore implements ObjectStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async exists(key: string): Promise<boolean> {
    const filePath = this.resolveKey(key);
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw new StoreQueryError(key, { cause: error });
    }
  }

  async put(key: string, body: Readable, _contentType: string): Promise<void> {
    const finalPath = this.resolveKey(key);
    await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
    const tempPath = `${finalPath}.part`;

    try {
      await pipeline(body, fs.createWriteStream(tempPath, { flags: "w" }));
      await fs.promises.rename(tempPath, finalPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
  }

  describe(): string {
    return `file://${this.rootDir}`;
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.rootDir, key);
    if (!resolved.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Key escapes store root: ${key}`);
    }
    return resolved;
  }
}
