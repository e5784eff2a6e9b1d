import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { ObjectStat, ObjectStore } from "../../domain/ports.js";

export interface FileSystemObjectStoreOptions {
  timeoutMs: number;
}

/** Keys map to files below a root directory; writes go through a temp file and a rename. */
export class FileSystemObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(
    rootDir: string,
    private readonly options: FileSystemObjectStoreOptions,
  ) {
    this.root = path.resolve(rootDir);
  }

  get description(): string {
    return `file://${this.root}`;
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolveKey(key), {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    const targetPath = this.resolveKey(key);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, bytes, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      await replaceFileSafely(tempPath, targetPath);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  async stat(key: string): Promise<ObjectStat | null> {
    try {
      const stat = await fs.stat(this.resolveKey(key));
      return { sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.root, ...key.split("/"));
    if (resolved !== this.root && !resolved.startsWith(`${this.root}${path.sep}`)) {
      throw new Error(`Object key escapes the store root: ${key}`);
    }
    return resolved;
  }
}

function isFileMissing(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return "code" in error && error.code === "ENOENT";
}

async function replaceFileSafely(tempPath: string, targetPath: string): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows refuses to rename over a file another process holds open.
  await fs.rm(targetPath, { force: true });
  await fs.rename(tempPath, targetPath);
}

function isReplaceableRenameError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "EPERM" || error.code === "EEXIST" || error.code === "EBUSY";
}
