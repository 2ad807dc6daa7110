import type { Dir, Stats } from "node:fs";
import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import {
  LOCAL_HANDLE,
  baseName,
  createEntryMetadata,
  joinPath,
  normalizePath,
  parentPath,
  toFsError,
  isFsErrorCode
} from "../../../core/src/index";
import type { EntryKind, EntryMetadata, LocalProviderHandle } from "../../../core/src/index";
import type {
  ByteSink,
  ByteSource,
  FilesystemProvider,
  ProviderCapabilities,
  RemoveOptions,
  WriteMode
} from "./provider";

const kindFromStats = (stats: Stats): EntryKind => {
  if (stats.isSymbolicLink()) {
    return "symlink";
  }
  if (stats.isDirectory()) {
    return "directory";
  }
  if (stats.isFile()) {
    return "file";
  }
  return "special";
};

class LocalByteSource implements ByteSource {
  private closed = false;

  constructor(private readonly file: FileHandle, private readonly path: string) {}

  async read(length: number): Promise<Buffer> {
    const buffer = Buffer.alloc(length);
    try {
      const { bytesRead } = await this.file.read(buffer, 0, length, null);
      return buffer.subarray(0, bytesRead);
    } catch (error) {
      throw toFsError(error, this.path);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.file.close();
  }
}

class LocalByteSink implements ByteSink {
  private closed = false;
  private written = 0;

  constructor(private readonly file: FileHandle, private readonly path: string) {}

  get bytesWritten(): number {
    return this.written;
  }

  async write(chunk: Buffer): Promise<void> {
    let offset = 0;
    try {
      while (offset < chunk.length) {
        const { bytesWritten } = await this.file.write(chunk, offset, chunk.length - offset, null);
        offset += bytesWritten;
      }
    } catch (error) {
      throw toFsError(error, this.path);
    } finally {
      this.written += offset;
    }
  }

  async commit(): Promise<void> {
    try {
      await this.file.datasync();
    } catch (error) {
      throw toFsError(error, this.path);
    }
    await this.close();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.file.close();
  }
}

const lstatIfPresent = async (entryPath: string): Promise<Stats | undefined> => {
  try {
    return await fs.lstat(entryPath);
  } catch (error) {
    if (isFsErrorCode(toFsError(error, entryPath), "NotFound")) {
      return undefined;
    }
    throw error;
  }
};

export class LocalProvider implements FilesystemProvider {
  readonly handle: LocalProviderHandle = LOCAL_HANDLE;
  readonly capabilities: ProviderCapabilities;

  constructor(maxConcurrency: number) {
    this.capabilities = { maxConcurrency };
  }

  normalize(target: string): string {
    return normalizePath("local", target);
  }

  async list(target: string): Promise<EntryMetadata[]> {
    const entries: EntryMetadata[] = [];
    for await (const page of this.listPages(target, 256)) {
      entries.push(...page);
    }
    return entries;
  }

  async *listPages(target: string, pageSize: number): AsyncGenerator<EntryMetadata[]> {
    const directory = this.normalize(target);
    let handle: Dir;
    try {
      handle = await fs.opendir(directory);
    } catch (error) {
      throw toFsError(error, directory);
    }

    let page: EntryMetadata[] = [];
    try {
      // the iterator closes the directory handle on completion or early exit
      for await (const dirent of handle) {
        const entryPath = joinPath("local", directory, dirent.name);
        const stats = await lstatIfPresent(entryPath);
        if (!stats) {
          // removed after the directory was read
          continue;
        }
        page.push(this.toEntry(entryPath, stats));
        if (page.length >= pageSize) {
          yield page;
          page = [];
        }
      }
    } catch (error) {
      throw toFsError(error, directory);
    }

    if (page.length > 0) {
      yield page;
    }
  }

  async stat(target: string): Promise<EntryMetadata> {
    const entryPath = this.normalize(target);
    try {
      return this.toEntry(entryPath, await fs.stat(entryPath));
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async lstat(target: string): Promise<EntryMetadata> {
    const entryPath = this.normalize(target);
    try {
      const stats = await fs.lstat(entryPath);
      const linkTarget = stats.isSymbolicLink() ? await fs.readlink(entryPath) : undefined;
      return this.toEntry(entryPath, stats, linkTarget);
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async tryStat(target: string): Promise<EntryMetadata | undefined> {
    try {
      return await this.lstat(target);
    } catch (error) {
      if (isFsErrorCode(error, "NotFound")) {
        return undefined;
      }
      throw error;
    }
  }

  async openForRead(target: string): Promise<ByteSource> {
    const entryPath = this.normalize(target);
    try {
      return new LocalByteSource(await fs.open(entryPath, "r"), entryPath);
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async openForWrite(target: string, mode: WriteMode): Promise<ByteSink> {
    const entryPath = this.normalize(target);
    try {
      return new LocalByteSink(await fs.open(entryPath, mode === "append" ? "a" : "w"), entryPath);
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async remove(target: string, options: RemoveOptions = {}): Promise<void> {
    const entryPath = this.normalize(target);
    try {
      const stats = await fs.lstat(entryPath);
      if (!stats.isDirectory()) {
        await fs.unlink(entryPath);
        return;
      }

      if (options.recursive) {
        await fs.rm(entryPath, { recursive: true });
        return;
      }

      await fs.rmdir(entryPath);
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const from = this.normalize(oldPath);
    try {
      await fs.rename(from, this.normalize(newPath));
    } catch (error) {
      throw toFsError(error, from);
    }
  }

  async mkdir(target: string, recursive: boolean): Promise<void> {
    const entryPath = this.normalize(target);
    try {
      await fs.mkdir(entryPath, { recursive });
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  async setTimes(target: string, atimeMs: number, mtimeMs: number): Promise<void> {
    const entryPath = this.normalize(target);
    try {
      await fs.utimes(entryPath, atimeMs / 1000, mtimeMs / 1000);
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  private toEntry(entryPath: string, stats: Stats, linkTarget?: string): EntryMetadata {
    return createEntryMetadata({
      name: baseName("local", entryPath),
      parentPath: parentPath("local", entryPath),
      path: entryPath,
      kind: kindFromStats(stats),
      size: stats.size,
      modifiedAt: Math.round(stats.mtimeMs),
      permissions: stats.mode & 0o7777,
      handleId: this.handle.id,
      linkTarget
    });
  }
}
