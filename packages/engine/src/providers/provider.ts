import type { EntryMetadata, ProviderHandle } from "../../../core/src/index";

export type WriteMode = "truncate" | "append";

export interface ByteSource {
  /** Up to `length` bytes; an empty buffer means end of file. */
  read(length: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface ByteSink {
  readonly bytesWritten: number;
  write(chunk: Buffer): Promise<void>;
  /** Flush and close; the written bytes are durable once this resolves. */
  commit(): Promise<void>;
  close(): Promise<void>;
}

export interface ProviderCapabilities {
  /** Protocol operations that may be in flight at once against this provider */
  maxConcurrency: number;
}

export interface RemoveOptions {
  recursive?: boolean;
}

/**
 * Capability surface shared by every filesystem backend. Callers never branch
 * on the provider kind; a new backend implements this interface.
 */
export interface FilesystemProvider {
  readonly handle: ProviderHandle;
  readonly capabilities: ProviderCapabilities;
  normalize(path: string): string;
  list(path: string): Promise<EntryMetadata[]>;
  listPages(path: string, pageSize: number): AsyncIterable<EntryMetadata[]>;
  /** Follows symbolic links */
  stat(path: string): Promise<EntryMetadata>;
  /** Does not follow symbolic links; reads the link target when there is one */
  lstat(path: string): Promise<EntryMetadata>;
  /** lstat, or undefined when nothing exists at `path` */
  tryStat(path: string): Promise<EntryMetadata | undefined>;
  openForRead(path: string): Promise<ByteSource>;
  openForWrite(path: string, mode: WriteMode): Promise<ByteSink>;
  remove(path: string, options?: RemoveOptions): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  mkdir(path: string, recursive: boolean): Promise<void>;
  setTimes(path: string, atimeMs: number, mtimeMs: number): Promise<void>;
}

export const withByteSource = async <T>(
  provider: FilesystemProvider,
  path: string,
  work: (source: ByteSource) => Promise<T>
): Promise<T> => {
  const source = await provider.openForRead(path);
  let result: T;
  try {
    result = await work(source);
  } catch (error) {
    try {
      await source.close();
    } catch {
      throw error;
    }
    throw error;
  }

  await source.close();
  return result;
};

export const withByteSink = async <T>(
  provider: FilesystemProvider,
  path: string,
  mode: WriteMode,
  work: (sink: ByteSink) => Promise<T>
): Promise<T> => {
  const sink = await provider.openForWrite(path, mode);
  let result: T;
  try {
    result = await work(sink);
  } catch (error) {
    try {
      await sink.close();
    } catch {
      throw error;
    }
    throw error;
  }

  await sink.close();
  return result;
};
