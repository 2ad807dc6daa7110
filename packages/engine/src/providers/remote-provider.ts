import {
  FsError,
  createEntryMetadata,
  isFsErrorCode,
  joinPath,
  normalizePath,
  parentPath,
  baseName,
  toFsError
} from "../../../core/src/index";
import type { EntryKind, EntryMetadata, RemoteProviderHandle } from "../../../core/src/index";
import type { SftpEntryAttributes, SftpHandle, SftpSession } from "../../../ssh/src/index";
import { Semaphore } from "../concurrency";
import type {
  ByteSink,
  ByteSource,
  FilesystemProvider,
  ProviderCapabilities,
  RemoveOptions,
  WriteMode
} from "./provider";

const S_IFMT = 0o170000;
const S_IFDIR = 0o040000;
const S_IFREG = 0o100000;
const S_IFLNK = 0o120000;

/** Resolves the live session of a handle, waiting out a reconnect when degraded. */
export type SessionSource = () => Promise<SftpSession>;

export type TransportFailureListener = (reason: string) => void;

export const kindFromMode = (mode: number | undefined): EntryKind => {
  switch ((mode ?? 0) & S_IFMT) {
    case S_IFDIR:
      return "directory";
    case S_IFREG:
      return "file";
    case S_IFLNK:
      return "symlink";
    default:
      return "special";
  }
};

/**
 * Gate for protocol exchanges on one session. Every request/response pair on
 * the channel holds a permit, so no more than `maxConcurrency` are in flight.
 */
class SessionGate {
  private readonly semaphore: Semaphore;

  constructor(maxConcurrency: number, private readonly onTransportFailure?: TransportFailureListener) {
    this.semaphore = new Semaphore(maxConcurrency);
  }

  async run<T>(pathName: string, work: () => Promise<T>): Promise<T> {
    try {
      return await this.semaphore.run(work);
    } catch (error) {
      const mapped = toFsError(error, pathName);
      if (mapped.code === "ConnectivityError") {
        this.onTransportFailure?.(mapped.message);
      }
      throw mapped;
    }
  }
}

class RemoteByteSource implements ByteSource {
  private position = 0;
  private closed = false;

  constructor(
    private readonly session: SftpSession,
    private readonly gate: SessionGate,
    private readonly handle: SftpHandle,
    private readonly path: string
  ) {}

  async read(length: number): Promise<Buffer> {
    const chunk = await this.gate.run(this.path, () => this.session.read(this.handle, length, this.position));
    this.position += chunk.length;
    return chunk;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.gate.run(this.path, () => this.session.closeHandle(this.handle));
  }
}

class RemoteByteSink implements ByteSink {
  private written = 0;
  private closed = false;

  constructor(
    private readonly session: SftpSession,
    private readonly gate: SessionGate,
    private readonly handle: SftpHandle,
    private readonly path: string,
    private position: number
  ) {}

  get bytesWritten(): number {
    return this.written;
  }

  async write(chunk: Buffer): Promise<void> {
    const offset = this.position;
    await this.gate.run(this.path, () => this.session.write(this.handle, chunk, offset));
    this.position += chunk.length;
    this.written += chunk.length;
  }

  /** SFTP v3 has no fsync; the server has the data once the handle closes cleanly. */
  async commit(): Promise<void> {
    await this.close();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.gate.run(this.path, () => this.session.closeHandle(this.handle));
  }
}

export class RemoteProvider implements FilesystemProvider {
  readonly capabilities: ProviderCapabilities;
  private readonly gate: SessionGate;

  constructor(
    readonly handle: RemoteProviderHandle,
    private readonly sessions: SessionSource,
    maxConcurrency: number,
    onTransportFailure?: TransportFailureListener
  ) {
    this.capabilities = { maxConcurrency };
    this.gate = new SessionGate(maxConcurrency, onTransportFailure);
  }

  normalize(target: string): string {
    return normalizePath("remote", target);
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
    const session = await this.session(directory);
    const handle = await this.gate.run(directory, () => session.opendir(directory));

    let page: EntryMetadata[] = [];
    let failed = false;
    try {
      for (;;) {
        const batch = await this.gate.run(directory, () => session.readdir(handle));
        if (!batch) {
          break;
        }

        for (const raw of batch) {
          if (raw.filename === "." || raw.filename === "..") {
            continue;
          }

          page.push(this.toEntry(joinPath("remote", directory, raw.filename), raw.attrs));
          if (page.length >= pageSize) {
            yield page;
            page = [];
          }
        }
      }
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      await this.closeDirectory(session, handle, directory, failed);
    }

    if (page.length > 0) {
      yield page;
    }
  }

  async stat(target: string): Promise<EntryMetadata> {
    const entryPath = this.normalize(target);
    const session = await this.session(entryPath);
    const attrs = await this.gate.run(entryPath, () => session.stat(entryPath));
    return this.toEntry(entryPath, attrs);
  }

  async lstat(target: string): Promise<EntryMetadata> {
    const entryPath = this.normalize(target);
    const session = await this.session(entryPath);
    const attrs = await this.gate.run(entryPath, () => session.lstat(entryPath));
    const linkTarget = kindFromMode(attrs.mode) === "symlink"
      ? await this.gate.run(entryPath, () => session.readlink(entryPath))
      : undefined;
    return this.toEntry(entryPath, attrs, linkTarget);
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
    const session = await this.session(entryPath);
    const handle = await this.gate.run(entryPath, () => session.open(entryPath, "r"));
    return new RemoteByteSource(session, this.gate, handle, entryPath);
  }

  async openForWrite(target: string, mode: WriteMode): Promise<ByteSink> {
    const entryPath = this.normalize(target);
    const session = await this.session(entryPath);

    let offset = 0;
    if (mode === "append") {
      const existing = await this.tryStat(entryPath);
      offset = existing?.size ?? 0;
    }

    const handle = await this.gate.run(entryPath, () => session.open(entryPath, mode === "append" ? "a" : "w"));
    return new RemoteByteSink(session, this.gate, handle, entryPath, offset);
  }

  async remove(target: string, options: RemoveOptions = {}): Promise<void> {
    const entryPath = this.normalize(target);
    const entry = await this.lstat(entryPath);
    const session = await this.session(entryPath);

    if (entry.kind !== "directory") {
      await this.gate.run(entryPath, () => session.unlink(entryPath));
      return;
    }

    if (options.recursive) {
      const children = await this.list(entryPath);
      for (const child of children) {
        await this.remove(child.path, options);
      }
    }

    await this.gate.run(entryPath, () => session.rmdir(entryPath));
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    const from = this.normalize(oldPath);
    const to = this.normalize(newPath);
    const session = await this.session(from);
    await this.gate.run(from, () => session.rename(from, to));
  }

  async mkdir(target: string, recursive: boolean): Promise<void> {
    const entryPath = this.normalize(target);
    if (!recursive) {
      await this.createDirectory(entryPath);
      return;
    }

    const missing: string[] = [];
    let cursor = entryPath;
    for (;;) {
      const existing = await this.tryStat(cursor);
      if (existing) {
        if (existing.kind !== "directory") {
          throw FsError.nameCollision(cursor);
        }
        break;
      }

      missing.unshift(cursor);
      const parent = parentPath("remote", cursor);
      if (parent === cursor) {
        break;
      }
      cursor = parent;
    }

    for (const directory of missing) {
      try {
        await this.createDirectory(directory);
      } catch (error) {
        // another worker may have created it in the meantime
        const existing = await this.tryStat(directory);
        if (existing?.kind !== "directory") {
          throw error;
        }
      }
    }
  }

  async setTimes(target: string, atimeMs: number, mtimeMs: number): Promise<void> {
    const entryPath = this.normalize(target);
    const session = await this.session(entryPath);
    await this.gate.run(entryPath, () =>
      session.setTimes(entryPath, Math.round(atimeMs / 1000), Math.round(mtimeMs / 1000))
    );
  }

  /** One round trip on `session`, queued behind in-flight requests like any other. */
  async ping(session: SftpSession): Promise<void> {
    await this.gate.run("/", () => session.ping());
  }

  private async createDirectory(entryPath: string): Promise<void> {
    const session = await this.session(entryPath);
    try {
      await this.gate.run(entryPath, () => session.mkdir(entryPath));
    } catch (error) {
      // SFTP v3 reports an existing entry as a generic failure
      if (!isFsErrorCode(error, "UnknownFailure")) {
        throw error;
      }
      if (await this.tryStat(entryPath)) {
        throw FsError.nameCollision(entryPath);
      }
      throw error;
    }
  }

  private async closeDirectory(
    session: SftpSession,
    handle: SftpHandle,
    directory: string,
    failed: boolean
  ): Promise<void> {
    try {
      await this.gate.run(directory, () => session.closeHandle(handle));
    } catch (error) {
      if (!failed) {
        throw error;
      }
    }
  }

  private async session(entryPath: string): Promise<SftpSession> {
    try {
      return await this.sessions();
    } catch (error) {
      throw toFsError(error, entryPath);
    }
  }

  private toEntry(entryPath: string, attrs: SftpEntryAttributes, linkTarget?: string): EntryMetadata {
    return createEntryMetadata({
      name: baseName("remote", entryPath),
      parentPath: parentPath("remote", entryPath),
      path: entryPath,
      kind: kindFromMode(attrs.mode),
      size: attrs.size ?? 0,
      modifiedAt: (attrs.mtime ?? 0) * 1000,
      permissions: (attrs.mode ?? 0) & 0o7777,
      handleId: this.handle.id,
      linkTarget
    });
  }
}
