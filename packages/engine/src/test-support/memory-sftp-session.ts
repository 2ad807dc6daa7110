import path from "node:path";
import type { RawSftpEntry, SftpEntryAttributes, SftpHandle, SftpOpenFlags, SftpSession } from "../../../ssh/src/index";

const SFTP_NO_SUCH_FILE = 2;
const SFTP_PERMISSION_DENIED = 3;
const SFTP_FAILURE = 4;

type MemoryNode =
  | { kind: "file"; data: Buffer; mode: number; atime: number; mtime: number }
  | { kind: "directory"; mode: number; atime: number; mtime: number }
  | { kind: "symlink"; target: string; mode: number; atime: number; mtime: number };

type OpenHandle =
  | { kind: "directory"; path: string; pending: RawSftpEntry[] }
  | { kind: "file"; path: string };

export type FaultInjector = (operation: string, pathName: string) => Error | undefined;

const sftpError = (code: number, message: string): Error => {
  return Object.assign(new Error(message), { code });
};

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * In-process stand-in for an SFTP channel. Tracks how many requests overlap
 * and can be told to fail requests or drop the connection.
 */
export class MemorySftpSession implements SftpSession {
  readonly calls: string[] = [];
  peakInFlight = 0;
  latencyMs = 0;
  readdirBatchSize = 100;
  deniedPaths = new Set<string>();
  fault: FaultInjector | undefined;

  private readonly nodes: Map<string, MemoryNode>;
  private readonly handles = new Map<string, OpenHandle>();
  private readonly closeListeners: Array<(reason?: string) => void> = [];
  private nextHandle = 1;
  private inFlight = 0;
  private closed = false;

  constructor(nodes?: Map<string, MemoryNode>) {
    this.nodes = nodes ?? new Map<string, MemoryNode>();
    if (!this.nodes.has("/")) {
      this.nodes.set("/", { kind: "directory", mode: 0o040755, atime: nowSeconds(), mtime: nowSeconds() });
    }
  }

  /** A second session over the same tree, as after a reconnect. */
  reopen(): MemorySftpSession {
    return new MemorySftpSession(this.nodes);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  putDirectory(pathName: string, mtime = nowSeconds()): void {
    const target = path.posix.normalize(pathName);
    const parent = path.posix.dirname(target);
    if (parent !== target && !this.nodes.has(parent)) {
      this.putDirectory(parent, mtime);
    }
    this.nodes.set(target, { kind: "directory", mode: 0o040755, atime: mtime, mtime });
  }

  putFile(pathName: string, content: string | Buffer, mtime = nowSeconds()): void {
    const target = path.posix.normalize(pathName);
    this.putDirectory(path.posix.dirname(target));
    const data = typeof content === "string" ? Buffer.from(content) : Buffer.from(content);
    this.nodes.set(target, { kind: "file", data, mode: 0o100644, atime: mtime, mtime });
  }

  putSymlink(pathName: string, target: string): void {
    const linkPath = path.posix.normalize(pathName);
    this.putDirectory(path.posix.dirname(linkPath));
    this.nodes.set(linkPath, { kind: "symlink", target, mode: 0o120777, atime: nowSeconds(), mtime: nowSeconds() });
  }

  readFile(pathName: string): Buffer | undefined {
    const node = this.nodes.get(path.posix.normalize(pathName));
    return node?.kind === "file" ? node.data : undefined;
  }

  modifiedAt(pathName: string): number | undefined {
    return this.nodes.get(path.posix.normalize(pathName))?.mtime;
  }

  has(pathName: string): boolean {
    return this.nodes.has(path.posix.normalize(pathName));
  }

  /** Every path in the tree except the root, sorted. */
  paths(): string[] {
    return [...this.nodes.keys()].filter((key) => key !== "/").sort();
  }

  get openHandleCount(): number {
    return this.handles.size;
  }

  /** Simulate the transport going away. */
  drop(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.handles.clear();
    for (const listener of this.closeListeners) {
      listener();
    }
  }

  async stat(pathName: string): Promise<SftpEntryAttributes> {
    return this.request("stat", pathName, () => this.attributes(this.resolve(pathName)));
  }

  async lstat(pathName: string): Promise<SftpEntryAttributes> {
    return this.request("lstat", pathName, () => this.attributes(this.node(pathName)));
  }

  async realpath(pathName: string): Promise<string> {
    return this.request("realpath", pathName, () => path.posix.resolve("/", pathName));
  }

  async readlink(pathName: string): Promise<string> {
    return this.request("readlink", pathName, () => {
      const node = this.node(pathName);
      if (node.kind !== "symlink") {
        throw sftpError(SFTP_FAILURE, "Not a symbolic link");
      }
      return node.target;
    });
  }

  async opendir(pathName: string): Promise<SftpHandle> {
    return this.request("opendir", pathName, () => {
      const directory = path.posix.normalize(pathName);
      const node = this.resolve(directory);
      if (node.kind !== "directory") {
        throw sftpError(SFTP_FAILURE, "Not a directory");
      }

      const pending: RawSftpEntry[] = [
        { filename: ".", longname: ".", attrs: this.attributes(node) },
        { filename: "..", longname: "..", attrs: this.attributes(node) }
      ];
      for (const childPath of this.children(directory)) {
        const child = this.nodes.get(childPath);
        if (child) {
          const filename = path.posix.basename(childPath);
          pending.push({ filename, longname: filename, attrs: this.attributes(child) });
        }
      }
      return this.allocate({ kind: "directory", path: directory, pending });
    });
  }

  async readdir(handle: SftpHandle): Promise<RawSftpEntry[] | null> {
    const open = this.handles.get(handle.toString());
    return this.request("readdir", open?.path ?? "", () => {
      if (!open || open.kind !== "directory") {
        throw sftpError(SFTP_FAILURE, "Invalid handle");
      }
      if (open.pending.length === 0) {
        return null;
      }
      return open.pending.splice(0, this.readdirBatchSize);
    });
  }

  async open(pathName: string, flags: SftpOpenFlags): Promise<SftpHandle> {
    return this.request("open", pathName, () => {
      const target = path.posix.normalize(pathName);
      const existing = this.nodes.get(target);

      if (flags === "r") {
        const node = this.resolve(target);
        if (node.kind !== "file") {
          throw sftpError(SFTP_FAILURE, "Not a regular file");
        }
        return this.allocate({ kind: "file", path: this.resolvePath(target) });
      }

      const parent = this.nodes.get(path.posix.dirname(target));
      if (!parent || parent.kind !== "directory") {
        throw sftpError(SFTP_NO_SUCH_FILE, "No such file");
      }
      if (existing && existing.kind !== "file") {
        throw sftpError(SFTP_FAILURE, "Not a regular file");
      }

      if (!existing || flags === "w") {
        this.nodes.set(target, {
          kind: "file",
          data: Buffer.alloc(0),
          mode: 0o100644,
          atime: nowSeconds(),
          mtime: nowSeconds()
        });
      }
      return this.allocate({ kind: "file", path: target });
    });
  }

  async read(handle: SftpHandle, length: number, position: number): Promise<Buffer> {
    const open = this.handles.get(handle.toString());
    return this.request("read", open?.path ?? "", () => {
      const node = open ? this.nodes.get(open.path) : undefined;
      if (!node || node.kind !== "file") {
        throw sftpError(SFTP_FAILURE, "Invalid handle");
      }
      return Buffer.from(node.data.subarray(position, position + length));
    });
  }

  async write(handle: SftpHandle, data: Buffer, position: number): Promise<void> {
    const open = this.handles.get(handle.toString());
    await this.request("write", open?.path ?? "", () => {
      const node = open ? this.nodes.get(open.path) : undefined;
      if (!node || node.kind !== "file") {
        throw sftpError(SFTP_FAILURE, "Invalid handle");
      }

      const size = Math.max(node.data.length, position + data.length);
      const next = Buffer.alloc(size);
      node.data.copy(next, 0);
      data.copy(next, position);
      node.data = next;
      node.mtime = nowSeconds();
    });
  }

  async closeHandle(handle: SftpHandle): Promise<void> {
    const key = handle.toString();
    await this.request("close", this.handles.get(key)?.path ?? "", () => {
      if (!this.handles.delete(key)) {
        throw sftpError(SFTP_FAILURE, "Invalid handle");
      }
    });
  }

  async unlink(pathName: string): Promise<void> {
    await this.request("unlink", pathName, () => {
      const target = path.posix.normalize(pathName);
      const node = this.node(target);
      if (node.kind === "directory") {
        throw sftpError(SFTP_FAILURE, "Is a directory");
      }
      this.nodes.delete(target);
    });
  }

  async rmdir(pathName: string): Promise<void> {
    await this.request("rmdir", pathName, () => {
      const target = path.posix.normalize(pathName);
      const node = this.node(target);
      if (node.kind !== "directory" || this.children(target).length > 0) {
        throw sftpError(SFTP_FAILURE, "Failure");
      }
      this.nodes.delete(target);
    });
  }

  async mkdir(pathName: string): Promise<void> {
    await this.request("mkdir", pathName, () => {
      const target = path.posix.normalize(pathName);
      if (this.nodes.has(target)) {
        throw sftpError(SFTP_FAILURE, "Failure");
      }
      const parent = this.nodes.get(path.posix.dirname(target));
      if (!parent || parent.kind !== "directory") {
        throw sftpError(SFTP_NO_SUCH_FILE, "No such file");
      }
      this.nodes.set(target, { kind: "directory", mode: 0o040755, atime: nowSeconds(), mtime: nowSeconds() });
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await this.request("rename", fromPath, () => {
      const from = path.posix.normalize(fromPath);
      const to = path.posix.normalize(toPath);
      this.node(from);
      if (this.nodes.has(to)) {
        throw sftpError(SFTP_FAILURE, "Failure");
      }

      const moved = [...this.nodes.entries()].filter(([key]) => key === from || key.startsWith(`${from}/`));
      for (const [key] of moved) {
        this.nodes.delete(key);
      }
      for (const [key, node] of moved) {
        this.nodes.set(`${to}${key.slice(from.length)}`, node);
      }
    });
  }

  async setTimes(pathName: string, atimeSeconds: number, mtimeSeconds: number): Promise<void> {
    await this.request("setstat", pathName, () => {
      const node = this.resolve(pathName);
      node.atime = atimeSeconds;
      node.mtime = mtimeSeconds;
    });
  }

  async ping(): Promise<void> {
    await this.realpath(".");
  }

  onClose(listener: (reason?: string) => void): void {
    this.closeListeners.push(listener);
  }

  async close(): Promise<void> {
    this.drop();
  }

  private async request<T>(operation: string, pathName: string, work: () => T): Promise<T> {
    if (this.closed) {
      throw new Error("Not connected");
    }

    this.calls.push(`${operation} ${pathName}`);
    this.inFlight += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
      } else {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      if (this.closed) {
        throw new Error("Not connected");
      }

      const injected = this.fault?.(operation, path.posix.normalize(pathName || "/"));
      if (injected) {
        throw injected;
      }

      if (this.deniedPaths.has(path.posix.normalize(pathName || "/"))) {
        throw sftpError(SFTP_PERMISSION_DENIED, "Permission denied");
      }

      return work();
    } finally {
      this.inFlight -= 1;
    }
  }

  private allocate(open: OpenHandle): SftpHandle {
    const key = `h${this.nextHandle}`;
    this.nextHandle += 1;
    this.handles.set(key, open);
    return Buffer.from(key);
  }

  private children(directory: string): string[] {
    return [...this.nodes.keys()]
      .filter((key) => key !== directory && path.posix.dirname(key) === directory)
      .sort();
  }

  private node(pathName: string): MemoryNode {
    const node = this.nodes.get(path.posix.normalize(pathName));
    if (!node) {
      throw sftpError(SFTP_NO_SUCH_FILE, "No such file");
    }
    return node;
  }

  private resolvePath(pathName: string, depth = 0): string {
    const target = path.posix.normalize(pathName);
    const node = this.node(target);
    if (node.kind !== "symlink") {
      return target;
    }
    if (depth > 8) {
      throw sftpError(SFTP_FAILURE, "Too many levels of symbolic links");
    }
    return this.resolvePath(path.posix.resolve(path.posix.dirname(target), node.target), depth + 1);
  }

  private resolve(pathName: string): MemoryNode {
    return this.node(this.resolvePath(pathName));
  }

  private attributes(node: MemoryNode): SftpEntryAttributes {
    return {
      mode: node.mode,
      size: node.kind === "file" ? node.data.length : node.kind === "symlink" ? node.target.length : 4096,
      uid: 1000,
      gid: 1000,
      atime: node.atime,
      mtime: node.mtime
    };
  }
}
