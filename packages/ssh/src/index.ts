import type { EventEmitter } from "node:events";
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import { createRequire } from "node:module";
import os from "node:os";
import path from "node:path";
import type { Duplex } from "node:stream";
import type { Client, ConnectConfig, SFTPWrapper } from "ssh2";

type AuthType = "password" | "privateKey" | "agent";
type ProxyType = "socks4" | "socks5";

const DEFAULT_READY_TIMEOUT_MS = 10000;
const CONNECTION_CLOSE_TIMEOUT_MS = 2000;
const SFTP_STATUS_EOF = 1;
const require = createRequire(import.meta.url);

interface Ssh2Module {
  Client: new () => Client;
}

interface SocksCreateConnectionOptions {
  command: "connect";
  destination: {
    host: string;
    port: number;
  };
  proxy: {
    host: string;
    port: number;
    type: 4 | 5;
    userId?: string;
    password?: string;
  };
  timeout?: number;
}

interface SocksCreateConnectionResult {
  socket: Duplex;
}

interface SocksModule {
  SocksClient: {
    createConnection: (options: SocksCreateConnectionOptions) => Promise<SocksCreateConnectionResult>;
  };
}

const loadSsh2 = (): Ssh2Module => {
  return require("ssh2") as Ssh2Module;
};

const loadSocks = (): SocksModule => {
  return require("socks") as SocksModule;
};

const normalizeProxyError = (error: unknown): Error => {
  const message = error instanceof Error ? error.message : "Unknown proxy error";
  const lower = message.toLowerCase();

  if (lower.includes("timed out") || lower.includes("timeout")) {
    return new Error("Proxy handshake timed out.");
  }

  if (lower.includes("auth") || lower.includes("username") || lower.includes("password")) {
    return new Error("Proxy authentication failed.");
  }

  return new Error(`Proxy is unreachable: ${message}`);
};

export interface SshProxyOptions {
  type: ProxyType;
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface SshConnectOptions {
  host: string;
  port: number;
  username: string;
  authType: AuthType;
  password?: string;
  privateKey?: string;
  privateKeyPath?: string;
  passphrase?: string;
  agentSock?: string;
  hostFingerprint?: string;
  strictHostKeyChecking?: boolean;
  proxy?: SshProxyOptions;
  readyTimeoutMs?: number;
}

export interface SftpEntryAttributes {
  mode?: number;
  size?: number;
  uid?: number;
  gid?: number;
  atime?: number;
  mtime?: number;
}

export interface RawSftpEntry {
  filename: string;
  longname: string;
  attrs: SftpEntryAttributes;
}

export type SftpHandle = Buffer;
export type SftpOpenFlags = "r" | "w" | "a";

/**
 * One SFTP channel. Every method is a single protocol request/response
 * exchange; callers decide how many may be in flight at once.
 */
export interface SftpSession {
  stat: (pathName: string) => Promise<SftpEntryAttributes>;
  lstat: (pathName: string) => Promise<SftpEntryAttributes>;
  realpath: (pathName: string) => Promise<string>;
  readlink: (pathName: string) => Promise<string>;
  opendir: (pathName: string) => Promise<SftpHandle>;
  /** Next batch of entries from an open directory handle, `null` at end of directory. */
  readdir: (handle: SftpHandle) => Promise<RawSftpEntry[] | null>;
  open: (pathName: string, flags: SftpOpenFlags) => Promise<SftpHandle>;
  /** Empty buffer at end of file */
  read: (handle: SftpHandle, length: number, position: number) => Promise<Buffer>;
  write: (handle: SftpHandle, data: Buffer, position: number) => Promise<void>;
  closeHandle: (handle: SftpHandle) => Promise<void>;
  unlink: (pathName: string) => Promise<void>;
  rmdir: (pathName: string) => Promise<void>;
  mkdir: (pathName: string) => Promise<void>;
  rename: (fromPath: string, toPath: string) => Promise<void>;
  setTimes: (pathName: string, atimeSeconds: number, mtimeSeconds: number) => Promise<void>;
  ping: () => Promise<void>;
  /** Fires once the transport is gone; `reason` is the last transport error, if any. */
  onClose: (listener: (reason?: string) => void) => void;
  close: () => Promise<void>;
}

const expandHomePath = (rawPath: string): string => {
  if (rawPath === "~") {
    return os.homedir();
  }

  if (rawPath.startsWith("~/")) {
    return path.join(os.homedir(), rawPath.slice(2));
  }

  return rawPath;
};

const isEofError = (error: Error): boolean => {
  return "code" in error && error.code === SFTP_STATUS_EOF;
};

/** Resolves `true` when `event` fires and `false` after `timeoutMs`; the timer and listener are removed either way. */
export const waitForEvent = (emitter: EventEmitter, event: string, timeoutMs: number): Promise<boolean> => {
  return new Promise<boolean>((resolve) => {
    const onEvent = () => {
      cleanup();
      resolve(true);
    };
    const timer = setTimeout(() => {
      cleanup();
      resolve(false);
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      emitter.off(event, onEvent);
    };
    emitter.once(event, onEvent);
  });
};

const settle = (resolve: () => void, reject: (error: Error) => void) => {
  return (error: Error | null | undefined): void => {
    if (error) {
      reject(error);
      return;
    }
    resolve();
  };
};

export class SshConnection implements SftpSession {
  private readonly client: Client;
  private readonly readyPromise: Promise<void>;
  private sftp: SFTPWrapper | undefined;
  private closed = false;
  private lastError: Error | undefined;

  private constructor(private readonly options: SshConnectOptions) {
    const ssh2 = loadSsh2();
    this.client = new ssh2.Client();
    this.client.on("error", (error: Error) => {
      this.lastError = error;
    });
    this.readyPromise = this.connect();
  }

  static async connect(options: SshConnectOptions): Promise<SshConnection> {
    const connection = new SshConnection(options);
    try {
      await connection.readyPromise;
      connection.sftp = await connection.openSftp();
    } catch (error) {
      await connection.close();
      throw error;
    }
    return connection;
  }

  private async connect(): Promise<void> {
    const config = await this.buildConfig();

    await new Promise<void>((resolve, reject) => {
      const onReady = () => {
        cleanup();
        resolve();
      };

      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };

      const onEnd = () => {
        cleanup();
        reject(new Error("SSH connection ended before ready"));
      };

      const cleanup = () => {
        this.client.off("ready", onReady);
        this.client.off("error", onError);
        this.client.off("end", onEnd);
      };

      this.client.once("ready", onReady);
      this.client.once("error", onError);
      this.client.once("end", onEnd);
      this.client.connect(config);
    });
  }

  private async buildConfig(): Promise<ConnectConfig> {
    const config: ConnectConfig = {
      host: this.options.host,
      port: this.options.port,
      username: this.options.username,
      readyTimeout: this.options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS
    };

    const proxySocket = await this.createProxySocket();
    if (proxySocket) {
      config.sock = proxySocket;
    }

    if (this.options.strictHostKeyChecking) {
      const expected = this.options.hostFingerprint?.trim();
      if (!expected) {
        throw new Error("Strict host key checking requires host fingerprint");
      }

      config.hostVerifier = (key: Buffer) => {
        const sha256Base64 = createHash("sha256").update(key).digest("base64");
        const sha256Hex = createHash("sha256").update(key).digest("hex");
        const md5Hex = createHash("md5").update(key).digest("hex");
        const md5Colon = md5Hex.match(/.{2}/g)?.join(":") ?? md5Hex;

        const normalizedExpected = expected.toLowerCase();
        if (normalizedExpected.startsWith("sha256:")) {
          return normalizedExpected.slice("sha256:".length) === sha256Base64.toLowerCase();
        }

        if (normalizedExpected.includes(":")) {
          return normalizedExpected === md5Colon.toLowerCase();
        }

        return normalizedExpected === sha256Hex.toLowerCase() || normalizedExpected === md5Hex.toLowerCase();
      };
    }

    if (this.options.authType === "password") {
      if (!this.options.password) {
        throw new Error("Password auth requires password");
      }
      config.password = this.options.password;
      return config;
    }

    if (this.options.authType === "privateKey") {
      let privateKey = this.options.privateKey;
      if (!privateKey && this.options.privateKeyPath) {
        const privateKeyPath = expandHomePath(this.options.privateKeyPath);
        privateKey = await fs.readFile(privateKeyPath, "utf-8");
      }
      if (!privateKey) {
        throw new Error("Private key auth requires privateKeyPath or privateKey");
      }

      config.privateKey = privateKey;
      if (this.options.passphrase) {
        config.passphrase = this.options.passphrase;
      }
      return config;
    }

    config.agent = this.options.agentSock ?? process.env.SSH_AUTH_SOCK;
    if (!config.agent) {
      throw new Error("SSH agent auth requires SSH_AUTH_SOCK");
    }

    return config;
  }

  private async createProxySocket(): Promise<Duplex | undefined> {
    const proxy = this.options.proxy;
    if (!proxy) {
      return undefined;
    }

    const socks = loadSocks();
    const proxyType = proxy.type === "socks4" ? 4 : 5;

    const connectionOptions: SocksCreateConnectionOptions = {
      command: "connect",
      destination: {
        host: this.options.host,
        port: this.options.port
      },
      proxy: {
        host: proxy.host,
        port: proxy.port,
        type: proxyType,
        userId: proxy.username,
        password: proxy.type === "socks5" ? proxy.password : undefined
      },
      timeout: this.options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS
    };

    try {
      const result = await socks.SocksClient.createConnection(connectionOptions);
      return result.socket;
    } catch (error) {
      throw normalizeProxyError(error);
    }
  }

  private async openSftp(): Promise<SFTPWrapper> {
    await this.readyPromise;

    return new Promise((resolve, reject) => {
      this.client.sftp((error, sftp) => {
        if (error || !sftp) {
          reject(error ?? new Error("Failed to open SFTP subsystem"));
          return;
        }
        resolve(sftp);
      });
    });
  }

  private channel(): SFTPWrapper {
    if (this.closed || !this.sftp) {
      throw new Error("Not connected");
    }
    return this.sftp;
  }

  onClose(listener: (reason?: string) => void): void {
    this.client.on("close", () => {
      listener(this.lastError?.message);
    });
  }

  async stat(pathName: string): Promise<SftpEntryAttributes> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.stat(pathName, (error, stats) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(stats);
      });
    });
  }

  async lstat(pathName: string): Promise<SftpEntryAttributes> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.lstat(pathName, (error, stats) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(stats);
      });
    });
  }

  async realpath(pathName: string): Promise<string> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.realpath(pathName, (error, absolutePath) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(absolutePath);
      });
    });
  }

  async readlink(pathName: string): Promise<string> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.readlink(pathName, (error, target) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(target);
      });
    });
  }

  async opendir(pathName: string): Promise<SftpHandle> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.opendir(pathName, (error, handle) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(handle);
      });
    });
  }

  async readdir(handle: SftpHandle): Promise<RawSftpEntry[] | null> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.readdir(handle, (error, list) => {
        if (error) {
          if (isEofError(error)) {
            resolve(null);
            return;
          }
          reject(error);
          return;
        }

        if (!list) {
          resolve(null);
          return;
        }

        resolve(
          list.map((entry) => ({
            filename: entry.filename,
            longname: entry.longname,
            attrs: {
              mode: entry.attrs.mode,
              size: entry.attrs.size,
              uid: entry.attrs.uid,
              gid: entry.attrs.gid,
              atime: entry.attrs.atime,
              mtime: entry.attrs.mtime
            }
          }))
        );
      });
    });
  }

  async open(pathName: string, flags: SftpOpenFlags): Promise<SftpHandle> {
    const sftp = this.channel();
    return new Promise((resolve, reject) => {
      sftp.open(pathName, flags, (error, handle) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(handle);
      });
    });
  }

  async read(handle: SftpHandle, length: number, position: number): Promise<Buffer> {
    const sftp = this.channel();
    const buffer = Buffer.alloc(length);
    return new Promise((resolve, reject) => {
      sftp.read(handle, buffer, 0, length, position, (error, bytesRead) => {
        if (error) {
          if (isEofError(error)) {
            resolve(Buffer.alloc(0));
            return;
          }
          reject(error);
          return;
        }
        resolve(buffer.subarray(0, bytesRead));
      });
    });
  }

  async write(handle: SftpHandle, data: Buffer, position: number): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.write(handle, data, 0, data.length, position, settle(resolve, reject));
    });
  }

  async closeHandle(handle: SftpHandle): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.close(handle, settle(resolve, reject));
    });
  }

  async unlink(pathName: string): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.unlink(pathName, settle(resolve, reject));
    });
  }

  async rmdir(pathName: string): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.rmdir(pathName, settle(resolve, reject));
    });
  }

  async mkdir(pathName: string): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.mkdir(pathName, settle(resolve, reject));
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.rename(fromPath, toPath, settle(resolve, reject));
    });
  }

  async setTimes(pathName: string, atimeSeconds: number, mtimeSeconds: number): Promise<void> {
    const sftp = this.channel();
    await new Promise<void>((resolve, reject) => {
      sftp.utimes(pathName, atimeSeconds, mtimeSeconds, settle(resolve, reject));
    });
  }

  async ping(): Promise<void> {
    await this.realpath(".");
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.sftp?.end();
    this.client.end();

    await waitForEvent(this.client, "close", CONNECTION_CLOSE_TIMEOUT_MS);
  }
}
