import { randomUUID } from "node:crypto";
import {
  FsError,
  connectRetryPolicy,
  normalizeError,
  normalizeMaxConcurrency,
  runWithRetry,
  sleep,
  toFsError
} from "../../core/src/index";
import type {
  ConnectionState,
  EngineSettings,
  RemoteConnectionParams,
  RemoteProviderHandle,
  Sleep
} from "../../core/src/index";
import { SshConnection } from "../../ssh/src/index";
import type { SftpSession, SshConnectOptions } from "../../ssh/src/index";
import { withTimeout } from "./concurrency";
import type { EventBus } from "./event-bus";
import type { EngineLogger } from "./logger";
import { RemoteProvider } from "./providers/remote-provider";

export type AuthType = SshConnectOptions["authType"];

/** Secret material behind a credential reference. Never stored by the core. */
export interface ResolvedCredential {
  authType: AuthType;
  password?: string;
  privateKey?: string;
  privateKeyPath?: string;
  passphrase?: string;
  agentSock?: string;
  hostFingerprint?: string;
  strictHostKeyChecking?: boolean;
}

export interface CredentialResolver {
  resolve: (credentialRef: string) => Promise<ResolvedCredential>;
}

export class InMemoryCredentialResolver implements CredentialResolver {
  private readonly credentials = new Map<string, ResolvedCredential>();

  constructor(entries: Record<string, ResolvedCredential> = {}) {
    for (const [ref, credential] of Object.entries(entries)) {
      this.credentials.set(ref, credential);
    }
  }

  set(credentialRef: string, credential: ResolvedCredential): void {
    this.credentials.set(credentialRef, credential);
  }

  async resolve(credentialRef: string): Promise<ResolvedCredential> {
    const credential = this.credentials.get(credentialRef);
    if (!credential) {
      throw FsError.authentication(`Unknown credential reference: ${credentialRef}`);
    }
    return credential;
  }
}

export type SessionFactory = (options: SshConnectOptions) => Promise<SftpSession>;

export const defaultSessionFactory: SessionFactory = (options) => SshConnection.connect(options);

export interface ConnectionManagerOptions {
  settings: EngineSettings;
  credentials: CredentialResolver;
  events: EventBus;
  logger: EngineLogger;
  sessionFactory?: SessionFactory;
  sleep?: Sleep;
}

interface ConnectionEntry {
  handle: RemoteProviderHandle;
  provider: RemoteProvider;
  state: ConnectionState;
  session: SftpSession | undefined;
  generation: number;
  heartbeat: ReturnType<typeof setInterval> | undefined;
  heartbeatInFlight: boolean;
  reconnecting: Promise<void> | undefined;
}

/**
 * Owns one live SFTP session per remote handle and drives its lifecycle:
 * Disconnected → Connecting → Authenticated → Ready → Degraded | Disconnected.
 */
export class ConnectionManager {
  private readonly entries = new Map<string, ConnectionEntry>();
  private readonly sessionFactory: SessionFactory;
  private readonly sleep: Sleep;

  constructor(private readonly options: ConnectionManagerOptions) {
    this.sessionFactory = options.sessionFactory ?? defaultSessionFactory;
    this.sleep = options.sleep ?? sleep;
  }

  async connect(params: RemoteConnectionParams): Promise<RemoteProviderHandle> {
    const handle: RemoteProviderHandle = Object.freeze({
      id: `sftp-${randomUUID()}`,
      kind: "remote",
      params: Object.freeze({ ...params })
    });
    const maxConcurrency = normalizeMaxConcurrency(params.maxConcurrency, this.options.settings.remoteMaxConcurrency);

    const entry: ConnectionEntry = {
      handle,
      provider: new RemoteProvider(
        handle,
        () => this.getSession(handle.id),
        maxConcurrency,
        (reason) => this.reportFailure(handle.id, reason)
      ),
      state: "Disconnected",
      session: undefined,
      generation: 0,
      heartbeat: undefined,
      heartbeatInFlight: false,
      reconnecting: undefined
    };
    this.entries.set(handle.id, entry);
    this.transition(entry, "Connecting");

    try {
      const session = await runWithRetry(
        () => this.openSession(params),
        connectRetryPolicy(this.options.settings.retry),
        {
          sleep: this.sleep,
          onRetry: (attempt, delayMs, error) => {
            this.options.logger.warn("[SFTP] connect attempt failed, retrying", {
              handleId: handle.id,
              host: params.host,
              attempt,
              delayMs,
              reason: error.message
            });
          }
        }
      );

      if (this.entries.get(handle.id) !== entry) {
        // disconnected while connecting
        await session.close();
        throw FsError.connectivity("Connection closed while connecting");
      }

      this.transition(entry, "Authenticated");
      this.attach(entry, session);
      this.transition(entry, "Ready");
      this.startHeartbeat(entry);
      this.options.logger.info("[SFTP] connected", {
        handleId: handle.id,
        host: params.host,
        port: params.port,
        maxConcurrency
      });
      return handle;
    } catch (error) {
      const reason = toFsError(error);
      this.entries.delete(handle.id);
      this.transition(entry, "Disconnected", reason.message);
      this.options.logger.error("[SFTP] connect failed", {
        handleId: handle.id,
        host: params.host,
        code: reason.code,
        reason: reason.message
      });
      throw reason;
    }
  }

  async disconnect(handleId: string): Promise<void> {
    const entry = this.entries.get(handleId);
    if (!entry) {
      return;
    }

    this.entries.delete(handleId);
    entry.generation += 1;
    this.stopHeartbeat(entry);

    const session = entry.session;
    entry.session = undefined;
    if (session) {
      try {
        await session.close();
      } catch (error) {
        this.options.logger.warn("[SFTP] close failed during disconnect", {
          handleId,
          reason: normalizeError(error)
        });
      }
    }

    this.transition(entry, "Disconnected");
    this.options.logger.info("[SFTP] disconnected", { handleId });
  }

  async disconnectAll(): Promise<void> {
    for (const handleId of [...this.entries.keys()]) {
      await this.disconnect(handleId);
    }
  }

  state(handleId: string): ConnectionState {
    return this.entries.get(handleId)?.state ?? "Disconnected";
  }

  handles(): RemoteProviderHandle[] {
    return [...this.entries.values()].map((entry) => entry.handle);
  }

  /** The provider of a connected handle; undefined once disconnected. */
  getProvider(handleId: string): RemoteProvider | undefined {
    return this.entries.get(handleId)?.provider;
  }

  /**
   * The live session of a handle. While the handle is degraded this waits for
   * the reconnect outcome.
   */
  async getSession(handleId: string): Promise<SftpSession> {
    const entry = this.entries.get(handleId);
    if (!entry) {
      throw FsError.connectivity(`Not connected: ${handleId}`);
    }

    if (entry.reconnecting) {
      await entry.reconnecting;
    }

    if (entry.state !== "Ready" || !entry.session) {
      throw FsError.connectivity(`Not connected: ${handleId}`);
    }

    return entry.session;
  }

  /** Marks the handle degraded and starts its single reconnect attempt. */
  reportFailure(handleId: string, reason: string): void {
    const entry = this.entries.get(handleId);
    if (entry) {
      this.degrade(entry, reason);
    }
  }

  private async openSession(params: RemoteConnectionParams): Promise<SftpSession> {
    const credential = await this.options.credentials.resolve(params.credentialRef);
    const pending = this.sessionFactory({
      host: params.host,
      port: params.port,
      username: params.username,
      proxy: params.proxy,
      readyTimeoutMs: this.options.settings.connectTimeoutMs,
      ...credential
    });

    try {
      return await withTimeout(
        pending,
        this.options.settings.connectTimeoutMs,
        `Connect to ${params.host}:${params.port}`
      );
    } catch (error) {
      void pending.then(
        (late) => late.close(),
        () => undefined
      ).catch((closeError: unknown) => {
        this.options.logger.debug("[SFTP] failed to close late session", { reason: normalizeError(closeError) });
      });
      throw error;
    }
  }

  private attach(entry: ConnectionEntry, session: SftpSession): void {
    entry.session = session;
    entry.generation += 1;
    const generation = entry.generation;

    session.onClose((reason) => {
      if (entry.generation !== generation || this.entries.get(entry.handle.id) !== entry) {
        return;
      }
      this.degrade(entry, reason ?? "Session closed unexpectedly");
    });
  }

  private degrade(entry: ConnectionEntry, reason: string): void {
    if (entry.state !== "Ready") {
      return;
    }

    this.transition(entry, "Degraded", reason);
    this.options.logger.warn("[SFTP] connection degraded", { handleId: entry.handle.id, reason });
    entry.reconnecting = this.reconnect(entry).finally(() => {
      entry.reconnecting = undefined;
    });
  }

  private async reconnect(entry: ConnectionEntry): Promise<void> {
    const stale = entry.session;
    entry.session = undefined;
    entry.generation += 1;
    if (stale) {
      try {
        await stale.close();
      } catch (error) {
        this.options.logger.debug("[SFTP] stale session close failed", {
          handleId: entry.handle.id,
          reason: normalizeError(error)
        });
      }
    }

    try {
      const session = await this.openSession(entry.handle.params);
      if (this.entries.get(entry.handle.id) !== entry) {
        await session.close();
        return;
      }

      this.attach(entry, session);
      this.transition(entry, "Ready");
      this.options.logger.info("[SFTP] reconnected", { handleId: entry.handle.id });
    } catch (error) {
      const reason = toFsError(error);
      this.stopHeartbeat(entry);
      this.entries.delete(entry.handle.id);
      this.transition(entry, "Disconnected", reason.message);
      this.options.logger.error("[SFTP] reconnect failed", {
        handleId: entry.handle.id,
        code: reason.code,
        reason: reason.message
      });
    }
  }

  private startHeartbeat(entry: ConnectionEntry): void {
    this.stopHeartbeat(entry);
    entry.heartbeat = setInterval(() => {
      void this.beat(entry);
    }, this.options.settings.heartbeatIntervalMs);
    entry.heartbeat.unref();
  }

  private stopHeartbeat(entry: ConnectionEntry): void {
    if (entry.heartbeat) {
      clearInterval(entry.heartbeat);
      entry.heartbeat = undefined;
    }
  }

  private async beat(entry: ConnectionEntry): Promise<void> {
    const session = entry.session;
    if (entry.heartbeatInFlight || entry.state !== "Ready" || !session) {
      return;
    }

    entry.heartbeatInFlight = true;
    const generation = entry.generation;
    try {
      await withTimeout(
        entry.provider.ping(session),
        this.options.settings.heartbeatTimeoutMs,
        "Heartbeat"
      );
    } catch (error) {
      if (entry.generation === generation) {
        this.degrade(entry, normalizeError(error));
      }
    } finally {
      entry.heartbeatInFlight = false;
    }
  }

  private transition(entry: ConnectionEntry, state: ConnectionState, error?: string): void {
    entry.state = state;
    this.options.events.emit({
      type: "connectivity",
      handleId: entry.handle.id,
      state,
      error
    });
  }
}
