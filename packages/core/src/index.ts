export * from "./errors";
export * from "./path-identity";
export * from "./retry-policy";

export type ProviderKind = "local" | "remote";
export type ProxyType = "socks4" | "socks5";

export interface ProxyOptions {
  type: ProxyType;
  host: string;
  port: number;
  username?: string;
  password?: string;
}

/** Connection parameters of a remote root. `credentialRef` is opaque to the core. */
export interface RemoteConnectionParams {
  host: string;
  port: number;
  username: string;
  credentialRef: string;
  initialPath: string;
  /** Permits more than one in-flight protocol request per session when > 1 */
  maxConcurrency?: number;
  proxy?: ProxyOptions;
}

export interface LocalProviderHandle {
  readonly id: "local";
  readonly kind: "local";
}

export interface RemoteProviderHandle {
  readonly id: string;
  readonly kind: "remote";
  readonly params: Readonly<RemoteConnectionParams>;
}

export type ProviderHandle = LocalProviderHandle | RemoteProviderHandle;

export const LOCAL_HANDLE_ID = "local";

export const LOCAL_HANDLE: LocalProviderHandle = Object.freeze({
  id: LOCAL_HANDLE_ID,
  kind: "local"
});

export type EntryKind = "file" | "directory" | "symlink" | "special";

export interface EntryMetadata {
  readonly name: string;
  readonly parentPath: string;
  readonly path: string;
  readonly kind: EntryKind;
  readonly size: number;
  /** Milliseconds since epoch */
  readonly modifiedAt: number;
  /** Permission bits (mode & 0o7777) */
  readonly permissions: number;
  readonly handleId: string;
  /** Listings never resolve link targets; stays undefined unless a provider read it explicitly */
  readonly linkTarget?: string;
}

export const createEntryMetadata = (entry: EntryMetadata): EntryMetadata => {
  return Object.freeze({ ...entry });
};

export type OperationKind = "list" | "copy" | "move" | "delete" | "rename" | "mkdir";
export type OverwritePolicy = "skip" | "overwrite" | "rename-with-suffix" | "prompt";

export interface ProviderPath {
  handleId: string;
  path: string;
}

export interface OperationOptions {
  overwritePolicy: OverwritePolicy;
  recursive: boolean;
  preserveTimestamps: boolean;
  abortOnFirstError: boolean;
}

export interface OperationRequest {
  readonly kind: OperationKind;
  readonly sources: readonly ProviderPath[];
  readonly destination?: ProviderPath;
  readonly options: OperationOptions;
}

export type ItemStatus = "succeeded" | "skipped" | "failed" | "cancelled";
export type ItemKind = "file" | "directory";

export interface ItemError {
  code: string;
  message: string;
  cause?: string;
}

export interface ItemOutcome {
  readonly index: number;
  readonly sourcePath: string;
  readonly destinationPath?: string;
  readonly kind: ItemKind;
  readonly status: ItemStatus;
  readonly bytes: number;
  readonly error?: ItemError;
  /** Set by list operations */
  readonly entryCount?: number;
}

export type OperationResultStatus = "completed" | "cancelled" | "failed";

export interface OperationSummary {
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
}

export interface OperationResult {
  readonly requestId: string;
  readonly kind: OperationKind;
  readonly status: OperationResultStatus;
  readonly items: readonly ItemOutcome[];
  readonly summary: OperationSummary;
  readonly bytesTransferred: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly wallTimeMs: number;
}

export type OperationStatus =
  | { state: "queued" }
  | { state: "running" }
  | { state: "terminal"; result: OperationResult };

export type ConnectionState =
  | "Disconnected"
  | "Connecting"
  | "Authenticated"
  | "Ready"
  | "Degraded";

export interface RetrySettings {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export interface EngineSettings {
  chunkSizeBytes: number;
  workerCount: number;
  remoteMaxConcurrency: number;
  retry: RetrySettings;
  connectTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  /** Finished requests kept for `status`/`waitFor` before the oldest are dropped */
  retainedResults: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  chunkSizeBytes: 64 * 1024,
  workerCount: 4,
  remoteMaxConcurrency: 1,
  retry: {
    attempts: 3,
    baseDelayMs: 1000,
    factor: 2,
    maxDelayMs: 30_000
  },
  connectTimeoutMs: 10_000,
  heartbeatIntervalMs: 15_000,
  heartbeatTimeoutMs: 10_000,
  retainedResults: 500
};

const normalizeIntInRange = (
  value: number | undefined,
  fallback: number,
  min: number,
  max: number
): number => {
  if (value === undefined || !Number.isInteger(value)) {
    return fallback;
  }

  if (value < min || value > max) {
    return fallback;
  }

  return value;
};

export const normalizeMaxConcurrency = (value: number | undefined, fallback: number): number => {
  return normalizeIntInRange(value, fallback, 1, 64);
};

export const emptySummary = (): OperationSummary => ({
  succeeded: 0,
  skipped: 0,
  failed: 0,
  cancelled: 0
});

export const summarizeOutcomes = (items: readonly ItemOutcome[]): OperationSummary => {
  const summary = emptySummary();
  for (const item of items) {
    summary[item.status] += 1;
  }
  return summary;
};
