import type {
  ConnectionState,
  EntryMetadata,
  ItemOutcome,
  OperationKind,
  OperationResult,
  OperationStatus,
  ProviderHandle
} from "../../core/src/index";
import type {
  ConflictDecisionInput,
  OperationRequestInput,
  RemoteConnectionInput,
  SessionRestoreInput
} from "./contracts";

export interface ProgressEvent {
  type: "progress";
  requestId: string;
  itemIndex: number;
  itemPath: string;
  bytesSoFar: number;
  bytesTotal: number;
  requestBytesSoFar: number;
  requestBytesTotal: number;
}

export interface ItemEvent {
  type: "item";
  requestId: string;
  outcome: ItemOutcome;
}

export interface StatusEvent {
  type: "status";
  requestId: string;
  kind: OperationKind;
  state: "queued" | "running";
}

export interface ResultEvent {
  type: "result";
  requestId: string;
  result: OperationResult;
}

export interface ConflictEvent {
  type: "conflict";
  requestId: string;
  decisionId: string;
  sourcePath: string;
  destinationPath: string;
  existing: EntryMetadata;
}

export interface ConnectivityEvent {
  type: "connectivity";
  handleId: string;
  state: ConnectionState;
  error?: string;
}

export type EngineEvent =
  | ProgressEvent
  | ItemEvent
  | StatusEvent
  | ResultEvent
  | ConflictEvent
  | ConnectivityEvent;

export type EngineEventType = EngineEvent["type"];

export type EventUnsubscribe = () => void;

export interface ListOptions {
  pageSize?: number;
}

export interface RestoredPane {
  side: "left" | "right";
  handle?: ProviderHandle;
  path?: string;
  error?: string;
}

/**
 * Surface consumed by the presentation layer. Nothing here blocks on a
 * running operation: results arrive as events or through `waitFor`.
 */
export interface FileManagerApi {
  connect: (payload: RemoteConnectionInput) => Promise<ProviderHandle>;
  disconnect: (handleId: string) => Promise<{ ok: true }>;
  connectionState: (handleId: string) => ConnectionState;
  list: (handleId: string, path: string, options?: ListOptions) => Promise<EntryMetadata[]>;
  stat: (handleId: string, path: string) => Promise<EntryMetadata>;
  submit: (request: OperationRequestInput) => string;
  cancel: (requestId: string) => { ok: true };
  status: (requestId: string) => OperationStatus;
  waitFor: (requestId: string) => Promise<OperationResult>;
  subscribe: (listener: (event: EngineEvent) => void) => EventUnsubscribe;
  resolveConflict: (decisionId: string, decision: ConflictDecisionInput) => { ok: true };
  restoreSession: (snapshot: SessionRestoreInput) => Promise<RestoredPane[]>;
  dispose: () => Promise<void>;
}
