import {
  FsError,
  LOCAL_HANDLE,
  LOCAL_HANDLE_ID,
  normalizeError
} from "../../core/src/index";
import type {
  ConnectionState,
  EngineSettings,
  OperationRequest,
  ProviderHandle,
  Sleep
} from "../../core/src/index";
import {
  conflictDecisionSchema,
  engineSettingsSchema,
  operationRequestSchema,
  remoteConnectionSchema,
  sessionRestoreSchema
} from "../../shared/src/index";
import type {
  EngineSettingsInput,
  FileManagerApi,
  PaneLocation,
  RestoredPane
} from "../../shared/src/index";
import { ConnectionManager, InMemoryCredentialResolver } from "./connection-manager";
import type { CredentialResolver, SessionFactory } from "./connection-manager";
import { DirectoryLister } from "./directory-lister";
import { InMemoryEventBus } from "./event-bus";
import { logger as defaultLogger } from "./logger";
import type { EngineLogger } from "./logger";
import { OperationQueue } from "./operation-queue";
import { SimpleOperations } from "./operations";
import { ProviderRegistry } from "./provider-registry";
import { LocalProvider } from "./providers/local-provider";
import { ConflictArbiter } from "./transfer/conflict-arbiter";
import { TransferEngine } from "./transfer/transfer-engine";
import { parsePayload } from "./validation";

export interface FileManagerCoreOptions {
  settings?: EngineSettingsInput;
  credentials?: CredentialResolver;
  sessionFactory?: SessionFactory;
  logger?: EngineLogger;
  sleep?: Sleep;
}

export interface FileManagerCore extends FileManagerApi {
  readonly settings: Readonly<EngineSettings>;
  readonly connections: ConnectionManager;
  readonly lister: DirectoryLister;
}

const freezeRequest = (request: OperationRequest): OperationRequest => {
  return Object.freeze({
    kind: request.kind,
    sources: Object.freeze(request.sources.map((source) => Object.freeze({ ...source }))),
    destination: request.destination ? Object.freeze({ ...request.destination }) : undefined,
    options: Object.freeze({ ...request.options })
  });
};

export const createFileManagerCore = (options: FileManagerCoreOptions = {}): FileManagerCore => {
  const logger = options.logger ?? defaultLogger;
  const settings: EngineSettings = Object.freeze(
    parsePayload(engineSettingsSchema, options.settings ?? {}, "engine settings", logger)
  );

  const events = new InMemoryEventBus(logger);
  const connections = new ConnectionManager({
    settings,
    credentials: options.credentials ?? new InMemoryCredentialResolver(),
    events,
    logger,
    sessionFactory: options.sessionFactory,
    sleep: options.sleep
  });
  const registry = new ProviderRegistry(new LocalProvider(settings.workerCount), connections);
  const lookup = (handleId: string) => registry.resolve(handleId);
  const lister = new DirectoryLister(lookup);
  const arbiter = new ConflictArbiter(events);
  const transfers = new TransferEngine({
    providers: lookup,
    events,
    arbiter,
    logger,
    settings,
    sleep: options.sleep
  });
  const operations = new SimpleOperations({ providers: lookup, events, arbiter, logger });
  const queue = new OperationQueue({
    workerCount: settings.workerCount,
    retainedResults: settings.retainedResults,
    concurrencyOf: (handleId) => registry.concurrencyOf(handleId),
    transfers: (requestId, request, signal) => transfers.execute(requestId, request, signal),
    operations: (requestId, request, signal) => operations.execute(requestId, request, signal),
    events,
    logger
  });

  const connect = async (payload: unknown): Promise<ProviderHandle> => {
    const params = parsePayload(remoteConnectionSchema, payload, "connection parameters", logger);
    return connections.connect(params);
  };

  const restorePane = async (side: "left" | "right", location: PaneLocation): Promise<RestoredPane> => {
    let handle: ProviderHandle | undefined;
    try {
      handle = location.kind === "local" ? LOCAL_HANDLE : await connect(location.connection);
      const requested = location.kind === "local" ? location.path : location.path ?? location.connection.initialPath;
      const provider = registry.resolve(handle.id);
      const entry = await provider.stat(provider.normalize(requested));
      if (entry.kind !== "directory") {
        throw FsError.invalidOperation(`Not a directory: ${entry.path}`, entry.path);
      }
      return { side, handle, path: entry.path };
    } catch (error) {
      logger.warn("[Session] pane not restored", { side, reason: normalizeError(error) });
      return { side, handle, error: normalizeError(error) };
    }
  };

  return {
    settings,
    connections,
    lister,

    connect,

    disconnect: async (handleId) => {
      await connections.disconnect(handleId);
      return { ok: true };
    },

    connectionState: (handleId): ConnectionState => {
      return handleId === LOCAL_HANDLE_ID ? "Ready" : connections.state(handleId);
    },

    list: async (handleId, path, listOptions) => {
      return lister.list(handleId, path, listOptions).collect();
    },

    stat: async (handleId, path) => {
      const provider = registry.resolve(handleId);
      return provider.stat(provider.normalize(path));
    },

    submit: (payload) => {
      const request = parsePayload(operationRequestSchema, payload, "operation request", logger);
      return queue.submit(freezeRequest(request));
    },

    cancel: (requestId) => {
      queue.cancel(requestId);
      return { ok: true };
    },

    status: (requestId) => queue.status(requestId),

    waitFor: (requestId) => queue.waitFor(requestId),

    subscribe: (listener) => events.subscribe(listener),

    resolveConflict: (decisionId, payload) => {
      const decision = parsePayload(conflictDecisionSchema, payload, "conflict decision", logger);
      arbiter.resolve(decisionId, decision);
      return { ok: true };
    },

    restoreSession: async (payload) => {
      const snapshot = parsePayload(sessionRestoreSchema, payload, "session snapshot", logger);
      const restored: RestoredPane[] = [];
      for (const pane of snapshot.panes) {
        restored.push(await restorePane(pane.side, pane.location));
      }
      return restored;
    },

    dispose: async () => {
      queue.cancelAll();
      await queue.drain();
      await connections.disconnectAll();
      logger.info("[Core] disposed");
    }
  };
};
