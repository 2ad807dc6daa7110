import {
  FsError,
  baseName,
  isFsErrorCode,
  isValidEntryName,
  joinPath,
  parentPath,
  toFsError,
  withCollisionSuffix
} from "../../core/src/index";
import type {
  EntryMetadata,
  ItemKind,
  ItemOutcome,
  OperationRequest,
  OperationResult,
  OperationResultStatus,
  ProviderPath
} from "../../core/src/index";
import type { ConflictDecision } from "../../shared/src/index";
import type { ProviderLookup } from "./directory-lister";
import type { EventBus } from "./event-bus";
import type { EngineLogger } from "./logger";
import type { FilesystemProvider } from "./providers/provider";
import { buildResult, cancelledError, skippedDirectoryError, toItemError } from "./result";
import type { ConflictArbiter } from "./transfer/conflict-arbiter";

export interface SimpleOperationsOptions {
  providers: ProviderLookup;
  events: EventBus;
  arbiter: ConflictArbiter;
  logger: EngineLogger;
}

interface RunState {
  requestId: string;
  request: OperationRequest;
  signal: AbortSignal;
  aborted: boolean;
  outcomes: ItemOutcome[];
}

/**
 * list, delete, rename and mkdir. Each source is one item; nothing is retried.
 */
export class SimpleOperations {
  constructor(private readonly options: SimpleOperationsOptions) {}

  async execute(requestId: string, request: OperationRequest, signal: AbortSignal): Promise<OperationResult> {
    const startedAt = Date.now();
    const state: RunState = { requestId, request, signal, aborted: false, outcomes: [] };

    for (const [index, source] of request.sources.entries()) {
      if (signal.aborted || state.aborted) {
        this.record(state, {
          index,
          sourcePath: source.path,
          kind: "file",
          status: "cancelled",
          bytes: 0,
          error: cancelledError(source.path)
        });
        continue;
      }

      this.record(state, await this.runItem(state, index, source));
    }

    this.options.arbiter.release(requestId);
    const status: OperationResultStatus = signal.aborted ? "cancelled" : state.aborted ? "failed" : "completed";
    const result = buildResult(requestId, request.kind, status, state.outcomes, startedAt);
    this.options.logger.info("[Operation] finished", {
      requestId,
      kind: request.kind,
      status,
      ...result.summary
    });
    return result;
  }

  private async runItem(state: RunState, index: number, source: ProviderPath): Promise<ItemOutcome> {
    let sourcePath = source.path;
    let kind: ItemKind = state.request.kind === "mkdir" ? "directory" : "file";
    try {
      const provider = this.options.providers(source.handleId);
      sourcePath = provider.normalize(source.path);

      switch (state.request.kind) {
        case "list":
          return await this.list(provider, index, sourcePath);
        case "delete": {
          const entry = await provider.lstat(sourcePath);
          kind = entry.kind === "directory" ? "directory" : "file";
          return await this.remove(state, provider, index, sourcePath, kind);
        }
        case "rename": {
          const entry = await provider.lstat(sourcePath);
          kind = entry.kind === "directory" ? "directory" : "file";
          return await this.rename(state, provider, index, sourcePath, kind);
        }
        case "mkdir":
          return await this.mkdir(state, provider, index, sourcePath);
        case "copy":
        case "move":
          throw FsError.invalidOperation(`${state.request.kind} is handled by the transfer engine`);
      }
    } catch (error) {
      if (isFsErrorCode(error, "Cancelled")) {
        return { index, sourcePath, kind, status: "cancelled", bytes: 0, error: cancelledError(sourcePath) };
      }
      return { index, sourcePath, kind, status: "failed", bytes: 0, error: toItemError(toFsError(error, sourcePath)) };
    }
  }

  private async list(provider: FilesystemProvider, index: number, sourcePath: string): Promise<ItemOutcome> {
    const entries = await provider.list(sourcePath);
    return {
      index,
      sourcePath,
      kind: "directory",
      status: "succeeded",
      bytes: 0,
      entryCount: entries.length
    };
  }

  private async remove(
    state: RunState,
    provider: FilesystemProvider,
    index: number,
    sourcePath: string,
    kind: ItemKind
  ): Promise<ItemOutcome> {
    if (kind === "directory" && !state.request.options.recursive) {
      return { index, sourcePath, kind, status: "skipped", bytes: 0, error: skippedDirectoryError(sourcePath) };
    }

    await provider.remove(sourcePath, { recursive: state.request.options.recursive });
    return { index, sourcePath, kind, status: "succeeded", bytes: 0 };
  }

  private async rename(
    state: RunState,
    provider: FilesystemProvider,
    index: number,
    sourcePath: string,
    kind: ItemKind
  ): Promise<ItemOutcome> {
    const destination = state.request.destination;
    if (!destination || destination.handleId !== provider.handle.id) {
      throw FsError.invalidOperation("rename needs a destination on the same provider", sourcePath);
    }

    const target = provider.normalize(destination.path);
    if (!isValidEntryName(baseName(provider.handle.kind, target))) {
      throw FsError.invalidOperation(`Invalid name: ${baseName(provider.handle.kind, target)}`, target);
    }

    if (target === sourcePath) {
      return { index, sourcePath, destinationPath: target, kind, status: "succeeded", bytes: 0 };
    }

    const existing = await provider.tryStat(target);
    if (!existing) {
      await provider.rename(sourcePath, target);
      return { index, sourcePath, destinationPath: target, kind, status: "succeeded", bytes: 0 };
    }

    const action = await this.collisionAction(state, sourcePath, target, existing);
    switch (action) {
      case "skip":
        return {
          index,
          sourcePath,
          destinationPath: target,
          kind,
          status: "skipped",
          bytes: 0,
          error: { code: "NameCollision", message: `Destination already exists: ${target}` }
        };
      case "decline":
        throw FsError.nameCollision(target);
      case "overwrite":
        if (existing.kind === "directory") {
          throw FsError.nameCollision(target);
        }
        await provider.remove(target);
        await provider.rename(sourcePath, target);
        return { index, sourcePath, destinationPath: target, kind, status: "succeeded", bytes: 0 };
      case "rename": {
        const free = await this.freeName(provider, target);
        await provider.rename(sourcePath, free);
        return { index, sourcePath, destinationPath: free, kind, status: "succeeded", bytes: 0 };
      }
    }
  }

  private async collisionAction(
    state: RunState,
    sourcePath: string,
    target: string,
    existing: EntryMetadata
  ): Promise<ConflictDecision["action"]> {
    switch (state.request.options.overwritePolicy) {
      case "skip":
        return "skip";
      case "overwrite":
        return "overwrite";
      case "rename-with-suffix":
        return "rename";
      case "prompt": {
        const decision = await this.options.arbiter.decide({
          requestId: state.requestId,
          sourcePath,
          destinationPath: target,
          existing,
          signal: state.signal
        });
        return decision.action;
      }
    }
  }

  private async mkdir(
    state: RunState,
    provider: FilesystemProvider,
    index: number,
    sourcePath: string
  ): Promise<ItemOutcome> {
    const name = baseName(provider.handle.kind, sourcePath);
    if (parentPath(provider.handle.kind, sourcePath) !== sourcePath && !isValidEntryName(name)) {
      throw FsError.invalidOperation(`Invalid name: ${name}`, sourcePath);
    }

    await provider.mkdir(sourcePath, state.request.options.recursive);
    return { index, sourcePath, kind: "directory", status: "succeeded", bytes: 0 };
  }

  private async freeName(provider: FilesystemProvider, target: string): Promise<string> {
    const kind = provider.handle.kind;
    const directory = parentPath(kind, target);
    const name = baseName(kind, target);
    for (let attempt = 1; ; attempt += 1) {
      const candidate = joinPath(kind, directory, withCollisionSuffix(name, attempt));
      if (!(await provider.tryStat(candidate))) {
        return candidate;
      }
    }
  }

  private record(state: RunState, outcome: ItemOutcome): void {
    const frozen = Object.freeze({ ...outcome });
    state.outcomes.push(frozen);
    this.options.events.emit({ type: "item", requestId: state.requestId, outcome: frozen });

    if (outcome.status === "failed" && state.request.options.abortOnFirstError) {
      state.aborted = true;
    }
  }
}
