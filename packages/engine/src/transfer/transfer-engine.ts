import {
  FsError,
  baseName,
  isFsErrorCode,
  isSameOrDescendant,
  itemRetryPolicy,
  joinPath,
  normalizeError,
  parentPath,
  runWithRetry,
  sleep,
  toFsError,
  withCollisionSuffix
} from "../../../core/src/index";
import type {
  EngineSettings,
  EntryMetadata,
  ItemError,
  ItemKind,
  ItemOutcome,
  OperationRequest,
  OperationResult,
  ProviderPath,
  RetryPolicy,
  Sleep
} from "../../../core/src/index";
import type { ConflictDecision } from "../../../shared/src/index";
import { Semaphore } from "../concurrency";
import type { ProviderLookup } from "../directory-lister";
import type { EventBus } from "../event-bus";
import type { EngineLogger } from "../logger";
import { withByteSource } from "../providers/provider";
import type { ByteSink, FilesystemProvider } from "../providers/provider";
import { buildResult, cancelledError, skippedDirectoryError, toItemError } from "../result";
import type { ConflictArbiter } from "./conflict-arbiter";
import { TransferSession } from "./transfer-session";

export interface TransferEngineOptions {
  providers: ProviderLookup;
  events: EventBus;
  arbiter: ConflictArbiter;
  logger: EngineLogger;
  settings: EngineSettings;
  sleep?: Sleep;
}

interface PlannedBase {
  index: number;
  source: FilesystemProvider;
  sourcePath: string;
  destinationPath: string;
  modifiedAt: number;
}

interface PlannedFile extends PlannedBase {
  type: "file";
  size: number;
}

interface PlannedDirectory extends PlannedBase {
  type: "directory";
}

/** Same-provider move of a whole source, done with one rename. */
interface PlannedRename extends PlannedBase {
  type: "rename";
  kind: ItemKind;
}

type PlannedItem = PlannedFile | PlannedDirectory | PlannedRename;

/** A moved directory, removed once every item beneath it succeeded. */
interface MoveRoot {
  source: FilesystemProvider;
  sourcePath: string;
  indices: number[];
}

interface ItemSlot {
  release: () => void;
  acquire: () => Promise<void>;
}

type TargetChoice =
  | { action: "write"; path: string }
  | { action: "skip"; error: ItemError }
  | { action: "fail"; error: unknown };

interface TransferContext {
  session: TransferSession;
  request: OperationRequest;
  destination: FilesystemProvider;
  destinationRoot: string;
  plan: PlannedItem[];
  outcomes: Map<number, ItemOutcome>;
  moveRoots: MoveRoot[];
  directories: Map<string, Promise<void>>;
  reservedNames: Set<string>;
  retryPolicy: RetryPolicy;
  nextIndex: number;
}

const collisionNotice = (path: string): ItemError => ({
  code: "NameCollision",
  message: `Destination already exists: ${path}`
});

/**
 * Copies and moves items between any two providers: plans the batch, resolves
 * collisions, then streams every file in chunks with per-item retry.
 */
export class TransferEngine {
  private readonly sleep: Sleep;

  constructor(private readonly options: TransferEngineOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  async execute(requestId: string, request: OperationRequest, cancellation: AbortSignal): Promise<OperationResult> {
    const startedAt = Date.now();
    const session = new TransferSession(requestId, request.kind, cancellation);
    session.start();

    const outcomes = new Map<number, ItemOutcome>();
    const destinationRef = request.destination;
    let destination: FilesystemProvider;
    let destinationRoot: string;
    try {
      if (!destinationRef) {
        throw FsError.invalidOperation(`${request.kind} requires a destination`);
      }
      destination = this.options.providers(destinationRef.handleId);
      destinationRoot = destination.normalize(destinationRef.path);
    } catch (error) {
      request.sources.forEach((source, index) => {
        outcomes.set(index, this.failedOutcome(index, source.path, "file", error));
      });
      session.finish("Failed");
      return buildResult(requestId, request.kind, "failed", [...outcomes.values()], startedAt);
    }

    const ctx: TransferContext = {
      session,
      request,
      destination,
      destinationRoot,
      plan: [],
      outcomes,
      moveRoots: [],
      directories: new Map(),
      reservedNames: new Set(),
      retryPolicy: itemRetryPolicy(this.options.settings.retry),
      nextIndex: 0
    };

    this.options.logger.info("[Transfer] started", {
      requestId,
      kind: request.kind,
      sources: request.sources.length,
      destination: `${destination.handle.id}:${ctx.destinationRoot}`
    });

    for (const source of request.sources) {
      await this.planSource(ctx, source);
    }

    session.requestBytesTotal = ctx.plan.reduce((total, item) => total + (item.type === "file" ? item.size : 0), 0);

    const concurrency = this.itemConcurrency(ctx);
    const slots = new Semaphore(concurrency);
    await Promise.all(ctx.plan.map((item) => this.runItem(ctx, item, slots)));

    if (request.kind === "move" && !session.stopped) {
      await this.removeMovedDirectories(ctx);
    }

    const status = session.cancelled ? "cancelled" : session.aborted ? "failed" : "completed";
    session.finish(status === "cancelled" ? "Cancelled" : status === "failed" ? "Failed" : "Completed");
    this.options.arbiter.release(requestId);

    const result = buildResult(requestId, request.kind, status, [...outcomes.values()], startedAt);
    this.options.logger.info("[Transfer] finished", {
      requestId,
      status,
      ...result.summary,
      bytesTransferred: result.bytesTransferred,
      wallTimeMs: result.wallTimeMs
    });
    return result;
  }

  private itemConcurrency(ctx: TransferContext): number {
    let concurrency = ctx.destination.capabilities.maxConcurrency;
    for (const item of ctx.plan) {
      concurrency = Math.min(concurrency, item.source.capabilities.maxConcurrency);
    }
    return Math.max(1, concurrency);
  }

  private allocateIndex(ctx: TransferContext): number {
    const index = ctx.nextIndex;
    ctx.nextIndex += 1;
    return index;
  }

  private async planSource(ctx: TransferContext, ref: ProviderPath): Promise<void> {
    let ownIndex: number | undefined;
    const indexOfSource = (): number => {
      if (ownIndex === undefined) {
        ownIndex = this.allocateIndex(ctx);
      }
      return ownIndex;
    };

    if (ctx.session.stopped) {
      this.record(ctx, this.cancelledOutcome(indexOfSource(), ref.path, "file"));
      return;
    }

    let sourcePath = ref.path;
    let kind: ItemKind = "file";
    try {
      const source = this.options.providers(ref.handleId);
      sourcePath = source.normalize(ref.path);
      const target = joinPath(
        ctx.destination.handle.kind,
        ctx.destinationRoot,
        baseName(source.handle.kind, sourcePath)
      );
      const entry = await this.withRetry(ctx, () => source.stat(sourcePath));
      const sameProvider = source.handle.id === ctx.destination.handle.id;
      kind = entry.kind === "directory" ? "directory" : "file";

      if (entry.kind === "directory") {
        if (!ctx.request.options.recursive) {
          this.record(ctx, {
            index: indexOfSource(),
            sourcePath,
            kind,
            status: "skipped",
            bytes: 0,
            error: skippedDirectoryError(sourcePath)
          });
          return;
        }

        if (sameProvider && isSameOrDescendant(source.handle.kind, sourcePath, target)) {
          throw FsError.invalidOperation(`Cannot ${ctx.request.kind} a directory into itself`, sourcePath);
        }
      } else if (entry.kind !== "file") {
        throw FsError.invalidOperation(`Not a regular file: ${sourcePath}`, sourcePath);
      }

      if (ctx.request.kind === "move" && sameProvider && (await this.claimRenameTarget(ctx, source, target))) {
        ctx.plan.push({
          type: "rename",
          index: indexOfSource(),
          source,
          sourcePath,
          destinationPath: target,
          modifiedAt: entry.modifiedAt,
          kind
        });
        return;
      }

      if (entry.kind === "file") {
        ctx.plan.push({
          type: "file",
          index: indexOfSource(),
          source,
          sourcePath,
          destinationPath: target,
          modifiedAt: entry.modifiedAt,
          size: entry.size
        });
        return;
      }

      const root: MoveRoot | undefined = ctx.request.kind === "move"
        ? { source, sourcePath, indices: [] }
        : undefined;
      await this.expandDirectory(ctx, source, entry, target, root);
      if (root) {
        ctx.moveRoots.push(root);
      }
    } catch (error) {
      const index = indexOfSource();
      if (isFsErrorCode(error, "Cancelled")) {
        this.record(ctx, this.cancelledOutcome(index, sourcePath, kind));
        return;
      }
      this.record(ctx, this.failedOutcome(index, sourcePath, kind, error));
    }
  }

  /**
   * A same-provider move renames in place only while nothing exists at the
   * target and no earlier item of the batch claimed it; otherwise the source
   * takes the copy path so the overwrite policy applies.
   */
  private async claimRenameTarget(ctx: TransferContext, source: FilesystemProvider, target: string): Promise<boolean> {
    if (ctx.reservedNames.has(target)) {
      return false;
    }
    if (await this.withRetry(ctx, () => source.tryStat(target))) {
      return false;
    }
    ctx.reservedNames.add(target);
    return true;
  }

  /**
   * Depth-first expansion of a directory into file items. A directory without
   * children becomes a directory item so that it is recreated.
   */
  private async expandDirectory(
    ctx: TransferContext,
    source: FilesystemProvider,
    directory: EntryMetadata,
    target: string,
    root: MoveRoot | undefined
  ): Promise<void> {
    ctx.session.throwIfStopped(directory.path);
    const entries = await this.withRetry(ctx, () => source.list(directory.path));
    entries.sort((left, right) => left.name.localeCompare(right.name));

    if (entries.length === 0) {
      const index = this.allocateIndex(ctx);
      root?.indices.push(index);
      ctx.plan.push({
        type: "directory",
        index,
        source,
        sourcePath: directory.path,
        destinationPath: target,
        modifiedAt: directory.modifiedAt
      });
      return;
    }

    for (const entry of entries) {
      const childTarget = joinPath(ctx.destination.handle.kind, target, entry.name);

      if (entry.kind === "directory") {
        try {
          await this.expandDirectory(ctx, source, entry, childTarget, root);
        } catch (error) {
          // removed since the parent was listed
          if (!isFsErrorCode(error, "NotFound")) {
            throw error;
          }
        }
        continue;
      }

      const index = this.allocateIndex(ctx);
      root?.indices.push(index);

      if (entry.kind === "file") {
        ctx.plan.push({
          type: "file",
          index,
          source,
          sourcePath: entry.path,
          destinationPath: childTarget,
          modifiedAt: entry.modifiedAt,
          size: entry.size
        });
        continue;
      }

      if (entry.kind === "symlink") {
        await this.planLink(ctx, source, entry, childTarget, index);
        continue;
      }

      this.record(ctx, this.failedOutcome(
        index,
        entry.path,
        "file",
        FsError.invalidOperation(`Not a regular file: ${entry.path}`, entry.path)
      ));
    }
  }

  /** Links are followed once: file targets are copied, directory targets skipped. */
  private async planLink(
    ctx: TransferContext,
    source: FilesystemProvider,
    link: EntryMetadata,
    target: string,
    index: number
  ): Promise<void> {
    try {
      const resolved = await this.withRetry(ctx, () => source.stat(link.path));
      if (resolved.kind === "directory") {
        this.record(ctx, {
          index,
          sourcePath: link.path,
          kind: "directory",
          status: "skipped",
          bytes: 0,
          error: {
            code: "SkippedDirectory",
            message: `Link to a directory skipped: ${link.path}`
          }
        });
        return;
      }

      ctx.plan.push({
        type: "file",
        index,
        source,
        sourcePath: link.path,
        destinationPath: target,
        modifiedAt: resolved.modifiedAt,
        size: resolved.size
      });
    } catch (error) {
      this.record(ctx, this.failedOutcome(index, link.path, "file", error));
    }
  }

  private async runItem(ctx: TransferContext, item: PlannedItem, slots: Semaphore): Promise<void> {
    await slots.acquire();
    let holding = true;
    const slot: ItemSlot = {
      release: () => {
        if (holding) {
          holding = false;
          slots.release();
        }
      },
      acquire: async () => {
        await slots.acquire();
        holding = true;
      }
    };

    const kind: ItemKind = item.type === "rename" ? item.kind : item.type;
    try {
      if (ctx.session.stopped) {
        this.record(ctx, this.cancelledOutcome(item.index, item.sourcePath, kind));
        return;
      }

      this.record(ctx, await this.processItem(ctx, item, slot));
    } catch (error) {
      if (isFsErrorCode(error, "Cancelled")) {
        this.record(ctx, this.cancelledOutcome(item.index, item.sourcePath, kind));
      } else {
        this.record(ctx, this.failedOutcome(item.index, item.sourcePath, kind, error));
      }
    } finally {
      slot.release();
    }
  }

  private async processItem(ctx: TransferContext, item: PlannedItem, slot: ItemSlot): Promise<ItemOutcome> {
    switch (item.type) {
      case "rename":
        return this.renameItem(ctx, item);
      case "directory":
        return this.directoryItem(ctx, item);
      case "file":
        return this.fileItem(ctx, item, slot);
    }
  }

  private async renameItem(ctx: TransferContext, item: PlannedRename): Promise<ItemOutcome> {
    await this.ensureDirectory(ctx, parentPath(ctx.destination.handle.kind, item.destinationPath));
    // a local rename replaces an existing target
    if (await this.withRetry(ctx, () => item.source.tryStat(item.destinationPath))) {
      throw FsError.nameCollision(item.destinationPath);
    }
    await this.withRetry(ctx, () => item.source.rename(item.sourcePath, item.destinationPath));
    return {
      index: item.index,
      sourcePath: item.sourcePath,
      destinationPath: item.destinationPath,
      kind: item.kind,
      status: "succeeded",
      bytes: 0
    };
  }

  private async directoryItem(ctx: TransferContext, item: PlannedDirectory): Promise<ItemOutcome> {
    const base = {
      index: item.index,
      sourcePath: item.sourcePath,
      kind: "directory" as const
    };

    const existing = await this.withRetry(ctx, () => ctx.destination.tryStat(item.destinationPath));
    if (existing && existing.kind !== "directory") {
      throw FsError.nameCollision(item.destinationPath);
    }

    if (existing && ctx.request.options.overwritePolicy === "skip") {
      return {
        ...base,
        destinationPath: item.destinationPath,
        status: "skipped",
        bytes: 0,
        error: collisionNotice(item.destinationPath)
      };
    }

    if (!existing) {
      await this.ensureDirectory(ctx, item.destinationPath);
      if (ctx.request.options.preserveTimestamps) {
        await this.withRetry(ctx, () =>
          ctx.destination.setTimes(item.destinationPath, item.modifiedAt, item.modifiedAt)
        );
      }
    }

    return { ...base, destinationPath: item.destinationPath, status: "succeeded", bytes: 0 };
  }

  private async fileItem(ctx: TransferContext, item: PlannedFile, slot: ItemSlot): Promise<ItemOutcome> {
    const choice = await this.chooseTarget(ctx, item, slot);
    if (choice.action === "skip") {
      return {
        index: item.index,
        sourcePath: item.sourcePath,
        destinationPath: item.destinationPath,
        kind: "file",
        status: "skipped",
        bytes: 0,
        error: choice.error
      };
    }

    if (choice.action === "fail") {
      throw choice.error;
    }

    const target = choice.path;
    const bytes = await runWithRetry(
      () => this.copyFile(ctx, item, target),
      ctx.retryPolicy,
      {
        signal: ctx.session.signal,
        sleep: this.sleep,
        onRetry: (attempt, delayMs, error) => {
          ctx.session.recordRetry(item.index);
          this.options.logger.warn("[Transfer] retrying item", {
            requestId: ctx.session.requestId,
            itemPath: item.sourcePath,
            attempt,
            delayMs,
            reason: error.message
          });
        }
      }
    );

    if (ctx.request.kind === "move") {
      await this.withRetry(ctx, () => item.source.remove(item.sourcePath));
    }

    return {
      index: item.index,
      sourcePath: item.sourcePath,
      destinationPath: target,
      kind: "file",
      status: "succeeded",
      bytes
    };
  }

  private async chooseTarget(ctx: TransferContext, item: PlannedFile, slot: ItemSlot): Promise<TargetChoice> {
    const candidate = item.destinationPath;
    const existing = await this.withRetry(ctx, () => ctx.destination.tryStat(candidate));
    if (!existing && !ctx.reservedNames.has(candidate)) {
      ctx.reservedNames.add(candidate);
      return { action: "write", path: candidate };
    }

    switch (ctx.request.options.overwritePolicy) {
      case "skip":
        return { action: "skip", error: collisionNotice(candidate) };
      case "overwrite":
        return this.overwriteChoice(ctx, item, existing);
      case "rename-with-suffix":
        return { action: "write", path: await this.freeName(ctx, candidate) };
      case "prompt":
        break;
    }

    if (!existing) {
      // another item of this batch claimed the name first
      return { action: "write", path: await this.freeName(ctx, candidate) };
    }

    slot.release();
    let decision: ConflictDecision;
    try {
      decision = await this.options.arbiter.decide({
        requestId: ctx.session.requestId,
        sourcePath: item.sourcePath,
        destinationPath: candidate,
        existing,
        signal: ctx.session.signal
      });
    } finally {
      await slot.acquire();
    }
    ctx.session.throwIfStopped(candidate);

    switch (decision.action) {
      case "skip":
        return { action: "skip", error: collisionNotice(candidate) };
      case "overwrite":
        return this.overwriteChoice(ctx, item, existing);
      case "rename":
        return { action: "write", path: await this.freeName(ctx, candidate) };
      case "decline":
        return { action: "fail", error: FsError.nameCollision(candidate) };
    }
  }

  private overwriteChoice(ctx: TransferContext, item: PlannedFile, existing: EntryMetadata | undefined): TargetChoice {
    const candidate = item.destinationPath;
    if (existing?.kind === "directory") {
      return { action: "fail", error: FsError.nameCollision(candidate) };
    }

    if (item.source.handle.id === ctx.destination.handle.id && item.sourcePath === candidate) {
      return {
        action: "fail",
        error: FsError.invalidOperation("Source and destination are the same file", candidate)
      };
    }

    return { action: "write", path: candidate };
  }

  /** First `name (n).ext` beside `path` that neither exists nor is claimed by this batch. */
  private async freeName(ctx: TransferContext, path: string): Promise<string> {
    const kind = ctx.destination.handle.kind;
    const directory = parentPath(kind, path);
    const name = baseName(kind, path);

    for (let attempt = 1; ; attempt += 1) {
      const candidate = joinPath(kind, directory, withCollisionSuffix(name, attempt));
      if (ctx.reservedNames.has(candidate)) {
        continue;
      }
      const existing = await this.withRetry(ctx, () => ctx.destination.tryStat(candidate));
      if (!existing) {
        ctx.reservedNames.add(candidate);
        return candidate;
      }
    }
  }

  private async copyFile(ctx: TransferContext, item: PlannedFile, target: string): Promise<number> {
    const { session, destination } = ctx;
    session.throwIfStopped(item.sourcePath);
    await this.ensureDirectory(ctx, parentPath(destination.handle.kind, target));
    session.recordProgress(item.index, 0);

    const written = await withByteSource(item.source, item.sourcePath, async (reader) => {
      const sink = await destination.openForWrite(target, "truncate");
      try {
        for (;;) {
          session.throwIfStopped(target);
          const chunk = await reader.read(this.options.settings.chunkSizeBytes);
          if (chunk.length === 0) {
            break;
          }
          await sink.write(chunk);
          this.reportProgress(ctx, item, sink.bytesWritten);
        }
        await sink.commit();
      } catch (error) {
        await this.discardPartial(ctx, sink, target);
        throw error;
      }
      return sink.bytesWritten;
    });

    const stored = await destination.stat(target);
    if (stored.size !== written) {
      await this.removePartial(ctx, target);
      throw FsError.unknown(
        target,
        new Error(`Size check failed: wrote ${written} bytes, destination has ${stored.size}`)
      );
    }

    if (ctx.request.options.preserveTimestamps) {
      await destination.setTimes(target, item.modifiedAt, item.modifiedAt);
    }

    return written;
  }

  private reportProgress(ctx: TransferContext, item: PlannedFile, bytesSoFar: number): void {
    ctx.session.recordProgress(item.index, bytesSoFar);
    this.options.events.emit({
      type: "progress",
      requestId: ctx.session.requestId,
      itemIndex: item.index,
      itemPath: item.sourcePath,
      bytesSoFar,
      bytesTotal: Math.max(item.size, bytesSoFar),
      requestBytesSoFar: ctx.session.requestBytesSoFar,
      requestBytesTotal: Math.max(ctx.session.requestBytesTotal, ctx.session.requestBytesSoFar)
    });
  }

  /** Destination directories are created once per request, right before first use. */
  private async ensureDirectory(ctx: TransferContext, directory: string): Promise<void> {
    let pending = ctx.directories.get(directory);
    if (!pending) {
      pending = this.withRetry(ctx, () => ctx.destination.mkdir(directory, true));
      ctx.directories.set(directory, pending);
    }

    try {
      await pending;
    } catch (error) {
      ctx.directories.delete(directory);
      throw error;
    }
  }

  private async discardPartial(ctx: TransferContext, sink: ByteSink, target: string): Promise<void> {
    try {
      await sink.close();
    } catch (error) {
      this.options.logger.debug("[Transfer] failed to close partial destination", {
        target,
        reason: normalizeError(error)
      });
    }
    await this.removePartial(ctx, target);
  }

  private async removePartial(ctx: TransferContext, target: string): Promise<void> {
    try {
      await ctx.destination.remove(target);
    } catch (error) {
      if (isFsErrorCode(error, "NotFound")) {
        return;
      }
      this.options.logger.warn("[Transfer] could not remove partial destination", {
        requestId: ctx.session.requestId,
        target,
        reason: normalizeError(error)
      });
    }
  }

  private async removeMovedDirectories(ctx: TransferContext): Promise<void> {
    for (const root of ctx.moveRoots) {
      const complete = root.indices.every((index) => ctx.outcomes.get(index)?.status === "succeeded");
      if (!complete) {
        continue;
      }

      try {
        await this.withRetry(ctx, () => root.source.remove(root.sourcePath, { recursive: true }));
      } catch (error) {
        this.options.logger.warn("[Transfer] moved directory left at source", {
          requestId: ctx.session.requestId,
          sourcePath: root.sourcePath,
          reason: normalizeError(error)
        });
      }
    }
  }

  private async withRetry<T>(ctx: TransferContext, task: () => Promise<T>): Promise<T> {
    return runWithRetry(task, ctx.retryPolicy, {
      signal: ctx.session.signal,
      sleep: this.sleep,
      onRetry: (attempt, delayMs, error) => {
        this.options.logger.warn("[Transfer] retrying provider call", {
          requestId: ctx.session.requestId,
          attempt,
          delayMs,
          reason: error.message
        });
      }
    });
  }

  private record(ctx: TransferContext, outcome: ItemOutcome): void {
    const frozen = Object.freeze({ ...outcome });
    ctx.outcomes.set(outcome.index, frozen);
    this.options.events.emit({ type: "item", requestId: ctx.session.requestId, outcome: frozen });

    if (outcome.status === "failed" && ctx.request.options.abortOnFirstError && !ctx.session.stopped) {
      ctx.session.abortOnFailure();
      this.options.logger.warn("[Transfer] aborting after first failure", {
        requestId: ctx.session.requestId,
        itemPath: outcome.sourcePath
      });
    }
  }

  private failedOutcome(index: number, sourcePath: string, kind: ItemKind, error: unknown): ItemOutcome {
    const mapped = toFsError(error, sourcePath);
    return {
      index,
      sourcePath,
      kind,
      status: "failed",
      bytes: 0,
      error: toItemError(mapped)
    };
  }

  private cancelledOutcome(index: number, sourcePath: string, kind: ItemKind): ItemOutcome {
    return {
      index,
      sourcePath,
      kind,
      status: "cancelled",
      bytes: 0,
      error: cancelledError(sourcePath)
    };
  }
}
