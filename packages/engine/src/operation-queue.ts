import { randomUUID } from "node:crypto";
import { FsError, normalizeError } from "../../core/src/index";
import type { ItemOutcome, OperationRequest, OperationResult, OperationStatus } from "../../core/src/index";
import { Semaphore } from "./concurrency";
import type { EventBus } from "./event-bus";
import type { EngineLogger } from "./logger";
import { buildResult, cancelledError, toItemError } from "./result";

export type OperationExecutor = (
  requestId: string,
  request: OperationRequest,
  signal: AbortSignal
) => Promise<OperationResult>;

export interface OperationQueueOptions {
  workerCount: number;
  /** Terminal requests kept before the oldest are forgotten */
  retainedResults: number;
  /** Concurrency cap of a handle; throws when the handle is unknown. */
  concurrencyOf: (handleId: string) => number;
  transfers: OperationExecutor;
  operations: OperationExecutor;
  events: EventBus;
  logger: EngineLogger;
}

interface QueueEntry {
  requestId: string;
  request: OperationRequest;
  controller: AbortController;
  state: "queued" | "running" | "terminal";
  result: OperationResult | undefined;
  done: Promise<OperationResult>;
  settle: (result: OperationResult) => void;
}

const handlesOf = (request: OperationRequest): string[] => {
  const ids = new Set(request.sources.map((source) => source.handleId));
  if (request.destination) {
    ids.add(request.destination.handleId);
  }
  return [...ids].sort();
};

/**
 * Schedules requests on a global pool of workers. A request also holds one
 * slot on every handle it touches, taken in sorted order so that two requests
 * can never wait on each other.
 */
export class OperationQueue {
  private readonly entries = new Map<string, QueueEntry>();
  /** Terminal request ids, oldest first */
  private readonly finished: string[] = [];
  private readonly workers: Semaphore;
  private readonly handleSlots = new Map<string, Semaphore>();

  constructor(private readonly options: OperationQueueOptions) {
    this.workers = new Semaphore(Math.max(1, options.workerCount));
  }

  submit(request: OperationRequest): string {
    const requestId = randomUUID();
    let settle: (result: OperationResult) => void = () => undefined;
    const done = new Promise<OperationResult>((resolve) => {
      settle = resolve;
    });

    const entry: QueueEntry = {
      requestId,
      request,
      controller: new AbortController(),
      state: "queued",
      result: undefined,
      done,
      settle
    };
    this.entries.set(requestId, entry);
    this.options.events.emit({ type: "status", requestId, kind: request.kind, state: "queued" });
    this.options.logger.debug("[Queue] submitted", { requestId, kind: request.kind });

    void this.run(entry);
    return requestId;
  }

  /** No-op for finished or unknown requests. */
  cancel(requestId: string): boolean {
    const entry = this.entries.get(requestId);
    if (!entry || entry.state === "terminal") {
      return false;
    }

    entry.controller.abort();
    this.options.logger.info("[Queue] cancel requested", { requestId, state: entry.state });
    return true;
  }

  status(requestId: string): OperationStatus {
    const entry = this.entries.get(requestId);
    if (!entry) {
      throw FsError.invalidOperation(`Unknown request: ${requestId}`);
    }

    if (entry.state === "terminal" && entry.result) {
      return { state: "terminal", result: entry.result };
    }
    return { state: entry.state === "running" ? "running" : "queued" };
  }

  async waitFor(requestId: string): Promise<OperationResult> {
    const entry = this.entries.get(requestId);
    if (!entry) {
      throw FsError.invalidOperation(`Unknown request: ${requestId}`);
    }
    return entry.done;
  }

  /** Resolves once every request submitted so far is terminal. */
  async drain(): Promise<void> {
    await Promise.all([...this.entries.values()].map((entry) => entry.done));
  }

  cancelAll(): void {
    for (const requestId of this.entries.keys()) {
      this.cancel(requestId);
    }
  }

  private async run(entry: QueueEntry): Promise<void> {
    const startedAt = Date.now();
    const held: Semaphore[] = [];
    let workerHeld = false;
    let result: OperationResult;

    try {
      for (const handleId of handlesOf(entry.request)) {
        const slots = this.slotsFor(handleId);
        await slots.acquire();
        held.push(slots);
      }
      await this.workers.acquire();
      workerHeld = true;

      if (entry.controller.signal.aborted) {
        result = this.cancelledResult(entry, startedAt);
      } else {
        entry.state = "running";
        this.options.events.emit({
          type: "status",
          requestId: entry.requestId,
          kind: entry.request.kind,
          state: "running"
        });

        const executor = entry.request.kind === "copy" || entry.request.kind === "move"
          ? this.options.transfers
          : this.options.operations;
        result = await executor(entry.requestId, entry.request, entry.controller.signal);
      }
    } catch (error) {
      this.options.logger.error("[Queue] request failed before completion", {
        requestId: entry.requestId,
        reason: normalizeError(error)
      });
      result = this.failedResult(entry, startedAt, error);
    } finally {
      if (workerHeld) {
        this.workers.release();
      }
      for (const slots of held) {
        slots.release();
      }
      this.pruneSlots();
    }

    this.finalize(entry, result);
  }

  /**
   * Slots of an unknown handle are a single permit; the executor then fails
   * every item of the request with the connectivity error.
   */
  private slotsFor(handleId: string): Semaphore {
    let slots = this.handleSlots.get(handleId);
    if (!slots) {
      let capacity = 1;
      try {
        capacity = Math.max(1, this.options.concurrencyOf(handleId));
      } catch (error) {
        this.options.logger.debug("[Queue] handle not available", { handleId, reason: normalizeError(error) });
      }
      slots = new Semaphore(capacity);
      this.handleSlots.set(handleId, slots);
    }
    return slots;
  }

  private pruneSlots(): void {
    for (const [handleId, slots] of this.handleSlots) {
      if (slots.inUse === 0) {
        this.handleSlots.delete(handleId);
      }
    }
  }

  private finalize(entry: QueueEntry, result: OperationResult): void {
    if (entry.state === "terminal") {
      return;
    }

    entry.state = "terminal";
    entry.result = result;
    this.options.events.emit({ type: "result", requestId: entry.requestId, result });
    this.options.logger.info("[Queue] request finished", {
      requestId: entry.requestId,
      kind: entry.request.kind,
      status: result.status
    });
    entry.settle(result);

    this.finished.push(entry.requestId);
    const limit = Math.max(1, this.options.retainedResults);
    while (this.finished.length > limit) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) {
        this.entries.delete(oldest);
      }
    }
  }

  private cancelledResult(entry: QueueEntry, startedAt: number): OperationResult {
    return buildResult(
      entry.requestId,
      entry.request.kind,
      "cancelled",
      entry.request.sources.map((source, index): ItemOutcome => ({
        index,
        sourcePath: source.path,
        kind: "file",
        status: "cancelled",
        bytes: 0,
        error: cancelledError(source.path)
      })),
      startedAt
    );
  }

  private failedResult(entry: QueueEntry, startedAt: number, error: unknown): OperationResult {
    const itemError = toItemError(error);
    return buildResult(
      entry.requestId,
      entry.request.kind,
      "failed",
      entry.request.sources.map((source, index): ItemOutcome => ({
        index,
        sourcePath: source.path,
        kind: "file",
        status: "failed",
        bytes: 0,
        error: itemError
      })),
      startedAt
    );
  }
}
