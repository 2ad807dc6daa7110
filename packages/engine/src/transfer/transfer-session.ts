import { FsError } from "../../../core/src/index";
import type { OperationKind } from "../../../core/src/index";

export type TransferState = "Pending" | "Running" | "Completed" | "Cancelled" | "Failed";

const TERMINAL_STATES: ReadonlySet<TransferState> = new Set(["Completed", "Cancelled", "Failed"]);

/**
 * Mutable bookkeeping of one copy/move request, owned by the engine until the
 * request reaches a terminal state.
 */
export class TransferSession {
  private current: TransferState = "Pending";
  private readonly controller = new AbortController();
  private readonly itemBytes = new Map<number, number>();
  private readonly retries = new Map<number, number>();
  private abortedByFailure = false;
  private readonly onCancel = () => {
    this.controller.abort();
  };
  currentItemIndex = -1;
  requestBytesTotal = 0;

  constructor(
    readonly requestId: string,
    readonly kind: OperationKind,
    private readonly cancellation: AbortSignal
  ) {
    if (cancellation.aborted) {
      this.controller.abort();
    } else {
      cancellation.addEventListener("abort", this.onCancel, { once: true });
    }
  }

  get state(): TransferState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  /** Fires on user cancellation and on abort-on-first-error. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.cancellation.aborted;
  }

  /** True once an item failed under abort-on-first-error. */
  get aborted(): boolean {
    return this.abortedByFailure;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  get requestBytesSoFar(): number {
    let total = 0;
    for (const bytes of this.itemBytes.values()) {
      total += bytes;
    }
    return total;
  }

  start(): void {
    this.moveTo("Running");
  }

  abortOnFailure(): void {
    this.abortedByFailure = true;
    this.controller.abort();
  }

  recordProgress(itemIndex: number, bytesSoFar: number): void {
    this.currentItemIndex = itemIndex;
    this.itemBytes.set(itemIndex, bytesSoFar);
  }

  /** A retried item starts over; its earlier bytes no longer count. */
  recordRetry(itemIndex: number): number {
    const count = (this.retries.get(itemIndex) ?? 0) + 1;
    this.retries.set(itemIndex, count);
    this.itemBytes.set(itemIndex, 0);
    return count;
  }

  retriesOf(itemIndex: number): number {
    return this.retries.get(itemIndex) ?? 0;
  }

  throwIfStopped(path?: string): void {
    if (this.controller.signal.aborted) {
      throw FsError.cancelled(path);
    }
  }

  finish(state: "Completed" | "Cancelled" | "Failed"): void {
    this.moveTo(state);
    this.cancellation.removeEventListener("abort", this.onCancel);
  }

  private moveTo(next: TransferState): void {
    if (this.isTerminal) {
      throw new Error(`Transfer session ${this.requestId} already ${this.current}`);
    }
    this.current = next;
  }
}
