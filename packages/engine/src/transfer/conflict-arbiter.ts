import { randomUUID } from "node:crypto";
import { FsError } from "../../../core/src/index";
import type { EntryMetadata } from "../../../core/src/index";
import type { ConflictDecision } from "../../../shared/src/index";
import type { EventBus } from "../event-bus";

interface PendingDecision {
  requestId: string;
  resolve: (decision: ConflictDecision) => void;
}

export interface ConflictQuery {
  requestId: string;
  sourcePath: string;
  destinationPath: string;
  existing: EntryMetadata;
  signal: AbortSignal;
}

/**
 * Routes `prompt` collisions to the presentation layer and waits for its
 * answer. An answer marked `applyToAll` settles every later collision of the
 * same request without asking again.
 */
export class ConflictArbiter {
  private readonly pending = new Map<string, PendingDecision>();
  private readonly remembered = new Map<string, ConflictDecision>();

  constructor(private readonly events: EventBus) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  async decide(query: ConflictQuery): Promise<ConflictDecision> {
    const remembered = this.remembered.get(query.requestId);
    if (remembered) {
      return remembered;
    }

    if (query.signal.aborted) {
      throw FsError.cancelled(query.destinationPath);
    }

    const decisionId = randomUUID();
    const decision = await new Promise<ConflictDecision>((resolve, reject) => {
      const onAbort = () => {
        this.pending.delete(decisionId);
        reject(FsError.cancelled(query.destinationPath));
      };

      this.pending.set(decisionId, {
        requestId: query.requestId,
        resolve: (value) => {
          query.signal.removeEventListener("abort", onAbort);
          resolve(value);
        }
      });
      query.signal.addEventListener("abort", onAbort, { once: true });

      this.events.emit({
        type: "conflict",
        requestId: query.requestId,
        decisionId,
        sourcePath: query.sourcePath,
        destinationPath: query.destinationPath,
        existing: query.existing
      });
    });

    return this.remembered.get(query.requestId) ?? decision;
  }

  resolve(decisionId: string, decision: ConflictDecision): void {
    const pending = this.pending.get(decisionId);
    if (!pending) {
      throw FsError.invalidOperation(`No pending conflict decision: ${decisionId}`);
    }

    this.pending.delete(decisionId);
    if (decision.applyToAll) {
      this.remembered.set(pending.requestId, decision);
      // answer every collision of this request that is already waiting
      for (const [otherId, other] of this.pending) {
        if (other.requestId === pending.requestId) {
          this.pending.delete(otherId);
          other.resolve(decision);
        }
      }
    }
    pending.resolve(decision);
  }

  /** Forget the request's remembered answer once it is finished. */
  release(requestId: string): void {
    this.remembered.delete(requestId);
  }
}
