import { FsError, normalizeError, summarizeOutcomes, toFsError } from "../../core/src/index";
import type {
  ItemError,
  ItemOutcome,
  OperationKind,
  OperationResult,
  OperationResultStatus
} from "../../core/src/index";

export const toItemError = (error: unknown): ItemError => {
  const mapped = toFsError(error);
  return {
    code: mapped.code,
    message: mapped.message,
    cause: mapped.cause === undefined ? undefined : normalizeError(mapped.cause)
  };
};

export const skippedDirectoryError = (path: string): ItemError => ({
  code: "SkippedDirectory",
  message: `Directory skipped (recursive not set): ${path}`
});

export const cancelledError = (path?: string): ItemError => toItemError(FsError.cancelled(path));

export const buildResult = (
  requestId: string,
  kind: OperationKind,
  status: OperationResultStatus,
  items: readonly ItemOutcome[],
  startedAtMs: number
): OperationResult => {
  const finishedAtMs = Date.now();
  const ordered = [...items].sort((left, right) => left.index - right.index);
  return Object.freeze({
    requestId,
    kind,
    status,
    items: Object.freeze(ordered.map((item) => Object.freeze({ ...item }))),
    summary: summarizeOutcomes(ordered),
    bytesTransferred: ordered.reduce((total, item) => total + (item.status === "succeeded" ? item.bytes : 0), 0),
    startedAt: new Date(startedAtMs).toISOString(),
    finishedAt: new Date(finishedAtMs).toISOString(),
    wallTimeMs: Math.max(0, finishedAtMs - startedAtMs)
  });
};
