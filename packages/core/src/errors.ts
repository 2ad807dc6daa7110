/**
 * Error taxonomy shared by every provider and by the transfer engine.
 */

export type FsErrorCode =
  | "NotFound"
  | "PermissionDenied"
  | "ConnectivityError"
  | "AuthenticationError"
  | "NameCollision"
  | "Cancelled"
  | "SkippedDirectory"
  | "InvalidOperation"
  | "UnknownFailure";

/** SFTP v3 status codes as carried on ssh2 errors */
const SFTP_STATUS = {
  EOF: 1,
  NO_SUCH_FILE: 2,
  PERMISSION_DENIED: 3,
  FAILURE: 4,
  NO_CONNECTION: 6,
  CONNECTION_LOST: 7
} as const;

const CONNECTIVITY_ERRNO = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE"
]);

const CONNECTIVITY_MESSAGE_PATTERNS = [
  "not connected",
  "no response from server",
  "connection lost",
  "channel closed",
  "socket closed",
  "timed out"
];

export class FsError extends Error {
  constructor(
    readonly code: FsErrorCode,
    message: string,
    readonly path?: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = "FsError";
  }

  get retryable(): boolean {
    return this.code === "ConnectivityError";
  }

  static notFound(path: string, cause?: unknown): FsError {
    return new FsError("NotFound", `No such file or directory: ${path}`, path, cause);
  }

  static permissionDenied(path: string, cause?: unknown): FsError {
    return new FsError("PermissionDenied", `Permission denied: ${path}`, path, cause);
  }

  static connectivity(message: string, path?: string, cause?: unknown): FsError {
    return new FsError("ConnectivityError", message, path, cause);
  }

  static authentication(message: string, cause?: unknown): FsError {
    return new FsError("AuthenticationError", message, undefined, cause);
  }

  static nameCollision(path: string): FsError {
    return new FsError("NameCollision", `Destination already exists: ${path}`, path);
  }

  static cancelled(path?: string): FsError {
    return new FsError("Cancelled", "Operation cancelled", path);
  }

  static invalidOperation(message: string, path?: string): FsError {
    return new FsError("InvalidOperation", message, path);
  }

  static unknown(path: string | undefined, cause: unknown): FsError {
    return new FsError("UnknownFailure", normalizeError(cause), path, cause);
  }
}

export const normalizeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "Unknown error";
};

const readProperty = (error: unknown, key: string): unknown => {
  if (typeof error !== "object" || error === null || !(key in error)) {
    return undefined;
  }

  const value: unknown = Reflect.get(error, key);
  return value;
};

const isConnectivityMessage = (message: string): boolean => {
  const lower = message.toLowerCase();
  return CONNECTIVITY_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
};

/**
 * Map a Node errno error, an ssh2/SFTP error or anything else onto the taxonomy.
 */
export const toFsError = (error: unknown, path?: string): FsError => {
  if (error instanceof FsError) {
    return error;
  }

  const code = readProperty(error, "code");
  const level = readProperty(error, "level");

  if (level === "client-authentication") {
    return FsError.authentication(normalizeError(error), error);
  }

  if (typeof code === "number") {
    switch (code) {
      case SFTP_STATUS.NO_SUCH_FILE:
        return FsError.notFound(path ?? "", error);
      case SFTP_STATUS.PERMISSION_DENIED:
        return FsError.permissionDenied(path ?? "", error);
      case SFTP_STATUS.NO_CONNECTION:
      case SFTP_STATUS.CONNECTION_LOST:
        return FsError.connectivity(normalizeError(error), path, error);
    }
  }

  if (typeof code === "string") {
    switch (code) {
      case "ENOENT":
        return FsError.notFound(path ?? "", error);
      case "EACCES":
      case "EPERM":
        return FsError.permissionDenied(path ?? "", error);
      case "EEXIST":
        return FsError.nameCollision(path ?? "");
    }

    if (CONNECTIVITY_ERRNO.has(code)) {
      return FsError.connectivity(normalizeError(error), path, error);
    }
  }

  if (level === "client-socket" || level === "client-timeout") {
    return FsError.connectivity(normalizeError(error), path, error);
  }

  if (error instanceof Error && isConnectivityMessage(error.message)) {
    return FsError.connectivity(error.message, path, error);
  }

  return FsError.unknown(path, error);
};

export const isFsErrorCode = (error: unknown, code: FsErrorCode): boolean => {
  return error instanceof FsError && error.code === code;
};

/** True when an SFTP readdir reply signals the end of a directory handle. */
export const isSftpEof = (error: unknown): boolean => {
  return readProperty(error, "code") === SFTP_STATUS.EOF;
};
