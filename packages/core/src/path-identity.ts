import os from "node:os";
import path from "node:path";
import type { ProviderKind } from "./index";

const INVALID_NAME_PATTERN = /[<>"/\\|*?:]/;

const pathApi = (kind: ProviderKind): path.PlatformPath => {
  return kind === "remote" ? path.posix : path;
};

export const expandHomePath = (rawPath: string): string => {
  if (rawPath === "~") {
    return os.homedir();
  }

  if (rawPath.startsWith("~/")) {
    return path.join(os.homedir(), rawPath.slice(2));
  }

  return rawPath;
};

/**
 * Canonical form used for every comparison: local paths are absolute and
 * resolved, remote paths are absolute POSIX paths without a trailing slash.
 */
export const normalizePath = (kind: ProviderKind, rawPath: string): string => {
  if (kind === "local") {
    return path.resolve(expandHomePath(rawPath.length > 0 ? rawPath : "."));
  }

  const trimmed = rawPath.trim();
  const absolute = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  const normalized = path.posix.normalize(absolute);
  if (normalized.length > 1 && normalized.endsWith("/")) {
    return normalized.slice(0, -1);
  }
  return normalized;
};

export const joinPath = (kind: ProviderKind, base: string, ...segments: string[]): string => {
  return normalizePath(kind, pathApi(kind).join(base, ...segments));
};

export const parentPath = (kind: ProviderKind, target: string): string => {
  return pathApi(kind).dirname(normalizePath(kind, target));
};

export const baseName = (kind: ProviderKind, target: string): string => {
  return pathApi(kind).basename(normalizePath(kind, target));
};

export const relativePath = (kind: ProviderKind, from: string, to: string): string => {
  return pathApi(kind).relative(normalizePath(kind, from), normalizePath(kind, to));
};

export const isSameOrDescendant = (kind: ProviderKind, parent: string, child: string): boolean => {
  const normalizedParent = normalizePath(kind, parent);
  const normalizedChild = normalizePath(kind, child);
  if (normalizedParent === normalizedChild) {
    return true;
  }

  const separator = pathApi(kind).sep;
  const prefix = normalizedParent.endsWith(separator) ? normalizedParent : `${normalizedParent}${separator}`;
  return normalizedChild.startsWith(prefix);
};

/** Identity of a path across providers: two entries are the same iff their keys match. */
export const pathKey = (handleId: string, kind: ProviderKind, target: string): string => {
  return `${handleId}:${normalizePath(kind, target)}`;
};

export const isValidEntryName = (name: string): boolean => {
  if (name.length === 0 || name === "." || name === "..") {
    return false;
  }

  return !INVALID_NAME_PATTERN.test(name);
};

export const splitExtension = (name: string): { stem: string; extension: string } => {
  const dotIndex = name.lastIndexOf(".");
  if (dotIndex <= 0) {
    return { stem: name, extension: "" };
  }

  return { stem: name.slice(0, dotIndex), extension: name.slice(dotIndex) };
};

/** `report.txt`, 1 → `report (1).txt` */
export const withCollisionSuffix = (name: string, attempt: number): string => {
  const { stem, extension } = splitExtension(name);
  return `${stem} (${attempt})${extension}`;
};
