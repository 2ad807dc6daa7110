import log from "electron-log/node.js";

log.transports.file.level = "info";
log.transports.file.maxSize = 5 * 1024 * 1024;
log.transports.console.level = process.env.NODE_ENV === "development" ? "debug" : false;

export interface EngineLogger {
  info: (message: string, metadata?: Record<string, unknown>) => void;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  error: (message: string, metadata?: Record<string, unknown>) => void;
  debug: (message: string, metadata?: Record<string, unknown>) => void;
}

export const logger: EngineLogger = {
  info: (message, metadata) => log.info(message, metadata ?? {}),
  warn: (message, metadata) => log.warn(message, metadata ?? {}),
  error: (message, metadata) => log.error(message, metadata ?? {}),
  debug: (message, metadata) => log.debug(message, metadata ?? {})
};

export const silentLogger: EngineLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
