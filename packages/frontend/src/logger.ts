/* eslint-disable no-console */
import type { Logger } from "@battleship/core/domain/ports/Logger.js";

export function createBrowserLogger(namespace: string, debugEnabled = false): Logger {
  const prefix = `[${namespace}]`;
  return {
    info: (message, meta) => console.info(prefix, message, meta ?? ""),
    warn: (message, meta) => console.warn(prefix, message, meta ?? ""),
    error: (message, meta) => console.error(prefix, message, meta ?? ""),
    debug: (message, meta) => {
      if (debugEnabled) console.debug(prefix, message, meta ?? "");
    },
  };
}
