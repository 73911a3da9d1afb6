/**
 * Debug logging.
 *
 * Lines look like `[quotient:<scope>] <message>` and are only written when
 * `debug` is set in the configuration.
 */

import { config } from "./config.js";

export type LogWriter = (line: string) => void;

const defaultWriter: LogWriter = (line) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the writer used for debug lines. Returns the previous writer.
 * Pass nothing to restore the default (stderr).
 */
export function setLogWriter(next?: LogWriter): LogWriter {
  const previous = writer;
  writer = next ?? defaultWriter;
  return previous;
}

/**
 * Write a debug line for `scope` if debug logging is enabled.
 */
export function debugLog(scope: string, message: string | (() => string)): void {
  if (!config.isDebug()) return;
  const text = typeof message === "function" ? message() : message;
  writer(`[quotient:${scope}] ${text}`);
}
