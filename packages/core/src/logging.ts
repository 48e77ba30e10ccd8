/**
 * Debug logging.
 *
 * Lines are written as `[altgen:<scope>] <message>` and only when the
 * `debug` configuration flag is on (`ALTGEN_DEBUG=1`, or `debug: true` in
 * a config file or through `config.set`).
 */

import { config } from "./config.js";

export type LogWriter = (line: string) => void;

const defaultWriter: LogWriter = (line) => console.log(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the log writer. Passing nothing restores `console.log`.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? defaultWriter;
}

/** Whether debug logging is currently on. */
export function isDebugEnabled(): boolean {
  return config.get("debug") === true;
}

/**
 * Write a debug line. The message thunk is only evaluated when debug
 * logging is on.
 */
export function debugLog(scope: string, message: string | (() => string)): void {
  if (!isDebugEnabled()) return;
  const text = typeof message === "function" ? message() : message;
  writer(`[altgen:${scope}] ${text}`);
}
