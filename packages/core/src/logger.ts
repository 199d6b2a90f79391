/**
 * Prefixed console logging.
 *
 * Every line carries `[erasure-primer:<scope>]`. Debug lines are written
 * only while `config.isDebug()` holds.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Where formatted log lines go. Defaults to the matching console method. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.log(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
};

export function createLogger(scope: string, sink: LogSink = consoleSink): Logger {
  const prefix = `[erasure-primer:${scope}]`;
  const write = (level: LogLevel, message: string): void => sink(level, `${prefix} ${message}`);

  return {
    scope,
    debug(message) {
      if (config.isDebug()) write("debug", message);
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
  };
}
