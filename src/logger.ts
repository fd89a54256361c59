import { stdout } from "node:process";
import type { LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let minLevelValue = LEVEL_ORDER.info;

export function setLogLevel(level: LogLevel) {
  minLevelValue = LEVEL_ORDER[level];
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] > minLevelValue) {
    return;
  }
  const payload = {
    level,
    message,
    time: new Date().toISOString(),
    ...meta,
  };
  stdout.write(`${JSON.stringify(payload)}\n`);
}

type Meta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  debug(message: string, meta?: Meta): void;
  /** Logger whose lines always carry `bindings`; per-call meta wins on conflicts. */
  child(bindings: Meta): Logger;
}

function createLogger(bindings: Meta): Logger {
  const emit = (level: LogLevel) => (message: string, meta?: Meta) => log(level, message, { ...bindings, ...meta });
  return {
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    debug: emit("debug"),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger = createLogger({});
