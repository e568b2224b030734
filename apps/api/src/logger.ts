import pino from "pino";
import type { LogLevel } from "./config.js";

export interface Logger {
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}

export const SERVICE_NAME = "itemgate";

/** Fastify logger options; the server's own pino instance is built from these. */
export function loggerOptions(level: LogLevel): { name: string; level: LogLevel } {
  return { name: SERVICE_NAME, level };
}

/** Standalone logger for code that runs before the server exists. */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(loggerOptions(level));
}
