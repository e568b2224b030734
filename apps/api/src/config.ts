import { z } from "zod";
import { DEFAULT_RATE_LIMIT_PERMITS, DEFAULT_RATE_LIMIT_WINDOW_MS } from "@itemgate/core";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  API_KEY: z.string().optional(),
  CORS_ORIGIN: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().nonnegative().default(DEFAULT_RATE_LIMIT_PERMITS),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(DEFAULT_RATE_LIMIT_WINDOW_MS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SEED_ITEMS: booleanFlag.default("true"),
});

export interface AppConfig {
  port: number;
  host: string;
  /** Undefined means no key is accepted and every /v1 request gets 401. */
  apiKey: string | undefined;
  /** `true` reflects any origin. */
  corsOrigin: true | string[];
  rateLimit: {
    permitLimit: number;
    windowMs: number;
  };
  logLevel: LogLevel;
  seedItems: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read configuration from environment variables. Variables set to an empty
 * string count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const origins = vars.CORS_ORIGIN?.split(",").map((o) => o.trim()).filter(Boolean) ?? [];

  return {
    port: vars.PORT,
    host: vars.HOST,
    apiKey: vars.API_KEY,
    corsOrigin: origins.length > 0 ? origins : true,
    rateLimit: {
      permitLimit: vars.RATE_LIMIT_MAX,
      windowMs: vars.RATE_LIMIT_WINDOW_MS,
    },
    logLevel: vars.LOG_LEVEL,
    seedItems: vars.SEED_ITEMS,
  };
}
