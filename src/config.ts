import * as dotenv from "dotenv";

export type NodeEnv = "development" | "production" | "test";

export interface Config {
  NODE_ENV: NodeEnv;
  PORT: number;
  HOST: string;
  /** TSV file loaded at startup; empty string disables loading */
  DATA_FILE: string;
  LOG_LEVEL?: string;
}

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  return value === "production" || value === "test" ? value : "development";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    NODE_ENV: parseNodeEnv(env.NODE_ENV),
    PORT: parseNumericEnv(env.PORT, 3000),
    HOST: env.HOST || "0.0.0.0",
    DATA_FILE: env.DATA_FILE ?? "data/places.tsv",
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  };
}

/** Reads `.env` into `process.env` (existing variables win), then parses. */
export function loadConfigFromEnvironment(): Config {
  dotenv.config();
  return loadConfig(process.env);
}
