import { pino, type Logger } from "pino";

export const SERVICE = "place-suggest";

export interface LoggerOptions {
  level?: string;
  env?: string;
}

function defaultLevel(env: string): string {
  if (env === "test") return "silent";
  return env === "production" ? "info" : "debug";
}

/**
 * JSON logs with ISO timestamps; pretty-printed in development.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const env = opts.env ?? process.env.NODE_ENV ?? "development";
  const level = opts.level ?? process.env.LOG_LEVEL ?? defaultLevel(env);

  return pino({
    level,
    base: { env, service: SERVICE },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(env === "development" && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    }),
  });
}

export const logger = createLogger();
