/**
 * Root logger for the CLI.
 *
 * Components only depend on `LoggerService`; the CLI owns the Winston-backed
 * root logger and feeds every secret it learns about into the redaction list.
 */

import type { LoggerService } from "@backstage/backend-plugin-api";
import { WinstonLogger } from "@backstage/backend-defaults/rootLogger";

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/** Receives secret values so they can be masked in every log line. */
export type SecretSink = (value: string) => void;

export interface RootLogger {
  logger: LoggerService;
  redact: SecretSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createRootLogger(level: LogLevel = "info"): RootLogger {
  const winston = WinstonLogger.create({
    meta: { service: "gitops-bootstrap" },
    level,
  });

  return {
    logger: winston,
    redact: (value: string) => {
      if (value.length > 0) {
        winston.addRedactions([value]);
      }
    },
  };
}
