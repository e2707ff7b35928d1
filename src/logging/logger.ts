/**
 * Pino logger factory. JSON to stdout; formatting is left to an external
 * pipe such as pino-pretty.
 *
 * Reads PINO_LOG_LEVEL, NODE_ENV and SERVICE_NAME directly from the
 * environment. Output is disabled under NODE_ENV=test.
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const pinoLogLevel = process.env.PINO_LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "postgis-tasks";

  return pino(
    {
      level: pinoLogLevel,
      enabled: nodeEnv !== "test",
      base: { ...bindings, service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 1, sync: true })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
