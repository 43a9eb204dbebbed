/**
 * Pino logger setup: pretty output in development, JSON elsewhere.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactRecord } from "./pii-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write to this stream instead of stdout; disables pretty printing. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "groundwrite";

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: redactRecord,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...pinoOptions, ...(transport ? { transport } : {}) });
}

/**
 * Child logger carrying per-call bindings such as `topic`, `documentId` or `jobId`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
