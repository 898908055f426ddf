import pino, { type Logger, type LoggerOptions } from "pino";
import { environment } from "./environment";
import { recordLog } from "./metrics";

// Define log levels and namespaces
const namespaces = [
  "orchestrator",
  "pipeline",
  "source",
  "cli",
] as const;
const logLevels = ["info", "warn", "debug", "error"] as const;

type Namespace = (typeof namespaces)[number];
type LogLevel = (typeof logLevels)[number];

export type LogMeta = Record<string, unknown>;
export type LogFn = (message: string, meta?: LogMeta, error?: Error) => void;
export type NamespaceLogger = Record<LogLevel, LogFn>;

let _pinoLogger: Logger | null = null;

/**
 * Create pino logger with appropriate configuration. Logs go to stderr so
 * stdout stays free for the histogram.
 */
function pinoLogger(): Logger {
  if (_pinoLogger) return _pinoLogger;

  const { NODE_ENV, LOG_LEVEL } = environment();
  const level = LOG_LEVEL ?? (NODE_ENV === "development" ? "debug" : "info");
  const options: LoggerOptions = {
    level,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  _pinoLogger =
    NODE_ENV === "development" && level !== "silent"
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
              destination: 2,
            },
          },
        })
      : pino(options, pino.destination({ dest: 2, sync: true }));

  return _pinoLogger;
}

/**
 * Create logger interface for a specific namespace and level
 */
function createLogger(namespace: Namespace, level: LogLevel): LogFn {
  return (message, meta, error) => {
    recordLog(namespace, level, error);

    const logObj: LogMeta = {
      namespace,
      ...meta,
    };

    if (error) {
      logObj.err = error;
    }

    pinoLogger()[level](logObj, message);
  };
}

function createNamespaceLogger(namespace: Namespace): NamespaceLogger {
  return {
    info: createLogger(namespace, "info"),
    warn: createLogger(namespace, "warn"),
    debug: createLogger(namespace, "debug"),
    error: createLogger(namespace, "error"),
  };
}

export const logger: Record<Namespace, NamespaceLogger> = {
  orchestrator: createNamespaceLogger("orchestrator"),
  pipeline: createNamespaceLogger("pipeline"),
  source: createNamespaceLogger("source"),
  cli: createNamespaceLogger("cli"),
};

/**
 * Structured logging bound to one namespace
 */
export class StructuredLogger {
  constructor(private namespace: Namespace) {}

  info(message: string, meta?: LogMeta) {
    logger[this.namespace].info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    logger[this.namespace].warn(message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    logger[this.namespace].debug(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta) {
    logger[this.namespace].error(message, meta, error);
  }
}

export function createStructuredLogger(namespace: Namespace): StructuredLogger {
  return new StructuredLogger(namespace);
}

export { namespaces, logLevels };
export type { Namespace, LogLevel };
