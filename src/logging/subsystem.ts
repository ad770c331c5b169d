import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from "pino";
import { isTruthyEnvValue } from "../infra/env.js";

export type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  readonly subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (name: string) => SubsystemLogger;
};

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

let rootLogger: Logger | undefined;

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "silent";
}

/**
 * Options for the environment-configured root logger. With `CLAUDE_SDK_LOG_PRETTY`
 * set, records go through the pino-pretty transport as colored lines on stderr.
 */
export function resolveRootLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const transport = isTruthyEnvValue(env.CLAUDE_SDK_LOG_PRETTY)
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,subsystem",
          levelFirst: true,
          messageFormat: "[{subsystem}] {msg}",
          destination: 2,
        },
      }
    : undefined;

  return {
    level: resolveLogLevel(env.CLAUDE_SDK_LOG_LEVEL),
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport && { transport }),
  };
}

function createRootLogger(): Logger {
  const options = resolveRootLoggerOptions();
  // A transport owns its destination; plain JSON lines go straight to stderr.
  return options.transport ? pino(options) : pino(options, pino.destination(2));
}

export function getRootLogger(): Logger {
  rootLogger ??= createRootLogger();
  return rootLogger;
}

/**
 * Replace the root logger, e.g. with the embedding application's pino instance.
 * Passing `undefined` falls back to the environment-configured logger on next use.
 */
export function setRootLogger(logger: Logger | undefined): void {
  rootLogger = logger;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let boundRoot: Logger | undefined;
  let bound: Logger | undefined;

  // Bound lazily so a root swapped in via setRootLogger is picked up by existing loggers.
  const resolve = (): Logger => {
    const root = getRootLogger();
    if (!bound || boundRoot !== root) {
      boundRoot = root;
      bound = root.child({ subsystem });
    }
    return bound;
  };

  const emit =
    (level: "debug" | "info" | "warn" | "error") => (message: string, meta?: LogMeta) => {
      const logger = resolve();
      if (meta) {
        logger[level](meta, message);
      } else {
        logger[level](message);
      }
    };

  return {
    subsystem,
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
