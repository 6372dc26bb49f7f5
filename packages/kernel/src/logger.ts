/**
 * Structured Logging
 *
 * Thin wrapper over pino. Modules take a named logger once at load time and
 * keep it; {@link Logger.configure} swaps the root underneath every module
 * logger already handed out.
 *
 * @example
 * ```typescript
 * import { Logger } from "@shadowtree/kernel";
 *
 * const log = Logger.for("Registry");
 * log.debug({ pending: 3 }, "reconcile pass finished");
 *
 * Logger.configure({ level: "debug" });
 * ```
 *
 * @module @shadowtree/kernel/logger
 */

import { pino, type DestinationStream, type Logger as PinoLogger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  /** Minimum level written (default: SHADOWTREE_LOG_LEVEL or "info") */
  level?: LogLevel;
  /** Root logger name (default: "shadowtree") */
  name?: string;
  /** Where log lines go (default: stdout) */
  destination?: DestinationStream;
}

export interface LogFn {
  (message: string): void;
  (fields: object, message?: string): void;
}

export interface ModuleLogger {
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  isLevelEnabled(level: LogLevel): boolean;
}

type WriteLevel = Exclude<LogLevel, "silent">;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createRoot(config: LoggerConfig): PinoLogger {
  const envLevel = process.env.SHADOWTREE_LOG_LEVEL;
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : "info");
  const options = { name: config.name ?? "shadowtree", level };
  return config.destination ? pino(options, config.destination) : pino(options);
}

let root = createRoot({});
let generation = 0;

class NamedLogger implements ModuleLogger {
  private child: PinoLogger | null = null;
  private childGeneration = -1;

  constructor(private readonly name: string) {}

  trace: LogFn = (first: string | object, message?: string) => this.write("trace", first, message);
  debug: LogFn = (first: string | object, message?: string) => this.write("debug", first, message);
  info: LogFn = (first: string | object, message?: string) => this.write("info", first, message);
  warn: LogFn = (first: string | object, message?: string) => this.write("warn", first, message);
  error: LogFn = (first: string | object, message?: string) => this.write("error", first, message);
  fatal: LogFn = (first: string | object, message?: string) => this.write("fatal", first, message);

  isLevelEnabled(level: LogLevel): boolean {
    return this.target().isLevelEnabled(level);
  }

  private target(): PinoLogger {
    if (this.child === null || this.childGeneration !== generation) {
      this.child = root.child({ component: this.name });
      this.childGeneration = generation;
    }
    return this.child;
  }

  private write(level: WriteLevel, first: string | object, message?: string): void {
    const target = this.target();
    if (typeof first === "string") {
      target[level](first);
    } else {
      target[level](first, message);
    }
  }
}

const named = new Map<string, NamedLogger>();

export const Logger = {
  /**
   * Logger bound to `{ component: name }`. Same name, same instance.
   */
  for(name: string): ModuleLogger {
    let logger = named.get(name);
    if (!logger) {
      logger = new NamedLogger(name);
      named.set(name, logger);
    }
    return logger;
  },

  /**
   * Replace the root logger. Existing module loggers pick it up on their
   * next write.
   */
  configure(config: LoggerConfig): void {
    root = createRoot(config);
    generation++;
  },

  get level(): string {
    return root.level;
  },
};
