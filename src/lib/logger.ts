/**
 * Log level type
 */
export type LogLevel = "info" | "warn" | "error";

/**
 * Log data input structure (without level, which is determined by the method called)
 */
export interface LogDataInput {
  task?: string;
  stage?: string;
  message: string;
  error?: unknown;
  /**
   * Minimum verbosity at which the entry is emitted by a {@link VerbosityLogger}.
   * Progress messages use 1 (the default), command echoes and subprocess output use 2.
   */
  verbosity?: number;
}

/**
 * Complete log data structure (with level)
 */
export interface LogData extends LogDataInput {
  level: LogLevel;
}

/**
 * Logger interface for temp database operations
 */
export interface Logger {
  info: (data: LogDataInput) => void;
  error: (data: LogDataInput) => void;
  warn: (data: LogDataInput) => void;
}

/**
 * Build a log prefix from structured log data
 */
export function buildLogPrefix(data: LogData): string {
  const parts: string[] = [];

  if (data.task) {
    parts.push(`[${data.task}]`);
  }

  if (data.stage) {
    parts.push(`[${data.stage}]`);
  }

  return parts.length > 0 ? `${parts.join(" ")} ` : "";
}

/**
 * Render an unknown thrown value as text
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Abstract base logger class that implements the Logger interface
 */
export abstract class BaseLogger implements Logger {
  abstract info(data: LogDataInput): void;

  abstract error(data: LogDataInput): void;

  abstract warn(data: LogDataInput): void;

  /**
   * Create a prefixed logger that includes task and stage information
   */
  createPrefixed(prefix: { task?: string; stage?: string }): Logger {
    return new PrefixedLogger(this, prefix);
  }
}

/**
 * Console logger implementation
 */
export class ConsoleLogger extends BaseLogger {
  info(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "info" };
    const prefix = buildLogPrefix(logData);
    // eslint-disable-next-line no-console
    console.log(`${prefix}${logData.message}`);
  }

  error(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "error" };
    const prefix = buildLogPrefix(logData);

    if (logData.error === undefined) {
      // eslint-disable-next-line no-console
      console.error(`${prefix}${logData.message}`);
      return;
    }

    // eslint-disable-next-line no-console
    console.error(`${prefix}${logData.message}`, logData.error);
  }

  warn(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "warn" };
    const prefix = buildLogPrefix(logData);
    // eslint-disable-next-line no-console
    console.warn(`${prefix}${logData.message}`);
  }
}

/**
 * Logger that drops entries whose required verbosity exceeds the configured level.
 *
 * Level 0 silences everything, level 1 shows progress and warnings,
 * level 2 and above also shows command lines and subprocess output.
 */
export class VerbosityLogger extends BaseLogger {
  private baseLogger: Logger;
  private readonly verbosity: number;

  /**
   * @param baseLogger The underlying logger entries are forwarded to
   * @param verbosity Configured verbosity level (defaults to 1)
   */
  constructor(baseLogger: Logger, verbosity: number = 1) {
    super();
    this.baseLogger = baseLogger;
    this.verbosity = verbosity;
  }

  /**
   * Whether an entry requiring `level` would be emitted
   */
  isEnabled(level: number = 1): boolean {
    return level <= this.verbosity;
  }

  info(data: LogDataInput): void {
    if (this.isEnabled(data.verbosity)) {
      this.baseLogger.info(data);
    }
  }

  error(data: LogDataInput): void {
    if (this.isEnabled(data.verbosity)) {
      this.baseLogger.error(data);
    }
  }

  warn(data: LogDataInput): void {
    if (this.isEnabled(data.verbosity)) {
      this.baseLogger.warn(data);
    }
  }
}

/**
 * Prefixed logger that adds task and stage information to log messages
 * @internal This class is intended for internal use only
 */
export class PrefixedLogger extends BaseLogger {
  private baseLogger: Logger;
  private prefix: { task?: string; stage?: string };

  constructor(baseLogger: Logger, prefix: { task?: string; stage?: string }) {
    super();
    this.baseLogger = baseLogger;
    this.prefix = prefix;
  }

  info(data: LogDataInput): void {
    this.baseLogger.info({
      ...data,
      task: data.task || this.prefix.task,
      stage: data.stage || this.prefix.stage,
    });
  }

  error(data: LogDataInput): void {
    this.baseLogger.error({
      ...data,
      task: data.task || this.prefix.task,
      stage: data.stage || this.prefix.stage,
    });
  }

  warn(data: LogDataInput): void {
    this.baseLogger.warn({
      ...data,
      task: data.task || this.prefix.task,
      stage: data.stage || this.prefix.stage,
    });
  }
}

/**
 * Default console logger instance
 */
export const consoleLogger: Logger = new ConsoleLogger();

/**
 * Create a task-specific logger that prefills task and stage information
 */
export function createPrefixedLogger(
  baseLogger: Logger,
  prefix: { task?: string; stage?: string },
): Logger {
  if (baseLogger instanceof BaseLogger) {
    return baseLogger.createPrefixed(prefix);
  }

  return new PrefixedLogger(baseLogger, prefix);
}
