import { DBSetupError } from "./errors";
import { consoleLogger, type Logger } from "../logger";

// Defaults for a temp database instance
export const DEFAULT_VERBOSITY = 1;
export const DEFAULT_RETRY = 5;
export const DEFAULT_RETRY_INTERVAL_MS = 1000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/** Image used when no local install exists and none was requested */
export const DEFAULT_CONTAINER_IMAGE = "postgres:16";

/** Socket directory the server sees inside the container */
export const CONTAINER_SOCKET_DIR = "/var/run/postgresql";

/** Account the server runs as when the caller is root */
export const SERVICE_ACCOUNT = "postgres";

/**
 * Names or paths of the external commands
 */
export interface ToolPaths {
  initdb: string;
  postgres: string;
  psql: string;
  createuser: string;
  containerRuntime: string;
}

export const DEFAULT_TOOLS: ToolPaths = {
  initdb: "initdb",
  postgres: "postgres",
  psql: "psql",
  createuser: "createuser",
  containerRuntime: "docker",
};

export type ServerOptionValue = string | number | boolean;

/**
 * TempDBInstance options interface
 */
export interface TempDBOptions {
  /** Databases created once the server is ready */
  databases?: string[];
  /** 0 is silent, 1 shows progress, 2 and above shows commands and their output */
  verbosity?: number;
  /** Number of readiness probes before giving up */
  retry?: number;
  /** Delay before each readiness probe */
  retryIntervalMs?: number;
  /** Forces container mode even when a local install exists */
  containerImage?: string;
  tools?: Partial<ToolPaths>;
  /** Caller-owned directory to create `data` and `socket` in; never removed */
  baseDir?: string;
  /** Caller-owned socket directory; never removed */
  socketDir?: string;
  /** Server configuration, passed to postgres as `-c key=value` */
  serverOptions?: Record<string, ServerOptionValue>;
  /** Account to run the server as, instead of detecting root */
  runAs?: string;
  logger?: Logger;
  /** How long to wait for the server to exit before killing it */
  shutdownTimeoutMs?: number;
}

export interface ResolvedTempDBOptions {
  databases: string[];
  verbosity: number;
  retry: number;
  retryIntervalMs: number;
  containerImage: string | null;
  tools: ToolPaths;
  baseDir: string | null;
  socketDir: string | null;
  serverOptions: Record<string, ServerOptionValue>;
  runAs: string | null;
  logger: Logger;
  shutdownTimeoutMs: number;
}

function requireNonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new DBSetupError(`Invalid ${name}: ${value}`);
  }

  return value;
}

/**
 * Fill in defaults and reject settings no run could succeed with
 */
export function resolveOptions(
  options: TempDBOptions = {},
): ResolvedTempDBOptions {
  const retry = options.retry ?? DEFAULT_RETRY;

  if (!Number.isInteger(retry) || retry < 1) {
    throw new DBSetupError(`Invalid retry count: ${retry}`);
  }

  return {
    databases: [...(options.databases ?? [])],
    verbosity: requireNonNegative(
      "verbosity",
      options.verbosity ?? DEFAULT_VERBOSITY,
    ),
    retry,
    retryIntervalMs: requireNonNegative(
      "retry interval",
      options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS,
    ),
    containerImage: options.containerImage || null,
    tools: { ...DEFAULT_TOOLS, ...options.tools },
    baseDir: options.baseDir || null,
    socketDir: options.socketDir || null,
    serverOptions: { ...options.serverOptions },
    runAs: options.runAs || null,
    logger: options.logger ?? consoleLogger,
    shutdownTimeoutMs: requireNonNegative(
      "shutdown timeout",
      options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    ),
  };
}

/**
 * Render server options as repeated `-c key=value` flags
 */
export function serverOptionFlags(
  serverOptions: Record<string, ServerOptionValue>,
): string[] {
  return Object.entries(serverOptions).flatMap(([key, value]) => [
    "-c",
    `${key}=${String(value)}`,
  ]);
}
