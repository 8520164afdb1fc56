import { TempDBInstance } from "./temp-db/temp-db";
import type { TempDBOptions, ToolPaths } from "./temp-db/options";
import {
  BaseLogger,
  buildLogPrefix,
  describeError,
  type LogDataInput,
} from "./logger";

/**
 * Logger function type for the temp-db CLI
 */
export type CLILoggerFunction = (
  type: "info" | "error" | "warn" | "db-info" | "db-error" | "db-warn",
  message: string,
) => void;

/**
 * Console-based logger implementation for the temp-db CLI
 * @param dbVerbose Whether to log messages coming from the temp database itself
 */
export const createCLIConsoleLogger = (
  dbVerbose: boolean = true,
): CLILoggerFunction => {
  return (type, message) => {
    switch (type) {
      case "info":
        console.log(message);
        break;
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "db-info":
        if (dbVerbose) {
          console.log(`[DB] ${message}`);
        }
        break;
      case "db-error":
        console.error(`[DB-ERROR] ${message}`);
        break;
      case "db-warn":
        console.warn(`[DB-WARN] ${message}`);
        break;
    }
  };
};

/**
 * Adapter from the Logger interface to the CLI logger function, keeping
 * temp database output apart from the CLI's own messages
 */
class CLITempDBLogger extends BaseLogger {
  private cliLogger: CLILoggerFunction;

  constructor(logger: CLILoggerFunction) {
    super();
    this.cliLogger = logger;
  }

  info(data: LogDataInput): void {
    const prefix = buildLogPrefix({ ...data, level: "info" });
    this.cliLogger("db-info", `${prefix}${data.message}`);
  }

  error(data: LogDataInput): void {
    const prefix = buildLogPrefix({ ...data, level: "error" });
    const message =
      data.error !== undefined
        ? `${data.message}: ${describeError(data.error)}`
        : data.message;
    this.cliLogger("db-error", `${prefix}${message}`);
  }

  warn(data: LogDataInput): void {
    const prefix = buildLogPrefix({ ...data, level: "warn" });
    this.cliLogger("db-warn", `${prefix}${data.message}`);
  }
}

const USAGE = `
Temp Database CLI

Available commands:
  start       Start a temp PostgreSQL server and keep it until interrupted
  help        Show this message

Options for start:
  --db <name>            Database to create (repeatable)
  --verbosity <n>        0 silent, 1 progress, 2 commands and their output
  --retry <n>            Readiness probes before giving up
  --interval <ms>        Delay before each readiness probe
  --image <name>         Run the server in this container image
  --dir <path>           Create data/ and socket/ in this directory (kept)
  --socket-dir <path>    Use this socket directory (kept)
  --run-as <user>        Run the server as this account
  -c <key=value>         Server configuration option (repeatable)
  --initdb, --postgres, --psql, --createuser, --runtime <path>
                         Override an external command
`;

const TOOL_FLAGS: Record<string, keyof ToolPaths> = {
  "--initdb": "initdb",
  "--postgres": "postgres",
  "--psql": "psql",
  "--createuser": "createuser",
  "--runtime": "containerRuntime",
};

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);

  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }

  return parsed;
}

/**
 * Parse the options of the `start` command
 * @param args Arguments after the command name
 */
export function parseStartArgs(args: string[]): TempDBOptions {
  const options: TempDBOptions = {};
  const databases: string[] = [];
  const serverOptions: Record<string, string> = {};
  const tools: Partial<ToolPaths> = {};

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];

    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }

    i++;

    if (Object.hasOwn(TOOL_FLAGS, flag)) {
      tools[TOOL_FLAGS[flag]] = value;
      continue;
    }

    switch (flag) {
      case "--db":
        databases.push(value);
        break;
      case "--verbosity":
        options.verbosity = parseNumber(flag, value);
        break;
      case "--retry":
        options.retry = parseNumber(flag, value);
        break;
      case "--interval":
        options.retryIntervalMs = parseNumber(flag, value);
        break;
      case "--image":
        options.containerImage = value;
        break;
      case "--dir":
        options.baseDir = value;
        break;
      case "--socket-dir":
        options.socketDir = value;
        break;
      case "--run-as":
        options.runAs = value;
        break;
      case "-c": {
        const separator = value.indexOf("=");
        if (separator <= 0) {
          throw new Error(`-c expects key=value, got "${value}"`);
        }
        serverOptions[value.slice(0, separator)] = value.slice(separator + 1);
        break;
      }
      default:
        throw new Error(`Unknown option: ${flag}`);
    }
  }

  if (databases.length > 0) {
    options.databases = databases;
  }

  if (Object.keys(serverOptions).length > 0) {
    options.serverOptions = serverOptions;
  }

  if (Object.keys(tools).length > 0) {
    options.tools = tools;
  }

  return options;
}

/**
 * Resolve once the process receives SIGINT, SIGTERM or SIGHUP
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      for (const s of signals) {
        process.off(s, handler);
      }
      resolve(signal);
    };

    for (const s of signals) {
      process.on(s, handler);
    }
  });
}

/**
 * Run the temp-db CLI
 * @param config.logger Logger function to use (required)
 * @param config.argv Optional array to use instead of process.argv
 * @param config.waitForShutdown Resolves when the server should be removed; defaults to waiting for a signal
 */
export async function RunTempDBCLI(config: {
  logger: CLILoggerFunction;
  argv?: string[];
  waitForShutdown?: (db: TempDBInstance) => Promise<unknown>;
}): Promise<void> {
  const args = config.argv || process.argv;
  const operation = args[2] || "help";

  if (operation !== "start") {
    config.logger("info", USAGE);
    return;
  }

  let db: TempDBInstance | undefined;

  try {
    const options = parseStartArgs(args.slice(3));
    db = new TempDBInstance({
      ...options,
      logger: new CLITempDBLogger(config.logger),
    });

    await db.start();

    const database = options.databases?.[0] ?? "postgres";
    config.logger("info", `Socket directory: ${db.socketDir}`);
    config.logger(
      "info",
      `Connect with: psql -h ${db.socketDir} -d ${database}`,
    );
    config.logger("info", "Press Ctrl+C to stop the server");

    const wait = config.waitForShutdown ?? waitForShutdownSignal;
    await wait(db);

    config.logger("info", "Stopping temp database...");
  } catch (error) {
    config.logger("error", `Error: ${describeError(error)}`);
    throw error;
  } finally {
    await db?.cleanup();
  }
}
