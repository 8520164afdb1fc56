/**
 * ephemeral-pg - disposable PostgreSQL servers for tests
 *
 * Each instance owns a private data directory and socket directory and is
 * torn down on failure, on request, or at process exit.
 */
export * from "./lib/temp-db";
export {
  RunTempDBCLI,
  createCLIConsoleLogger,
  parseStartArgs,
  type CLILoggerFunction,
} from "./lib/built-in-cli";
export {
  BaseLogger,
  ConsoleLogger,
  VerbosityLogger,
  consoleLogger,
  createPrefixedLogger,
  type Logger,
  type LogDataInput,
  type LogLevel,
} from "./lib/logger";
