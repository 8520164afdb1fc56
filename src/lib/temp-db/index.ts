export { TempDBInstance } from "./temp-db";
export { initTempDB, getTempDB, cleanupTempDB } from "./singleton";
export { DBSetupError } from "./errors";
export {
  CONTAINER_SOCKET_DIR,
  DEFAULT_CONTAINER_IMAGE,
  DEFAULT_RETRY,
  DEFAULT_RETRY_INTERVAL_MS,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_TOOLS,
  DEFAULT_VERBOSITY,
  SERVICE_ACCOUNT,
} from "./options";
export type { TempDBOptions, ToolPaths, ServerOptionValue } from "./options";
export type { Account, ProcessIdentity } from "./privilege";
export type { ExecutionMode, ServerHandle } from "./launcher";
