import type { TempDBOptions } from "./options";
import { TempDBInstance } from "./temp-db";

// Process-wide instance for callers that just want "a database"
let current: TempDBInstance | null = null;
let pending: Promise<TempDBInstance> | null = null;
let exitHookRegistered = false;

function registerExitHook(): void {
  if (exitHookRegistered) return;
  exitHookRegistered = true;

  // 'exit' handlers are synchronous, so only the sync variant can run here
  process.on("exit", () => {
    current?.cleanupSync();
  });
}

/**
 * Start the shared instance on first call; later calls return the same
 * instance whatever options they pass. It is cleaned up at process exit
 * unless the caller does it first.
 */
export function initTempDB(options: TempDBOptions = {}): Promise<TempDBInstance> {
  if (pending) {
    return pending;
  }

  let instance: TempDBInstance;

  try {
    instance = new TempDBInstance(options);
  } catch (error) {
    return Promise.reject(error);
  }

  current = instance;
  registerExitHook();

  pending = instance.start().then(
    () => instance,
    (error: unknown) => {
      // Nothing is left to clean up; let the next call try again
      current = null;
      pending = null;
      throw error;
    },
  );

  return pending;
}

/**
 * The shared instance, if one was created
 */
export function getTempDB(): TempDBInstance | null {
  return current;
}

/**
 * Clean up the shared instance now instead of at exit
 */
export async function cleanupTempDB(): Promise<void> {
  if (!current) return;
  await current.cleanup();
}
