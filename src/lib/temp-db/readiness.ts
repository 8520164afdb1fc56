import { setTimeout as sleep } from "timers/promises";
import { DBSetupError } from "./errors";
import type { Logger } from "../logger";

export interface ReadinessOptions {
  retry: number;
  retryIntervalMs: number;
  /** One connection attempt; resolves with the exit code */
  probe: () => Promise<number | null>;
  logger: Logger;
  /** Stops waiting; the pending sleep rejects with the abort reason */
  signal?: AbortSignal;
}

/**
 * The lightweight command used to check the server accepts connections
 */
export function buildProbeCommand(psql: string, socketDir: string): string[] {
  return [psql, "-d", "postgres", "-h", socketDir, "-c", "\\dt"];
}

/**
 * Poll until the probe exits 0, sleeping before every attempt.
 *
 * @returns The number of attempts made
 */
export async function waitForServer(options: ReadinessOptions): Promise<number> {
  const { retry, retryIntervalMs, probe, logger, signal } = options;

  for (let attempt = 1; attempt <= retry; attempt++) {
    await sleep(retryIntervalMs, undefined, { signal });

    const code = await probe();

    if (code === 0) {
      logger.info({
        message: `Server accepted a connection (attempt ${attempt}/${retry})`,
        verbosity: 2,
      });
      return attempt;
    }

    logger.info({
      message: `Server not ready yet (attempt ${attempt}/${retry})`,
      verbosity: 2,
    });
  }

  throw new DBSetupError("Couldn't start PG server");
}
