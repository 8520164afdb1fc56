import type { CommandRunner } from "./commands";
import { DBSetupError } from "./errors";
import type { Logger } from "../logger";

/**
 * Create `userName` as a superuser role.
 *
 * A non-zero exit is ignored: the role usually already exists. Other causes
 * (permissions, connectivity) are not told apart from that.
 *
 * @returns Whether createuser succeeded
 */
export async function createSuperuser(
  run: CommandRunner,
  createuser: string,
  socketDir: string,
  userName: string,
  logger: Logger,
): Promise<boolean> {
  const result = await run([createuser, "-h", socketDir, userName, "-s"]);

  if (result.code !== 0) {
    logger.info({
      message: `createuser ${userName} exited with ${result.code}, assuming the role exists`,
      verbosity: 2,
    });
    return false;
  }

  return true;
}

/**
 * Create each database in order.
 *
 * Every name is attempted even after a failure; the batch then fails as a whole.
 * Names go into the SQL as given, without quoting, so they must come from a
 * trusted caller.
 */
export async function createDatabases(
  run: CommandRunner,
  psql: string,
  socketDir: string,
  databases: string[],
  logger: Logger,
): Promise<void> {
  const failed: string[] = [];

  for (const name of databases) {
    const result = await run([
      psql,
      "-d",
      "postgres",
      "-h",
      socketDir,
      "-c",
      `create database ${name};`,
    ]);

    if (result.code !== 0) {
      logger.warn({
        message: `Couldn't create database ${name}`,
        verbosity: 2,
      });
      failed.push(name);
    }
  }

  if (failed.length > 0) {
    throw new DBSetupError(`Couldn't create databases: ${failed.join(", ")}`);
  }
}
