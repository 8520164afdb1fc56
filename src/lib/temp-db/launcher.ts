import type { ChildProcess } from "child_process";
import { readFile, unlink } from "fs/promises";
import tmp from "tmp";
import {
  findExecutable,
  spawnBackground,
  type CommandRunner,
} from "./commands";
import { DBSetupError } from "./errors";
import {
  CONTAINER_SOCKET_DIR,
  DEFAULT_CONTAINER_IMAGE,
  serverOptionFlags,
  type ServerOptionValue,
  type ToolPaths,
} from "./options";
import { wrapCommand, type Account } from "./privilege";
import type { Logger } from "../logger";

/**
 * Where the server runs, decided once per instance
 */
export type ExecutionMode =
  | { kind: "direct" }
  | { kind: "container"; runtime: string; image: string };

/**
 * What cleanup has to stop
 */
export type ServerHandle =
  | { mode: "direct"; process: ChildProcess; account: Account | null }
  | { mode: "container"; runtime: string; containerId: string };

/**
 * Pick direct mode when postgres is installed, otherwise fall back to a container
 */
export async function selectExecutionMode(
  tools: ToolPaths,
  containerImage: string | null,
  logger: Logger,
): Promise<ExecutionMode> {
  if (containerImage) {
    if (!(await findExecutable(tools.containerRuntime))) {
      throw new DBSetupError(
        `Container image ${containerImage} requested but ${tools.containerRuntime} was not found`,
      );
    }

    return {
      kind: "container",
      runtime: tools.containerRuntime,
      image: containerImage,
    };
  }

  const [postgres, initdb] = await Promise.all([
    findExecutable(tools.postgres),
    findExecutable(tools.initdb),
  ]);

  if (postgres && initdb) {
    return { kind: "direct" };
  }

  if (await findExecutable(tools.containerRuntime)) {
    logger.warn({
      message: `No local PostgreSQL found, falling back to ${tools.containerRuntime} image ${DEFAULT_CONTAINER_IMAGE}`,
    });

    return {
      kind: "container",
      runtime: tools.containerRuntime,
      image: DEFAULT_CONTAINER_IMAGE,
    };
  }

  throw new DBSetupError(
    "No PostgreSQL installation or container runtime found",
  );
}

export interface LaunchContext {
  mode: ExecutionMode;
  tools: ToolPaths;
  account: Account | null;
  dataDir: string;
  socketDir: string;
  serverOptions: Record<string, ServerOptionValue>;
  run: CommandRunner;
  logger: Logger;
  /** Pipe server output into the logger */
  showOutput: boolean;
  /** Called as soon as something exists that cleanup has to stop */
  onLaunched: (server: ServerHandle) => void;
  /** Aborted when the instance is cleaned up mid-start */
  signal?: AbortSignal;
}

/**
 * The postgres command line for direct mode
 */
export function buildServerCommand(
  postgres: string,
  dataDir: string,
  socketDir: string,
  serverOptions: Record<string, ServerOptionValue>,
): string[] {
  return [
    postgres,
    "-F",
    "-T",
    "-D",
    dataDir,
    "-k",
    socketDir,
    // no TCP listener; the socket directory is the only address
    "-h",
    "",
    ...serverOptionFlags(serverOptions),
  ];
}

async function launchDirect(ctx: LaunchContext): Promise<ServerHandle> {
  const init = await ctx.run(
    wrapCommand(ctx.account, [ctx.tools.initdb, ctx.dataDir]),
  );

  if (init.code !== 0) {
    throw new DBSetupError("Couldn't initialize temp PG data dir");
  }

  ctx.signal?.throwIfAborted();

  const command = buildServerCommand(
    ctx.tools.postgres,
    ctx.dataDir,
    ctx.socketDir,
    ctx.serverOptions,
  );

  ctx.logger.info({ message: `Running ${command.join(" ")}` });

  const child = spawnBackground(
    wrapCommand(ctx.account, command),
    ctx.logger,
    ctx.showOutput,
  );

  const server: ServerHandle = {
    mode: "direct",
    process: child,
    account: ctx.account,
  };
  ctx.onLaunched(server);

  return server;
}

/**
 * Container id written by the runtime, or null if it never got that far
 */
async function readContainerId(cidFile: string): Promise<string | null> {
  try {
    return (await readFile(cidFile, "utf8")).trim() || null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Run the server from an image, with the host socket directory mounted where
 * the image expects it.
 *
 * The official image's entrypoint initializes a fresh cluster with a
 * temporary server on the same socket, then restarts into the real one. A
 * readiness check that lands on the temporary server passes, and a client command
 * issued right after can hit the restart. Provisioning is not retried for
 * this.
 */
async function launchContainer(
  ctx: LaunchContext,
  runtime: string,
  image: string,
): Promise<ServerHandle> {
  // The runtime refuses to overwrite an existing cidfile, so only reserve a name
  const cidFile = tmp.tmpNameSync({ prefix: "pg_cid_" });

  const command = [
    runtime,
    "run",
    "--rm",
    "-d",
    "--cidfile",
    cidFile,
    "-e",
    "POSTGRES_HOST_AUTH_METHOD=trust",
    "-v",
    `${ctx.socketDir}:${CONTAINER_SOCKET_DIR}`,
    image,
    ...serverOptionFlags(ctx.serverOptions),
  ];

  ctx.logger.info({ message: `Running ${command.join(" ")}` });

  try {
    const result = await ctx.run(command);

    // The runtime can create the container and still fail to start it
    const containerId = await readContainerId(cidFile);
    const server: ServerHandle | null = containerId
      ? { mode: "container", runtime, containerId }
      : null;

    if (server) {
      ctx.onLaunched(server);
    }

    if (result.code !== 0) {
      throw new DBSetupError(`Couldn't start PG container from ${image}`);
    }

    if (!server) {
      throw new DBSetupError(`Container runtime did not report an id for ${image}`);
    }

    return server;
  } finally {
    await unlink(cidFile).catch((error: NodeJS.ErrnoException) => {
      if (error.code !== "ENOENT") {
        ctx.logger.warn({
          message: `Could not remove ${cidFile}: ${error.message}`,
          verbosity: 2,
        });
      }
    });
  }
}

/**
 * Start the server for the chosen mode and return the handle cleanup needs
 */
export function launchServer(ctx: LaunchContext): Promise<ServerHandle> {
  switch (ctx.mode.kind) {
    case "direct":
      return launchDirect(ctx);
    case "container":
      return launchContainer(ctx, ctx.mode.runtime, ctx.mode.image);
  }
}

/**
 * Socket directory as seen by the client tools
 */
export function clientSocketDir(
  server: ServerHandle,
  hostSocketDir: string,
): string {
  return server.mode === "container" ? CONTAINER_SOCKET_DIR : hostSocketDir;
}

/**
 * Client tool paths for the mode; host overrides mean nothing inside a container
 */
export function clientTools(
  server: ServerHandle,
  tools: ToolPaths,
): Pick<ToolPaths, "psql" | "createuser"> {
  if (server.mode === "container") {
    return { psql: "psql", createuser: "createuser" };
  }

  return { psql: tools.psql, createuser: tools.createuser };
}

/**
 * Rewrite a client tool invocation to run where the server's socket is
 */
export function clientCommand(server: ServerHandle, argv: string[]): string[] {
  switch (server.mode) {
    case "direct":
      return wrapCommand(server.account, argv);
    case "container":
      return [
        server.runtime,
        "exec",
        "-u",
        "postgres",
        server.containerId,
        ...argv,
      ];
  }
}
