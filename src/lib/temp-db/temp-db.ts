import type { ChildProcess } from "child_process";
import { spawnSync } from "child_process";
import { once } from "events";
import { rmSync } from "fs";
import { rm } from "fs/promises";
import { setTimeout as sleep } from "timers/promises";
import pg from "pg";
import type { Pool, PoolConfig } from "pg";
import {
  createCommandRunner,
  hasExited,
  runCommand,
  type CommandRunner,
} from "./commands";
import {
  clientCommand,
  clientSocketDir,
  clientTools,
  launchServer,
  selectExecutionMode,
  type ServerHandle,
} from "./launcher";
import {
  resolveOptions,
  type ResolvedTempDBOptions,
  type TempDBOptions,
} from "./options";
import {
  createSystemIdentity,
  currentUserName,
  resolveAccount,
  withAccount,
  type Account,
  type ProcessIdentity,
} from "./privilege";
import { createDatabases, createSuperuser } from "./provisioner";
import { buildProbeCommand, waitForServer } from "./readiness";
import { allocateWorkspace, type Workspace } from "./workspace";
import { DBSetupError } from "./errors";
import { describeError, VerbosityLogger, type Logger } from "../logger";

const TASK = "temp-db";
const SETUP_CANCELLED = "Setup cancelled by cleanup";

/**
 * A disposable PostgreSQL server living in its own directories.
 *
 * `start()` resolves an account, allocates the workspace, launches the server
 * (directly, or in a container when postgres is not installed), waits for it
 * and provisions the role and databases. If any step fails, everything
 * allocated so far is released before the error is re-thrown.
 */
export class TempDBInstance {
  private options: ResolvedTempDBOptions;
  private logger: VerbosityLogger;
  private identity: ProcessIdentity;
  private userName: string;

  // Runtime state; every field has a value before any stage can fail
  private account: Account | null = null;
  private workspace: Workspace | null = null;
  private ownedBaseDir: string | null = null;
  private server: ServerHandle | null = null;
  private isRunning: boolean = false;
  private starting: Promise<void> | null = null;
  private setupAbort: AbortController | null = null;

  /**
   * @param options Configuration options
   * @param identity Process identity to read and switch; defaults to the real process
   */
  constructor(options: TempDBOptions = {}, identity?: ProcessIdentity) {
    this.options = resolveOptions(options);
    this.logger = new VerbosityLogger(
      this.options.logger,
      this.options.verbosity,
    );
    this.identity =
      identity ?? createSystemIdentity(this.stageLogger("privilege"));
    this.userName = currentUserName();
  }

  /**
   * Construct and start in one step
   */
  public static async create(
    options: TempDBOptions = {},
    identity?: ProcessIdentity,
  ): Promise<TempDBInstance> {
    const instance = new TempDBInstance(options, identity);
    await instance.start();
    return instance;
  }

  private stageLogger(stage: string): Logger {
    return this.logger.createPrefixed({ task: TASK, stage });
  }

  /**
   * Check if the server is running and provisioned
   */
  public isReady(): boolean {
    return this.isRunning;
  }

  /** Socket directory to connect through, as seen from this host */
  public get socketDir(): string | null {
    return this.workspace?.socketDir ?? null;
  }

  public get dataDir(): string | null {
    return this.workspace?.dataDir ?? null;
  }

  public get baseDir(): string | null {
    return this.workspace?.baseDir ?? null;
  }

  public get mode(): ServerHandle["mode"] | null {
    return this.server?.mode ?? null;
  }

  /** PID of the server process (direct mode) */
  public get pid(): number | null {
    if (this.server?.mode !== "direct") {
      return null;
    }

    return this.server.process.pid ?? null;
  }

  public get containerId(): string | null {
    return this.server?.mode === "container" ? this.server.containerId : null;
  }

  /** Role created for the invoking account */
  public get user(): string {
    return this.userName;
  }

  /**
   * Start the server and provision it. Calling it again while running is a no-op.
   */
  public async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    if (!this.starting) {
      const abort = new AbortController();
      this.setupAbort = abort;
      this.starting = this.setup(abort.signal).finally(() => {
        this.starting = null;
        this.setupAbort = null;
      });
    }

    return this.starting;
  }

  private async setup(signal: AbortSignal): Promise<void> {
    const log = this.stageLogger("setup");
    log.info({ message: "Creating temp PG server..." });

    try {
      this.account = await resolveAccount(this.options.runAs, this.identity);
      signal.throwIfAborted();

      const workspace = withAccount(
        this.account,
        () =>
          allocateWorkspace(
            {
              baseDir: this.options.baseDir,
              socketDir: this.options.socketDir,
            },
            (baseDir) => {
              this.ownedBaseDir = baseDir;
            },
          ),
        this.identity,
      );
      this.workspace = workspace;

      const launchLogger = this.stageLogger("launch");
      const mode = await selectExecutionMode(
        this.options.tools,
        this.options.containerImage,
        launchLogger,
      );
      signal.throwIfAborted();

      const server = await launchServer({
        mode,
        tools: this.options.tools,
        account: this.account,
        dataDir: workspace.dataDir,
        socketDir: workspace.socketDir,
        serverOptions: this.options.serverOptions,
        run: createCommandRunner(launchLogger),
        logger: launchLogger,
        showOutput: this.logger.isEnabled(2),
        onLaunched: (launched) => {
          this.server = launched;
        },
        signal,
      });
      signal.throwIfAborted();

      await this.waitUntilReady(server, workspace.socketDir, signal);
      signal.throwIfAborted();

      await this.provision(server, workspace.socketDir);
      signal.throwIfAborted();

      this.isRunning = true;

      log.info({ message: "done" });
      log.info({
        message: `(Connect on: \`psql -h ${workspace.socketDir}\`)`,
      });
    } catch (error) {
      if (signal.aborted) {
        log.info({ message: "Temp PG server setup cancelled" });
      } else {
        log.error({
          message: `Failed to create temp PG server: ${describeError(error)}`,
        });
      }

      await this.release();

      throw signal.aborted
        ? new DBSetupError(SETUP_CANCELLED, { cause: error })
        : error;
    }
  }

  /**
   * Client tool runner for the current server, with socket path translation
   */
  private clientRunner(server: ServerHandle, logger: Logger): CommandRunner {
    const run = createCommandRunner(logger);
    return (argv) => run(clientCommand(server, argv));
  }

  private async waitUntilReady(
    server: ServerHandle,
    hostSocketDir: string,
    signal: AbortSignal,
  ): Promise<void> {
    const logger = this.stageLogger("probe");
    const run = this.clientRunner(server, logger);
    const probeCommand = buildProbeCommand(
      clientTools(server, this.options.tools).psql,
      clientSocketDir(server, hostSocketDir),
    );

    await waitForServer({
      retry: this.options.retry,
      retryIntervalMs: this.options.retryIntervalMs,
      probe: async () => (await run(probeCommand)).code,
      logger,
      signal,
    });
  }

  private async provision(
    server: ServerHandle,
    hostSocketDir: string,
  ): Promise<void> {
    const logger = this.stageLogger("provision");
    const run = this.clientRunner(server, logger);
    const tools = clientTools(server, this.options.tools);
    // Tools run inside the container see the mounted socket path
    const socketDir = clientSocketDir(server, hostSocketDir);

    await createSuperuser(
      run,
      tools.createuser,
      socketDir,
      this.userName,
      logger,
    );
    await createDatabases(
      run,
      tools.psql,
      socketDir,
      this.options.databases,
      logger,
    );
  }

  /**
   * Connection settings for the `pg` client, over the socket directory
   */
  public getConnectionConfig(
    database: string = "postgres",
  ): PoolConfig | null {
    if (!this.isRunning || !this.workspace) {
      return null;
    }

    return {
      host: this.workspace.socketDir,
      database,
      user: this.userName,
      connectionTimeoutMillis: 5000,
      idleTimeoutMillis: 10000,
    };
  }

  /**
   * Create a connection pool to one of the databases; the caller ends it
   */
  public createPool(database: string = "postgres"): Pool {
    const config = this.getConnectionConfig(database);

    if (!config) {
      throw new Error("Temp database not started. Call start() first.");
    }

    return new pg.Pool(config);
  }

  private async stopProcess(child: ChildProcess): Promise<void> {
    if (hasExited(child)) {
      return;
    }

    const exited = once(child, "exit").then(
      () => true,
      () => true,
    );

    // SIGINT is a fast shutdown; su passes it on to the server
    child.kill("SIGINT");

    const abort = new AbortController();
    const timedOut = sleep(this.options.shutdownTimeoutMs, false, {
      signal: abort.signal,
    }).catch(() => true);

    const stopped = await Promise.race([exited, timedOut]);
    abort.abort();

    if (!stopped && !hasExited(child)) {
      this.stageLogger("cleanup").warn({
        message: `Server did not stop within ${this.options.shutdownTimeoutMs}ms, killing it`,
        verbosity: 2,
      });
      child.kill("SIGKILL");
      await exited;
    }
  }

  /**
   * Stop the server and remove owned directories.
   *
   * Safe to call any number of times, and after a failed start. A start still
   * in progress is cancelled and rejects with a {@link DBSetupError}; cleanup
   * resolves once it has unwound. Never rejects.
   */
  public async cleanup(): Promise<void> {
    const starting = this.starting;

    if (starting) {
      this.setupAbort?.abort();
      // The start() caller receives the rejection
      await starting.catch(() => undefined);
    }

    await this.release();
  }

  private async release(): Promise<void> {
    const logger = this.stageLogger("cleanup");
    this.isRunning = false;

    const server = this.server;
    this.server = null;

    try {
      if (server?.mode === "container") {
        const result = await runCommand(
          [server.runtime, "rm", "-f", server.containerId],
          new VerbosityLogger(this.options.logger, 0),
        );

        if (result.code !== 0) {
          logger.warn({
            message: `Could not remove container ${server.containerId}`,
            verbosity: 2,
          });
        }
      } else if (server?.mode === "direct") {
        await this.stopProcess(server.process);
      }
    } catch (error) {
      logger.warn({
        message: `Non-fatal error stopping the server: ${describeError(error)}`,
        verbosity: 2,
      });
    }

    const baseDir = this.ownedBaseDir;
    this.ownedBaseDir = null;
    this.workspace = null;

    if (baseDir) {
      try {
        await rm(baseDir, { recursive: true, force: true });
      } catch (error) {
        logger.warn({
          message: `Non-fatal error removing ${baseDir}: ${describeError(error)}`,
          verbosity: 2,
        });
      }
    }
  }

  /**
   * Synchronous cleanup for the process `exit` event, where nothing can be awaited
   */
  public cleanupSync(): void {
    // Nothing runs after an exit hook, so a pending start only needs to stop here
    this.setupAbort?.abort();
    this.isRunning = false;

    const server = this.server;
    this.server = null;

    try {
      if (server?.mode === "container") {
        spawnSync(server.runtime, ["rm", "-f", server.containerId], {
          stdio: "ignore",
        });
      } else if (server?.mode === "direct" && !hasExited(server.process)) {
        server.process.kill("SIGKILL");
      }
    } catch (error) {
      this.stageLogger("cleanup").warn({
        message: `Non-fatal error stopping the server: ${describeError(error)}`,
        verbosity: 2,
      });
    }

    const baseDir = this.ownedBaseDir;
    this.ownedBaseDir = null;
    this.workspace = null;

    if (baseDir) {
      try {
        rmSync(baseDir, { recursive: true, force: true });
      } catch (error) {
        this.stageLogger("cleanup").warn({
          message: `Non-fatal error removing ${baseDir}: ${describeError(error)}`,
          verbosity: 2,
        });
      }
    }
  }
}
