import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "fs";
import {
  RunTempDBCLI,
  createCLIConsoleLogger,
  parseStartArgs,
  type CLILoggerFunction,
} from "./built-in-cli";
import type { TempDBInstance } from "./temp-db/temp-db";
import { createFakeTools, type FakeTools } from "../test/fake-tools";

describe("createCLIConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log different message types correctly", () => {
    const mockLog = vi.spyOn(console, "log").mockImplementation(() => {});
    const mockError = vi.spyOn(console, "error").mockImplementation(() => {});
    const mockWarn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createCLIConsoleLogger(true);

    logger("info", "Test info message");
    logger("error", "Test error message");
    logger("warn", "Test warning message");
    logger("db-info", "Test db info");
    logger("db-error", "Test db error");
    logger("db-warn", "Test db warning");

    expect(mockLog.mock.calls).toEqual([
      ["Test info message"],
      ["[DB] Test db info"],
    ]);
    expect(mockError.mock.calls).toEqual([
      ["Test error message"],
      ["[DB-ERROR] Test db error"],
    ]);
    expect(mockWarn.mock.calls).toEqual([
      ["Test warning message"],
      ["[DB-WARN] Test db warning"],
    ]);
  });

  it("should skip temp database info when not verbose", () => {
    const mockLog = vi.spyOn(console, "log").mockImplementation(() => {});
    const mockError = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createCLIConsoleLogger(false);

    logger("db-info", "Hidden");
    logger("db-error", "Still shown");

    expect(mockLog).not.toHaveBeenCalled();
    expect(mockError).toHaveBeenCalledWith("[DB-ERROR] Still shown");
  });
});

describe("parseStartArgs", () => {
  it("should return no options for no arguments", () => {
    expect(parseStartArgs([])).toEqual({});
  });

  it("should map every flag onto the instance options", () => {
    expect(
      parseStartArgs([
        "--db",
        "app",
        "--db",
        "app_test",
        "--verbosity",
        "2",
        "--retry",
        "10",
        "--interval",
        "250",
        "--image",
        "postgres:15",
        "--dir",
        "/srv/pg",
        "--socket-dir",
        "/srv/sock",
        "--run-as",
        "builder",
        "-c",
        "shared_buffers=16MB",
        "-c",
        "search_path=a,b",
        "--initdb",
        "/opt/pg/bin/initdb",
        "--runtime",
        "podman",
      ]),
    ).toEqual({
      databases: ["app", "app_test"],
      verbosity: 2,
      retry: 10,
      retryIntervalMs: 250,
      containerImage: "postgres:15",
      baseDir: "/srv/pg",
      socketDir: "/srv/sock",
      runAs: "builder",
      serverOptions: { shared_buffers: "16MB", search_path: "a,b" },
      tools: { initdb: "/opt/pg/bin/initdb", containerRuntime: "podman" },
    });
  });

  it("should reject a flag without a value", () => {
    expect(() => parseStartArgs(["--db"])).toThrow("Missing value for --db");
  });

  it("should reject unknown flags", () => {
    expect(() => parseStartArgs(["--port", "5432"])).toThrow(
      "Unknown option: --port",
    );
    expect(() => parseStartArgs(["constructor", "x"])).toThrow(
      "Unknown option: constructor",
    );
  });

  it("should reject numbers that don't parse", () => {
    expect(() => parseStartArgs(["--retry", "lots"])).toThrow(
      '--retry expects a number, got "lots"',
    );
    expect(() => parseStartArgs(["--interval", " "])).toThrow(
      '--interval expects a number, got " "',
    );
  });

  it("should reject -c values that aren't key=value", () => {
    expect(() => parseStartArgs(["-c", "fsync"])).toThrow(
      '-c expects key=value, got "fsync"',
    );
    expect(() => parseStartArgs(["-c", "=off"])).toThrow(
      '-c expects key=value, got "=off"',
    );
  });
});

describe("RunTempDBCLI", () => {
  let fake: FakeTools;
  let messages: Array<[string, string]>;
  let logger: CLILoggerFunction;

  const cliMessages = () =>
    messages.filter(([type]) => type === "info" || type === "error");

  const startArgs = () => [
    "node",
    "temp-db",
    "start",
    "--verbosity",
    "0",
    "--retry",
    "5",
    "--interval",
    "10",
    "--initdb",
    fake.tools.initdb,
    "--postgres",
    fake.tools.postgres,
    "--psql",
    fake.tools.psql,
    "--createuser",
    fake.tools.createuser,
  ];

  beforeEach(() => {
    // Keep the system identity from switching accounts when tests run as root
    vi.spyOn(process, "geteuid").mockReturnValue(1000);
    fake = createFakeTools();
    messages = [];
    logger = (type, message) => {
      messages.push([type, message]);
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fake.remove();
  });

  it("should print usage for help and unknown commands", async () => {
    await RunTempDBCLI({ logger, argv: ["node", "temp-db", "help"] });
    await RunTempDBCLI({ logger, argv: ["node", "temp-db", "bogus"] });

    expect(messages).toHaveLength(2);
    expect(messages[0][0]).toBe("info");
    expect(messages[0][1]).toContain("Temp Database CLI");
    expect(messages[1]).toEqual(messages[0]);
  });

  it("should start a server, wait, then remove it", async () => {
    const seen: Array<{ socketDir: string | null; baseDir: string | null }> =
      [];

    await RunTempDBCLI({
      logger,
      argv: [...startArgs(), "--db", "app"],
      waitForShutdown: async (db: TempDBInstance) => {
        expect(db.isReady()).toBe(true);
        seen.push({ socketDir: db.socketDir, baseDir: db.baseDir });
      },
    });

    expect(seen).toHaveLength(1);
    const socketDir = seen[0].socketDir ?? "";
    const baseDir = seen[0].baseDir ?? "";

    expect(cliMessages()).toEqual([
      ["info", `Socket directory: ${socketDir}`],
      ["info", `Connect with: psql -h ${socketDir} -d app`],
      ["info", "Press Ctrl+C to stop the server"],
      ["info", "Stopping temp database..."],
    ]);
    expect(existsSync(baseDir)).toBe(false);
    expect(
      fake
        .invocations()
        .filter((line) => line.endsWith("-c create database app;")),
    ).toEqual([`psql -d postgres -h ${socketDir} -c create database app;`]);
  });

  it("should report a failed start and rethrow", async () => {
    fake.remove();
    fake = createFakeTools({ initdbExit: 1 });
    const waitForShutdown = vi.fn(async () => {});

    await expect(
      RunTempDBCLI({ logger, argv: startArgs(), waitForShutdown }),
    ).rejects.toThrow("Couldn't initialize temp PG data dir");

    expect(waitForShutdown).not.toHaveBeenCalled();
    expect(cliMessages()).toEqual([
      ["error", "Error: Couldn't initialize temp PG data dir"],
    ]);
  });

  it("should report bad arguments without starting anything", async () => {
    await expect(
      RunTempDBCLI({ logger, argv: ["node", "temp-db", "start", "--retry", "x"] }),
    ).rejects.toThrow('--retry expects a number, got "x"');

    expect(fake.invocations()).toEqual([]);
    expect(cliMessages()).toEqual([
      ["error", 'Error: --retry expects a number, got "x"'],
    ]);
  });
});
