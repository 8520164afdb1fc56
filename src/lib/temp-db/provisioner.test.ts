import { describe, it, expect, vi } from "vitest";
import { createDatabases, createSuperuser } from "./provisioner";
import type { CommandResult, CommandRunner } from "./commands";
import type { Logger } from "../logger";

const silent: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

const result = (code: number | null): CommandResult => ({
  stdout: "",
  stderr: "",
  code,
});

/**
 * Runner that fails any `create database` for the given names
 */
function runnerFailing(names: string[]) {
  return vi.fn<CommandRunner>(async (argv) => {
    const sql = argv[argv.length - 1];
    const failed = names.some((name) => sql === `create database ${name};`);
    return result(failed ? 1 : 0);
  });
}

describe("createSuperuser", () => {
  it("should create the role as a superuser over the socket", async () => {
    const run = vi.fn<CommandRunner>(async () => result(0));

    await expect(
      createSuperuser(run, "createuser", "/tmp/s", "alice", silent),
    ).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith(["createuser", "-h", "/tmp/s", "alice", "-s"]);
  });

  it("should ignore a failure since the role may already exist", async () => {
    const run = vi.fn<CommandRunner>(async () => result(1));

    await expect(
      createSuperuser(run, "createuser", "/tmp/s", "alice", silent),
    ).resolves.toBe(false);
  });
});

describe("createDatabases", () => {
  it("should create each database in order", async () => {
    const run = runnerFailing([]);

    await createDatabases(run, "psql", "/tmp/s", ["alpha", "beta"], silent);

    expect(run.mock.calls.map(([argv]) => argv)).toEqual([
      ["psql", "-d", "postgres", "-h", "/tmp/s", "-c", "create database alpha;"],
      ["psql", "-d", "postgres", "-h", "/tmp/s", "-c", "create database beta;"],
    ]);
  });

  it("should do nothing for an empty list", async () => {
    const run = runnerFailing([]);

    await createDatabases(run, "psql", "/tmp/s", [], silent);

    expect(run).not.toHaveBeenCalled();
  });

  it("should try every database before reporting the failures", async () => {
    const run = runnerFailing(["alpha", "gamma"]);

    await expect(
      createDatabases(run, "psql", "/tmp/s", ["alpha", "beta", "gamma"], silent),
    ).rejects.toThrow("Couldn't create databases: alpha, gamma");
    expect(run).toHaveBeenCalledTimes(3);
  });

  it("should treat a tool that could not be spawned as a failure", async () => {
    const run = vi.fn<CommandRunner>(async () => result(null));

    await expect(
      createDatabases(run, "psql", "/tmp/s", ["alpha"], silent),
    ).rejects.toThrow("Couldn't create databases: alpha");
  });

  it("should pass names into the SQL without quoting", async () => {
    const run = runnerFailing([]);

    await createDatabases(run, "psql", "/tmp/s", ['"Mixed Case"'], silent);

    expect(run.mock.calls[0][0].at(-1)).toBe('create database "Mixed Case";');
  });
});
