import { describe, it, expect, vi, afterEach } from "vitest";
import { chmodSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import tmp from "tmp";
import {
  findExecutable,
  hasExited,
  runCommand,
  spawnBackground,
} from "./commands";
import type { Logger } from "../logger";

function recordingLogger() {
  const info = vi.fn();
  const logger: Logger = { info, warn: vi.fn(), error: vi.fn() };
  return { logger, info };
}

describe("findExecutable", () => {
  const toRemove: string[] = [];

  afterEach(() => {
    for (const dir of toRemove.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function binDir(): string {
    const dir = tmp.dirSync({ prefix: "bin-" }).name;
    toRemove.push(dir);
    return dir;
  }

  it("should search each PATH entry in order", async () => {
    const first = binDir();
    const second = binDir();
    writeFileSync(join(second, "initdb"), "#!/bin/sh\n");
    chmodSync(join(second, "initdb"), 0o755);

    await expect(findExecutable("initdb", `${first}:${second}`)).resolves.toBe(
      join(second, "initdb"),
    );
  });

  it("should skip files that are not executable", async () => {
    const dir = binDir();
    writeFileSync(join(dir, "initdb"), "#!/bin/sh\n");
    chmodSync(join(dir, "initdb"), 0o644);

    await expect(findExecutable("initdb", dir)).resolves.toBeNull();
  });

  it("should check explicit paths without searching", async () => {
    const dir = binDir();
    const tool = join(dir, "postgres");
    writeFileSync(tool, "#!/bin/sh\n");
    chmodSync(tool, 0o755);

    await expect(findExecutable(tool, "")).resolves.toBe(tool);
    await expect(findExecutable(join(dir, "missing"), dir)).resolves.toBeNull();
  });

  it("should find nothing on an empty PATH", async () => {
    await expect(findExecutable("sh", "")).resolves.toBeNull();
  });
});

describe("runCommand", () => {
  it("should collect output and the exit code", async () => {
    const { logger } = recordingLogger();

    const result = await runCommand(
      ["/bin/sh", "-c", "echo out; echo err >&2; exit 3"],
      logger,
    );

    expect(result).toEqual({ stdout: "out\n", stderr: "err\n", code: 3 });
  });

  it("should echo the command and forward output at verbosity 2", async () => {
    const { logger, info } = recordingLogger();

    await runCommand(["/bin/sh", "-c", "echo one; echo two"], logger);

    expect(info.mock.calls).toEqual([
      [{ message: "Running: /bin/sh -c echo one; echo two", verbosity: 2 }],
      [{ message: "one", verbosity: 2 }],
      [{ message: "two", verbosity: 2 }],
    ]);
  });

  it("should resolve with a null code when the command cannot be spawned", async () => {
    const { logger } = recordingLogger();

    const result = await runCommand(["/nonexistent/bin/psql", "-c", "x"], logger);

    expect(result.code).toBeNull();
    expect(result.stderr).toContain("ENOENT");
  });
});

describe("spawnBackground", () => {
  it("should report a missing binary through the logger", async () => {
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const child = spawnBackground(["/nonexistent/bin/postgres"], logger, false);

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
    expect(hasExited(child)).toBe(true);
  });

  it("should tell a running process from an exited one", async () => {
    const { logger } = recordingLogger();
    const child = spawnBackground(["/bin/sh", "-c", "sleep 5"], logger, false);

    expect(hasExited(child)).toBe(false);

    const exited = new Promise((resolve) => child.once("exit", resolve));
    child.kill("SIGKILL");
    await exited;

    expect(hasExited(child)).toBe(true);
  });
});
