import { spawn, type ChildProcess } from "child_process";
import { access } from "fs/promises";
import { constants } from "fs";
import { delimiter, isAbsolute, join } from "path";
import type { Logger } from "../logger";

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Exit code, or null when the process could not be spawned or was killed */
  code: number | null;
}

/**
 * Runs an argument vector to completion and collects its output
 */
export type CommandRunner = (argv: string[]) => Promise<CommandResult>;

/**
 * Helper function to check if a file exists and is executable
 */
async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command name against $PATH, or check an explicit path.
 *
 * @returns The executable path, or null if nothing runnable was found
 */
export async function findExecutable(
  command: string,
  envPath: string | undefined = process.env.PATH,
): Promise<string | null> {
  if (isAbsolute(command) || command.includes("/")) {
    return (await isExecutable(command)) ? command : null;
  }

  for (const dir of (envPath ?? "").split(delimiter)) {
    if (!dir) continue;

    const candidate = join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Forward a child's output to the logger one line at a time
 */
function forwardOutput(
  child: ChildProcess,
  logger: Logger,
  onData?: (stream: "stdout" | "stderr", text: string) => void,
): void {
  const forward = (stream: "stdout" | "stderr") => (data: Buffer) => {
    const text = data.toString();
    onData?.(stream, text);

    for (const line of text.split("\n")) {
      if (line.trim()) {
        logger.info({ message: line.trimEnd(), verbosity: 2 });
      }
    }
  };

  child.stdout?.on("data", forward("stdout"));
  child.stderr?.on("data", forward("stderr"));
}

/**
 * Runs a command and returns the output.
 *
 * Never rejects: a non-zero exit is reported through `code`, and a command that
 * cannot be spawned at all resolves with `code: null`.
 */
export function runCommand(
  argv: string[],
  logger: Logger,
): Promise<CommandResult> {
  const [command, ...args] = argv;

  logger.info({ message: `Running: ${argv.join(" ")}`, verbosity: 2 });

  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (code: number | null) => {
      if (settled) return;
      settled = true;
      resolve({ stdout, stderr, code });
    };

    const childProcess = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      detached: false,
    });

    forwardOutput(childProcess, logger, (stream, text) => {
      if (stream === "stdout") {
        stdout += text;
      } else {
        stderr += text;
      }
    });

    childProcess.on("error", (error) => {
      stderr += error.message;
      finish(null);
    });

    childProcess.on("close", (code) => {
      finish(code);
    });
  });
}

/**
 * Returns a {@link CommandRunner} bound to a logger
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return (argv) => runCommand(argv, logger);
}

/**
 * Starts a long-running command without waiting for it.
 *
 * Output is only piped (and forwarded to the logger) when it would be shown.
 */
export function spawnBackground(
  argv: string[],
  logger: Logger,
  showOutput: boolean,
): ChildProcess {
  const [command, ...args] = argv;

  const child = spawn(command, args, {
    stdio: showOutput ? ["ignore", "pipe", "pipe"] : "ignore",
    detached: false,
  });

  // A missing binary is reported here; the readiness probe then times out
  child.on("error", (error) => {
    logger.error({ message: `Failed to run ${command}`, error });
  });

  if (showOutput) {
    forwardOutput(child, logger);
  }

  return child;
}

/**
 * Whether a child process has already exited
 */
export function hasExited(child: ChildProcess): boolean {
  return (
    child.pid === undefined ||
    child.exitCode !== null ||
    child.signalCode !== null
  );
}
