import { userInfo } from "os";
import { runCommand } from "./commands";
import { DBSetupError } from "./errors";
import { SERVICE_ACCOUNT } from "./options";
import type { Logger } from "../logger";

/**
 * OS account the server and initdb run as
 */
export interface Account {
  name: string;
  uid: number;
  gid: number;
}

/**
 * The parts of the process identity the resolver reads and changes.
 * Tests pass their own; the default talks to the real process.
 */
export interface ProcessIdentity {
  geteuid(): number;
  getegid(): number;
  seteuid(id: number): void;
  setegid(id: number): void;
  lookupAccount(name: string): Promise<Account | null>;
}

/**
 * Parse one `getent passwd` line (name:password:uid:gid:gecos:home:shell)
 */
export function parsePasswdEntry(line: string): Account | null {
  const fields = line.trim().split(":");

  if (fields.length < 4) {
    return null;
  }

  const uid = Number.parseInt(fields[2], 10);
  const gid = Number.parseInt(fields[3], 10);

  if (!fields[0] || Number.isNaN(uid) || Number.isNaN(gid)) {
    return null;
  }

  return { name: fields[0], uid, gid };
}

/**
 * Identity backed by the current process and the system account database
 */
export function createSystemIdentity(logger: Logger): ProcessIdentity {
  return {
    geteuid: () => process.geteuid?.() ?? -1,
    getegid: () => process.getegid?.() ?? -1,
    seteuid: (id) => {
      if (!process.seteuid) {
        throw new DBSetupError("Switching user is not supported here");
      }
      process.seteuid(id);
    },
    setegid: (id) => {
      if (!process.setegid) {
        throw new DBSetupError("Switching group is not supported here");
      }
      process.setegid(id);
    },
    lookupAccount: async (name) => {
      const result = await runCommand(["getent", "passwd", name], logger);

      if (result.code !== 0) {
        return null;
      }

      return parsePasswdEntry(result.stdout.split("\n")[0]);
    },
  };
}

/**
 * Work out which account the server must run as.
 *
 * @param runAs Explicit account name, looked up as is
 * @returns The account, or null when the caller can run the server itself
 */
export async function resolveAccount(
  runAs: string | null,
  identity: ProcessIdentity,
): Promise<Account | null> {
  if (runAs) {
    const account = await identity.lookupAccount(runAs);

    if (!account) {
      throw new DBSetupError(`Can't create DB server as unknown user ${runAs}`);
    }

    return account;
  }

  // postgres refuses to run as root, so hand the server to the service account
  if (identity.geteuid() === 0) {
    const account = await identity.lookupAccount(SERVICE_ACCOUNT);

    if (!account) {
      throw new DBSetupError(
        `Can't create DB server as root, and there's no ${SERVICE_ACCOUNT} user!`,
      );
    }

    return account;
  }

  return null;
}

/**
 * Run `fn` with the effective group and user switched to `account`.
 *
 * The original ids are restored however `fn` exits. Only the effective ids
 * change, so `fn` must be synchronous: nothing else may run in between.
 */
export function withAccount<T>(
  account: Account | null,
  fn: () => T,
  identity: ProcessIdentity,
): T {
  if (!account) {
    return fn();
  }

  const originalUid = identity.geteuid();
  const originalGid = identity.getegid();

  // Group first: once the uid is dropped we may no longer change the gid
  identity.setegid(account.gid);

  try {
    identity.seteuid(account.uid);

    try {
      return fn();
    } finally {
      identity.seteuid(originalUid);
    }
  } finally {
    identity.setegid(originalGid);
  }
}

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/;

/**
 * Quote one word for a POSIX shell
 */
export function quoteShellArg(arg: string): string {
  if (arg === "") {
    return "''";
  }

  if (SAFE_SHELL_WORD.test(arg)) {
    return arg;
  }

  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Rewrite a command to run as `account` through `su`.
 *
 * postgres checks that its real and effective uid match, and setting both
 * would be irreversible for us, so the command has to start as the account.
 */
export function wrapCommand(account: Account | null, argv: string[]): string[] {
  if (!account) {
    return argv;
  }

  return ["su", "-", account.name, "-c", argv.map(quoteShellArg).join(" ")];
}

/**
 * Name of the invoking account, used for the superuser role
 */
export function currentUserName(): string {
  let name: string | undefined;

  try {
    name = userInfo().username;
  } catch {
    // no passwd entry for this uid (common in containers)
    name = undefined;
  }

  const candidates = [name, process.env.USER, process.env.USERNAME];

  for (const candidate of candidates) {
    if (candidate) {
      return candidate;
    }
  }

  return SERVICE_ACCOUNT;
}
