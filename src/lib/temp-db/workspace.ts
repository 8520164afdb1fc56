import { chmodSync, mkdirSync } from "fs";
import { join } from "path";
import tmp from "tmp";

/**
 * Directories a temp database runs in
 */
export interface Workspace {
  baseDir: string;
  dataDir: string;
  socketDir: string;
  /** The base directory was allocated here and is removed on cleanup */
  ownsBaseDir: boolean;
  /** The socket directory came from the caller and is left alone */
  socketDirSupplied: boolean;
}

export interface WorkspaceRequest {
  baseDir: string | null;
  socketDir: string | null;
}

/**
 * Create the data and socket directories.
 *
 * Synchronous so it can run inside {@link withAccount}. When this throws after
 * allocating a base directory, `onAllocated` has already reported it so the
 * caller can remove it.
 */
export function allocateWorkspace(
  request: WorkspaceRequest,
  onAllocated: (baseDir: string) => void = () => {},
): Workspace {
  let baseDir = request.baseDir;
  const ownsBaseDir = !baseDir;

  if (!baseDir) {
    // Removal is ours to do at cleanup, not tmp's
    baseDir = tmp.dirSync({ prefix: "pg_tmp_", keep: true }).name;
    onAllocated(baseDir);
  }

  const dataDir = join(baseDir, "data");
  mkdirSync(dataDir);

  if (request.socketDir) {
    return {
      baseDir,
      dataDir,
      socketDir: request.socketDir,
      ownsBaseDir,
      socketDirSupplied: true,
    };
  }

  const socketDir = join(baseDir, "socket");
  mkdirSync(socketDir);
  // The server may run as another account, or inside a container
  chmodSync(socketDir, 0o777);

  return { baseDir, dataDir, socketDir, ownsBaseDir, socketDirSupplied: false };
}
