import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";

/**
 * What the walker does after visiting an entry:
 * - continue: carry on (descend, for a directory)
 * - skip-entry: the entry needs no processing; a directory is still entered
 * - skip-subtree: never enter this directory
 */
export type WalkAction = "continue" | "skip-entry" | "skip-subtree";

export interface WalkEntry {
  /** Path relative to the walk root, "/"-separated */
  path: string;
  isDirectory: boolean;
  /** Set when the directory could not be read; its subtree is skipped */
  error?: Error;
}

export type Visitor = (entry: WalkEntry) => Promise<WalkAction>;

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Depth-first walk in lexical order. The root itself is not visited.
 * Errors thrown by the visitor abort the walk.
 */
export async function walkTree(rootPath: string, visit: Visitor): Promise<void> {
  await walkDirectory(rootPath, "", visit);
}

async function walkDirectory(
  rootPath: string,
  relativePath: string,
  visit: Visitor
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(join(rootPath, relativePath), { withFileTypes: true });
  } catch (e) {
    await visit({
      path: relativePath || ".",
      isDirectory: true,
      error: e instanceof Error ? e : new Error(String(e)),
    });
    return;
  }

  for (const entry of entries.sort(byName)) {
    const entryPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;
    const isDirectory = entry.isDirectory();
    const action = await visit({ path: entryPath, isDirectory });

    if (isDirectory && action !== "skip-subtree") {
      await walkDirectory(rootPath, entryPath, visit);
    }
  }
}
