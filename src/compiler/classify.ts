import { extname, posix } from "node:path";
import type { Config } from "../config";

export type EntryKind = "skip-subtree" | "skip" | "document" | "media";

/**
 * Decide what happens to a source entry.
 * Directories only ever yield skip-subtree (hidden) or skip (walk into it).
 */
export function classify(
  path: string,
  isDirectory: boolean,
  config: Config
): EntryKind {
  const name = posix.basename(path);

  if (isDirectory) {
    // The root (".") is never hidden
    return name.startsWith(".") && name.length > 1 ? "skip-subtree" : "skip";
  }

  // Hidden and backup files
  if (name.startsWith(".") || name.startsWith("~")) {
    return "skip";
  }

  // Publication metadata candidates at the root, loaded or not
  if (config.metadata.includes(path)) {
    return "skip";
  }

  return config.markdown.includes(extname(name).toLowerCase()) ? "document" : "media";
}
