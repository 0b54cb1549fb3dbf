import { compileExclusions } from "./patterns.js";
import { PathNotFoundError } from "./errors.js";
import type { TreeEntry, TreeSource } from "./source.js";
import type { FileRecord, SelectionResult, SelectionRules } from "../types.js";

/**
 * Decide which files of a tree belong in a build.
 *
 * Only the root's allowlisted directories are ever entered. Below them each
 * file is dropped when an exclusion matches its relative path, when its size
 * cannot be read, or when it exceeds `maxBytes` (reported in `oversized`).
 * Files of a directory come before its subdirectories; siblings are in name
 * order.
 */
export async function selectFiles(source: TreeSource, rules: SelectionRules): Promise<SelectionResult> {
  if (!(await source.isRootDirectory())) throw new PathNotFoundError(source.root);

  const isExcluded = compileExclusions(rules.exclude, { nocase: rules.nocase });
  const allowed = new Set(rules.allow);

  const included: FileRecord[] = [];
  const oversized: FileRecord[] = [];
  const unreadable: string[] = [];
  let excluded = 0;
  let totalBytes = 0;

  async function listOrSkip(relDir: string): Promise<TreeEntry[]> {
    try {
      return await source.list(relDir);
    } catch {
      unreadable.push(relDir || ".");
      return [];
    }
  }

  async function walk(relDir: string): Promise<void> {
    const entries = await listOrSkip(relDir);

    for (const entry of entries) {
      if (entry.kind !== "file") continue;
      const relPath = `${relDir}/${entry.name}`;
      if (isExcluded(relPath)) {
        excluded++;
        continue;
      }

      let size: number;
      try {
        size = await source.size(relPath);
      } catch {
        unreadable.push(relPath);
        continue;
      }

      const record: FileRecord = { relPath, absPath: source.resolve(relPath), size };
      if (rules.maxBytes > 0 && size > rules.maxBytes) {
        oversized.push(record);
        continue;
      }
      included.push(record);
      totalBytes += size;
    }

    for (const entry of entries) {
      if (entry.kind === "directory") await walk(`${relDir}/${entry.name}`);
    }
  }

  // the root is pruned to the allowlist; its own files are never considered
  for (const entry of await listOrSkip("")) {
    if (entry.kind === "directory" && allowed.has(entry.name)) await walk(entry.name);
  }

  return { included, oversized, excluded, unreadable, totalBytes };
}
