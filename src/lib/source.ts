import fs from "node:fs/promises";
import path from "node:path";
import { byName } from "./utils.js";

export interface TreeEntry {
  name: string;
  kind: "file" | "directory";
}

/**
 * Read-only view of a directory tree. Paths are POSIX-style and relative to
 * the root; `""` names the root itself.
 */
export interface TreeSource {
  readonly root: string;
  isRootDirectory(): Promise<boolean>;
  /** Rejects when the directory cannot be listed. */
  list(relDir: string): Promise<TreeEntry[]>;
  /** Rejects when the entry cannot be stat'd. */
  size(relPath: string): Promise<number>;
  resolve(relPath: string): string;
}

export class NodeTreeSource implements TreeSource {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolve(relPath: string): string {
    return relPath ? path.join(this.root, ...relPath.split("/")) : this.root;
  }

  async isRootDirectory(): Promise<boolean> {
    try {
      return (await fs.stat(this.root)).isDirectory();
    } catch {
      return false;
    }
  }

  async list(relDir: string): Promise<TreeEntry[]> {
    const dirents = await fs.readdir(this.resolve(relDir), { withFileTypes: true });
    const out: TreeEntry[] = [];
    for (const d of dirents) {
      if (d.isDirectory()) {
        out.push({ name: d.name, kind: "directory" });
      } else if (d.isSymbolicLink()) {
        // links to directories are never descended; anything else is a file candidate
        if (!(await this.pointsToDirectory(relDir ? `${relDir}/${d.name}` : d.name))) {
          out.push({ name: d.name, kind: "file" });
        }
      } else if (d.isFile()) {
        out.push({ name: d.name, kind: "file" });
      }
    }
    return out.sort(byName);
  }

  async size(relPath: string): Promise<number> {
    return (await fs.stat(this.resolve(relPath))).size;
  }

  private async pointsToDirectory(relPath: string): Promise<boolean> {
    try {
      return (await fs.stat(this.resolve(relPath))).isDirectory();
    } catch {
      return false;
    }
  }
}

/**
 * In-memory tree keyed by relative file path. A `null` size models a file
 * whose size cannot be read.
 */
export class MemoryTree implements TreeSource {
  private readonly dirs = new Map<string, Map<string, TreeEntry["kind"]>>();
  private readonly sizes = new Map<string, number | null>();
  private readonly unlistable: Set<string>;
  private readonly exists: boolean;

  constructor(
    readonly root: string,
    files: Record<string, number | null>,
    opts: { exists?: boolean; unlistable?: string[] } = {}
  ) {
    this.exists = opts.exists ?? true;
    this.unlistable = new Set(opts.unlistable);
    this.dirs.set("", new Map());
    for (const [rel, size] of Object.entries(files)) {
      const parts = rel.split("/");
      parts.forEach((name, i) => {
        const parent = parts.slice(0, i).join("/");
        const kind = i === parts.length - 1 ? "file" : "directory";
        const children = this.dirs.get(parent) ?? new Map<string, TreeEntry["kind"]>();
        children.set(name, kind);
        this.dirs.set(parent, children);
      });
      this.sizes.set(rel, size);
    }
  }

  resolve(relPath: string): string {
    return relPath ? path.posix.join(this.root, relPath) : this.root;
  }

  async isRootDirectory(): Promise<boolean> {
    return this.exists;
  }

  async list(relDir: string): Promise<TreeEntry[]> {
    const children = this.dirs.get(relDir);
    if (!children || this.unlistable.has(relDir)) {
      throw new Error(`EACCES: cannot list ${this.resolve(relDir)}`);
    }
    return [...children].map(([name, kind]) => ({ name, kind })).sort(byName);
  }

  async size(relPath: string): Promise<number> {
    const size = this.sizes.get(relPath);
    if (size === undefined || size === null) {
      throw new Error(`EACCES: cannot stat ${this.resolve(relPath)}`);
    }
    return size;
  }
}
