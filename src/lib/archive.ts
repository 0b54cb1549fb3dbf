import fs from "node:fs";
import { promises as fsp } from "node:fs";
import archiver from "archiver";
import { ArchiveWriteError } from "./errors.js";
import { timestamp } from "./utils.js";
import type { BuildMode } from "../types.js";

export type ArchiveEntry =
  | { name: string; absPath: string }
  | { name: string; data: Buffer | string };

export interface ArchiveOptions {
  /** zlib level, 0-9. */
  level?: number;
  onProgress?: (done: number, total: number) => void;
}

const MODE_LABEL: Record<BuildMode, string> = { personal: "Personal", public: "Public" };

/** `<name>_<Personal|Public>_v<version>_<YYYYMMDD_HHMMSS>.zip` */
export function archiveFileName(name: string, mode: BuildMode, version: string, date: Date): string {
  return `${name}_${MODE_LABEL[mode]}_v${version}_${timestamp(date)}.zip`;
}

/**
 * Stream entries into a zip at `zipPath`. Any error or warning aborts the
 * write; the partial file is removed before the returned promise rejects with
 * an ArchiveWriteError.
 */
export async function writeArchive(
  zipPath: string,
  entries: readonly ArchiveEntry[],
  opts: ArchiveOptions = {}
): Promise<{ bytes: number }> {
  const output = fs.createWriteStream(zipPath);
  const archive = archiver("zip", { zlib: { level: opts.level ?? 9 } });

  try {
    await new Promise<void>((resolve, reject) => {
      output.on("close", () => resolve());
      output.on("error", reject);
      // archiver reports unreadable entries (e.g. a file removed mid-run) as warnings
      archive.on("warning", reject);
      archive.on("error", reject);
      if (opts.onProgress) {
        const onProgress = opts.onProgress;
        archive.on("progress", (p) => onProgress(p.entries.processed, p.entries.total));
      }

      archive.pipe(output);
      for (const entry of entries) {
        if ("absPath" in entry) archive.file(entry.absPath, { name: entry.name });
        else archive.append(entry.data, { name: entry.name });
      }
      archive.finalize().catch(reject);
    });
  } catch (e) {
    archive.abort();
    await closeStream(output);
    await fsp.rm(zipPath, { force: true });
    throw new ArchiveWriteError(zipPath, e);
  }

  return { bytes: archive.pointer() };
}

function closeStream(stream: fs.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.closed) return resolve();
    stream.once("close", () => resolve());
    stream.destroy();
  });
}
