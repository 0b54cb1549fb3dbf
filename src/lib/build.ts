import fs from "node:fs/promises";
import path from "node:path";
import { archiveFileName, writeArchive, type ArchiveEntry } from "./archive.js";
import { PathNotFoundError } from "./errors.js";
import { compileProfile, loadRedactionProfile, redactText, type CompiledProfile } from "./redact.js";
import { selectFiles } from "./select.js";
import { NodeTreeSource, type TreeSource } from "./source.js";
import type { BuildInfo, BuildOptions, BuildOutcome, RedactedFile } from "../types.js";

export const BUILD_INFO_FILE = "build_info.json";

export interface BuildHooks {
  onProgress?: (done: number, total: number) => void;
  // swap the filesystem view, e.g. for tests
  source?: TreeSource;
}

export function buildInfoFor(opts: BuildOptions, now: Date): BuildInfo {
  const info: BuildInfo = {
    name: opts.name,
    version: opts.version,
    created: now.toISOString(),
    description: opts.description,
  };
  if (opts.creator) info.creator = opts.creator;
  return info;
}

/**
 * Run one build: validate the Kodi folder, select files, then either return
 * the selection (preview) or write the zip. Nothing is created on disk before
 * the source folder has been validated, and nothing at all in preview.
 */
export async function createBuild(opts: BuildOptions, hooks: BuildHooks = {}): Promise<BuildOutcome> {
  const source = hooks.source ?? new NodeTreeSource(opts.kodiDir);
  if (!(await source.isRootDirectory())) throw new PathNotFoundError(source.root);

  const profile: CompiledProfile | undefined =
    opts.mode === "public" ? compileProfile(await loadRedactionProfile(opts.redactionProfile)) : undefined;

  const selection = await selectFiles(source, {
    allow: opts.allow,
    exclude: profile ? [...opts.exclude, ...profile.profile.exclude] : opts.exclude,
    maxBytes: opts.maxBytes,
    nocase: opts.nocase,
  });

  if (opts.preview) {
    const redacted: RedactedFile[] = [];
    if (profile) {
      for (const f of selection.included) {
        const target = profile.targetFor(f.relPath);
        if (target) redacted.push({ relPath: f.relPath, target: target.name, replacements: 0 });
      }
    }
    return { kind: "preview", selection, redacted };
  }

  const now = opts.now ?? new Date();
  await fs.mkdir(opts.outDir, { recursive: true });
  const zipPath = path.join(opts.outDir, archiveFileName(opts.name, opts.mode, opts.version, now));

  const entries: ArchiveEntry[] = [];
  const redacted: RedactedFile[] = [];
  const dropped: string[] = [];
  for (const f of selection.included) {
    const target = profile?.targetFor(f.relPath);
    if (!target) {
      entries.push({ name: f.relPath, absPath: f.absPath });
      continue;
    }
    let raw: Buffer;
    try {
      raw = await fs.readFile(f.absPath);
    } catch {
      // never ship a file that should have been scrubbed but could not be
      dropped.push(f.relPath);
      continue;
    }
    // latin1 maps every byte to one char, so bytes outside the rules come back unchanged
    const result = redactText(raw.toString("latin1"), target.rules);
    entries.push({ name: f.relPath, data: Buffer.from(result.text, "latin1") });
    redacted.push({ relPath: f.relPath, target: target.name, replacements: result.replacements });
  }

  if (opts.buildInfo) {
    entries.push({ name: BUILD_INFO_FILE, data: JSON.stringify(buildInfoFor(opts, now), null, 2) + "\n" });
  }

  const { bytes } = await writeArchive(zipPath, entries, { onProgress: hooks.onProgress });
  return { kind: "archive", zipPath, archiveBytes: bytes, selection, redacted, dropped };
}
