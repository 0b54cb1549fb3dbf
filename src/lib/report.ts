import chalk from "chalk";
import { humanBytes, padPlain } from "./utils.js";
import type { BuildOutcome, FileRecord, SelectionResult } from "../types.js";

export type Writer = (line: string) => void;

const RULE = "-".repeat(50);

export function printHeader(
  out: Writer,
  h: { source: string; destination: string; preview: boolean; maxBytes: number; mode: string }
) {
  const ceiling = h.maxBytes > 0 ? `${(h.maxBytes / (1024 * 1024)).toFixed(1)} MB` : "disabled";
  out(RULE);
  out(`Kodi Source: ${h.source}`);
  out(`Output Path: ${h.destination}${h.preview ? chalk.yellow(" (DRY-RUN)") : ""}`);
  out(`Build Mode:  ${h.mode === "public" ? chalk.cyan("public (scrubbed)") : "personal"}`);
  out(`Max File Size: ${ceiling}${h.maxBytes > 0 ? chalk.gray(" (--skip-large 0 to disable)") : ""}`);
  out(RULE);
}

export function printOversized(out: Writer, files: FileRecord[]) {
  if (files.length === 0) return;
  const colW = [56, 10];
  out(chalk.bold(`${padPlain("Skipped (too large)", colW[0])}  ${padPlain("Size", colW[1])}`));
  for (const f of files) {
    out(`${padPlain(f.relPath, colW[0])}  ${chalk.yellow(humanBytes(f.size))}`);
  }
}

export function printUnreadable(out: Writer, paths: string[]) {
  for (const p of paths) out(chalk.gray(`  [unreadable] ${p}`));
}

export function summaryLine(s: SelectionResult): string {
  return (
    `files=${s.included.length}  bytes=${humanBytes(s.totalBytes)}  oversized=${s.oversized.length}` +
    `  excluded=${s.excluded}  unreadable=${s.unreadable.length}`
  );
}

export function printOutcome(out: Writer, outcome: BuildOutcome) {
  const s = outcome.selection;
  out(RULE);
  out(`Total files to be included: ${s.included.length}`);

  if (outcome.kind === "preview") {
    const marked = new Map(outcome.redacted.map((r) => [r.relPath, r.target]));
    out("");
    out(chalk.bold("--- Files that would be included (Dry Run): ---"));
    for (const f of s.included) {
      const target = marked.get(f.relPath);
      out(`  ${f.relPath}${target ? chalk.cyan(`  [redact: ${target}]`) : ""}`);
    }
    out(chalk.gray("--- Dry Run Complete. No zip created. ---"));
  } else {
    for (const r of outcome.redacted) {
      out(chalk.cyan(`  [redacted] ${r.relPath} (${r.target}, ${r.replacements} value${r.replacements === 1 ? "" : "s"})`));
    }
    for (const p of outcome.dropped) {
      out(chalk.yellow(`  [left out] ${p} could not be read for redaction`));
    }
    out("");
    out(chalk.green(`Successfully created build: ${outcome.zipPath}`));
    out(`Size: ${humanBytes(outcome.archiveBytes)}`);
  }

  out("\n" + chalk.bold("TOTAL") + `  ${summaryLine(s)}`);
}

/** Plain-data rendering for --json. */
export function outcomeToJson(outcome: BuildOutcome) {
  const s = outcome.selection;
  return {
    kind: outcome.kind,
    zipPath: outcome.kind === "archive" ? outcome.zipPath : undefined,
    archiveBytes: outcome.kind === "archive" ? outcome.archiveBytes : undefined,
    totalBytes: s.totalBytes,
    files: s.included.map((f) => ({ path: f.relPath, bytes: f.size })),
    oversized: s.oversized.map((f) => ({ path: f.relPath, bytes: f.size })),
    excluded: s.excluded,
    unreadable: s.unreadable,
    redacted: outcome.redacted,
    dropped: outcome.kind === "archive" ? outcome.dropped : [],
  };
}
