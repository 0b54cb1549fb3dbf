import { Option, type Command } from "commander";
import path from "node:path";
import type { KbuildConfig } from "./config.js";
import type { BuildMode } from "../types.js";

export interface BuildCliOptions {
  out?: string;
  name?: string;
  dryRun: boolean;
  skipLarge?: string;
  include?: string[];
  exclude?: string[];
  public: boolean;
  mode?: BuildMode;
  profile?: string;
  buildVersion?: string;
  description?: string;
  creator?: string;
  info: boolean;
  json: boolean;
  verbose: boolean;
}

// repeatable single-value flags; variadic ones would swallow a trailing [kodiDir]
function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// list options may be passed comma-separated or repeated
export function splitList(v: string[] | undefined): string[] | undefined {
  return v?.flatMap((x) => x.split(",").map((s) => s.trim()).filter(Boolean));
}

export function addBuildOptions(cmd: Command): Command {
  return cmd
    .option("-o, --out <dir>", "output folder for the build zip")
    .option("-n, --name <name>", "base name of the zip (mode, version and a timestamp are appended)")
    .option("--dry-run", "list the files that would be included; create nothing", false)
    .option("--skip-large <size>", "skip files larger than this (bytes or e.g. 95MB); 0 disables")
    .option("--include <dirs>", "top-level folders to package (comma separated, repeatable)", collect)
    .option("--exclude <globs>", "exclusion globs replacing the defaults (comma separated, repeatable)", collect)
    .option("--public", "scrub personal data (same as --mode public)", false)
    .addOption(new Option("--mode <mode>", "personal keeps everything; public scrubs").choices(["personal", "public"]))
    .option("--profile <file>", "redaction profile JSON for public builds")
    .option("--build-version <version>", "version recorded in build_info.json and the zip name")
    .option("--description <text>", "description recorded in build_info.json")
    .option("--creator <text>", "creator recorded in build_info.json")
    .option("--no-info", "do not add build_info.json to the archive")
    .option("--json", "print the result as JSON", false)
    .option("--verbose", "list files that could not be read", false);
}

/** CLI flags as a config layer; only flags actually given are set. */
export function cliLayer(dirArg: string | undefined, opts: BuildCliOptions, cwd = process.cwd()): KbuildConfig {
  const cfg: KbuildConfig = {};
  if (dirArg) cfg.kodi = path.resolve(cwd, dirArg);
  if (opts.out) cfg.out = path.resolve(cwd, opts.out);
  if (opts.name) cfg.name = opts.name;
  if (opts.skipLarge !== undefined) cfg.skipLarge = opts.skipLarge;
  const include = splitList(opts.include);
  if (include) cfg.include = include;
  const exclude = splitList(opts.exclude);
  if (exclude) cfg.exclude = exclude;
  if (opts.mode) cfg.mode = opts.mode;
  if (opts.public) cfg.mode = "public";
  if (opts.profile) cfg.redactionProfile = path.resolve(cwd, opts.profile);
  if (opts.buildVersion) cfg.version = opts.buildVersion;
  if (opts.description) cfg.description = opts.description;
  if (opts.creator) cfg.creator = opts.creator;
  if (!opts.info) cfg.buildInfo = false;
  return cfg;
}
