#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import path from "node:path";
import {
  loadKbuildConfig,
  resolveConfig,
  writeDefaultKbuildConfig,
  writeDefaultGlobalKbuildConfig
} from "./lib/config.js";
import { addBuildOptions, cliLayer, type BuildCliOptions } from "./lib/options.js";
import { createBuild } from "./lib/build.js";
import { describeError } from "./lib/errors.js";
import { printHeader, printOutcome, printOversized, printUnreadable, outcomeToJson } from "./lib/report.js";

const program = new Command();
// Friendlier error UX
program.showHelpAfterError();
program.configureOutput({
  outputError: (str, write) => write(chalk.red(str))
});

function progressPrinter(): ((done: number, total: number) => void) | undefined {
  if (!process.stderr.isTTY) return undefined;
  return (done, total) => {
    process.stderr.write(`\r${chalk.gray(`Archiving ${done}/${total}`)}`);
    if (done === total) process.stderr.write("\n");
  };
}

program
  .name("kbuild")
  .description("Package a Kodi user folder (settings and add-ons) into a distributable build zip.")
  .version("0.1.0");

program
  .command("init")
  .description(`Create a .kbuildrc.json with the default settings`)
  .option("-C, --cwd <dir>", "working directory", ".")
  .option("--global", "write to ~/.kbuild/config.json instead of local .kbuildrc.json", false)
  .action(async (opts: { cwd: string; global: boolean }) => {
    try {
      const p = opts.global
        ? await writeDefaultGlobalKbuildConfig()
        : await writeDefaultKbuildConfig(path.resolve(process.cwd(), opts.cwd));
      console.log(chalk.green(`Created ${p}`));
    } catch (e) {
      console.error(chalk.red(describeError(e)));
      process.exitCode = 1;
    }
  });

addBuildOptions(
  program
    .command("build [kodiDir]", { isDefault: true })
    .description("Build a zip from the Kodi folder (defaults to the platform's Kodi user folder)")
)
  .action(async (dirArg: string | undefined, opts: BuildCliOptions) => {
    try {
      const cwd = process.cwd();
      const fileCfg = await loadKbuildConfig(cwd);
      const cfg = resolveConfig({ ...fileCfg, ...cliLayer(dirArg, opts) }, cwd);
      const log = (line: string) => console.log(line);

      if (!opts.json) {
        printHeader(log, {
          source: cfg.kodi,
          destination: cfg.out,
          preview: opts.dryRun,
          maxBytes: cfg.skipLarge,
          mode: cfg.mode
        });
      }

      const outcome = await createBuild(
        {
          kodiDir: cfg.kodi,
          outDir: cfg.out,
          name: cfg.name,
          allow: cfg.include,
          exclude: cfg.exclude,
          maxBytes: cfg.skipLarge,
          mode: cfg.mode,
          preview: opts.dryRun,
          buildInfo: cfg.buildInfo,
          version: cfg.version,
          description: cfg.description,
          creator: cfg.creator,
          redactionProfile: cfg.redactionProfile
        },
        { onProgress: opts.json ? undefined : progressPrinter() }
      );

      if (opts.json) {
        console.log(JSON.stringify(outcomeToJson(outcome), null, 2));
        return;
      }
      printOversized(log, outcome.selection.oversized);
      if (opts.verbose) printUnreadable(log, outcome.selection.unreadable);
      printOutcome(log, outcome);
    } catch (e) {
      console.error(chalk.red(describeError(e)));
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
