#!/usr/bin/env node
// CLI entry point for memkit

import { listBackups } from "../backup.js";
import { parseCliArgs, resolveConfig } from "../config.js";
import { scanTarget } from "../file-classifier.js";
import { describeRecommendations, loadGuide, runGuide } from "../guide.js";
import { createTerminalInteraction } from "../interaction.js";
import type { Interaction } from "../interaction.js";
import { checkForUpdate, describeCheck, runRestore, runUpdate } from "../session.js";
import { createSource } from "../source.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { MEMKIT_VERSION } from "../types.js";
import { errorMessage } from "../utils.js";
import { formatVersion, readLocalVersion } from "../version.js";

const HELP_TEXT = `
memkit v${MEMKIT_VERSION}

Usage:
  memkit update                Update the memory bank to the latest release
  memkit update check          Report whether an update is available (exit 2 if so)
  memkit restore               Roll system files back to the most recent backup
  memkit backups               List backups, newest first
  memkit status                Show installed version and how each file is updated
  memkit guide                 Answer a few questions and get a recommended stack
                               (also: "memkit help me choose")

Options:
  --source, -s <url|dir>       Release location (or MEMKIT_SOURCE)
  --dir, -d <path>             Memory bank directory (default: current directory)
  --mode, -m quick|careful     Skip the update mode question
  --retention <n>              Backups to keep (default: 3)
  --timeout <ms>               Network timeout (default: 15000)
  --config, -c <path>          Path to config file (default: memkit.config.json)
  --guide <path>               Alternative questionnaire file
  --yes, -y                    Answer yes to confirmations
  --quiet, -q                  Suppress warnings
  --verbose, -v                Print timing details
  --help, -h                   Show this help text
`.trim();

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    stderr(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}`);
  }
  warnings.length = 0;
}

function requireSource(config: ResolvedConfig): string {
  if (!config.source) {
    throw new Error("No release source configured. Pass --source, set MEMKIT_SOURCE or add \"source\" to memkit.config.json.");
  }
  return config.source;
}

async function main(): Promise<number> {
  const args = await parseCliArgs(process.argv.slice(2));
  const [command = "", sub = "", third = ""] = args.command;

  if (args.help || command === "" || (command === "help" && sub !== "me")) {
    process.stdout.write(HELP_TEXT + "\n");
    return 0;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  printWarnings(warnings, args.quiet);

  const started = performance.now();
  const io: Interaction = createTerminalInteraction();
  try {
    const isGuide = command === "guide" || command === "help-me-choose" || (command === "help" && sub === "me" && third === "choose");
    if (isGuide) return await guideCommand(io, config, args.guide);

    switch (command) {
      case "update":
        return sub === "check" ? await checkCommand(io, config, warnings) : await updateCommand(io, config, args.yes, warnings);
      case "check":
        return await checkCommand(io, config, warnings);
      case "restore":
        return await restoreCommand(io, config, args.yes, warnings);
      case "backups":
        return backupsCommand(io, config, warnings);
      case "status":
        return statusCommand(io, config, warnings);
      default:
        stderr(`Unknown command "${args.command.join(" ")}". Run memkit --help.`);
        return 1;
    }
  } finally {
    io.close?.();
    printWarnings(warnings, args.quiet);
    if (args.verbose) stderr(`[info] cli: finished in ${((performance.now() - started) / 1000).toFixed(1)}s`);
  }
}

// ─── Commands ────────────────────────────────────────────────────────────────

async function checkCommand(io: Interaction, config: ResolvedConfig, warnings: Warning[]): Promise<number> {
  const source = createSource(requireSource(config), config.timeoutMs);
  try {
    const check = await checkForUpdate({ targetDir: config.targetDir, source, warnings });
    for (const line of describeCheck(check)) io.say(line);
    return check.available ? 2 : 0;
  } catch (err: unknown) {
    io.say(errorMessage(err));
    return 1;
  }
}

async function updateCommand(
  io: Interaction,
  config: ResolvedConfig,
  assumeYes: boolean,
  warnings: Warning[],
): Promise<number> {
  const outcome = await runUpdate({
    targetDir: config.targetDir,
    source: createSource(requireSource(config), config.timeoutMs),
    io,
    mode: config.mode,
    assumeYes,
    retention: config.backupRetention,
    warnings,
  });
  return outcome.status === "failed" ? 1 : 0;
}

async function restoreCommand(
  io: Interaction,
  config: ResolvedConfig,
  assumeYes: boolean,
  warnings: Warning[],
): Promise<number> {
  const outcome = await runRestore({ targetDir: config.targetDir, io, assumeYes, warnings });
  return outcome.status === "restored" || outcome.status === "cancelled" ? 0 : 1;
}

function backupsCommand(io: Interaction, config: ResolvedConfig, warnings: Warning[]): number {
  const backups = listBackups(config.targetDir, warnings);
  if (backups.length === 0) {
    io.say("No backups yet.");
    return 0;
  }
  for (const backup of backups) {
    const { version, createdAt, files } = backup.manifest;
    io.say(`${backup.label}  version ${version}  ${createdAt}  ${files.length} file(s)`);
  }
  return 0;
}

function statusCommand(io: Interaction, config: ResolvedConfig, warnings: Warning[]): number {
  io.say(`Installed version: ${formatVersion(readLocalVersion(config.targetDir, warnings))}`);
  const entries = scanTarget(config.targetDir, warnings);
  for (const category of ["always-update", "smart-update", "never-update"] as const) {
    const inCategory = entries.filter((e) => e.category === category);
    io.say(`${category} (${inCategory.length})`);
    for (const entry of inCategory) {
      io.say(`  ${entry.path}${entry.rule === "unmatched" ? "  [your file]" : ""}`);
    }
  }
  return 0;
}

async function guideCommand(io: Interaction, config: ResolvedConfig, guidePath?: string): Promise<number> {
  const guide = loadGuide(guidePath);
  io.say("Let's pick a stack. Answer with the option letter, number or name; \"cancel\" stops.");
  const result = await runGuide(io, guide);
  if (!result) {
    io.say("Guide stopped. Run memkit guide again any time.");
    return 0;
  }
  for (const line of describeRecommendations(result, config.targetDir)) io.say(line);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    stderr(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
