// src/session.ts - Update, check and restore conversations
// The update runs as an explicit state machine; every step is reported to the user.

import { existsSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { createBackup, listBackups, restoreBackup, restoreLatest } from "./backup.js";
import { loadChecksums, saveChecksums, sha256 } from "./checksums.js";
import { buildNumberedDiff, diffStats } from "./diff.js";
import { askChoice, confirm } from "./interaction.js";
import type { ChoiceOption, Interaction } from "./interaction.js";
import type { UpdateSource } from "./source.js";
import { planUpdate, stageRelease, summarizePlan } from "./update-plan.js";
import type {
  AppliedFile,
  PlannedFile,
  ReleaseManifest,
  RestoreResult,
  UpdateMode,
  UpdatePlan,
  VersionChange,
  Warning,
} from "./types.js";
import { InvalidTransitionError, NothingToRestoreError, SourceError } from "./types.js";
import { errorMessage, writeFileSafe } from "./utils.js";
import { compareVersions, formatVersion, isUpgrade, parseVersion, readLocalVersion, writeLocalVersion } from "./version.js";

// ─── State machine ───────────────────────────────────────────────────────────

export type SessionPhase =
  | "idle"
  | "checking-version"
  | "awaiting-mode-choice"
  | "backing-up"
  | "copying"
  | "verifying"
  | "done"
  | "failed";

const TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  idle: ["checking-version"],
  "checking-version": ["awaiting-mode-choice", "done", "failed"],
  "awaiting-mode-choice": ["backing-up", "done", "failed"],
  "backing-up": ["copying", "failed"],
  copying: ["verifying", "failed"],
  verifying: ["done", "failed"],
  done: [],
  failed: [],
};

export class UpdateSession {
  private current: SessionPhase = "idle";
  private readonly visited: SessionPhase[] = ["idle"];

  get phase(): SessionPhase {
    return this.current;
  }

  get history(): readonly SessionPhase[] {
    return this.visited;
  }

  get finished(): boolean {
    return this.current === "done" || this.current === "failed";
  }

  canTransition(to: SessionPhase): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: SessionPhase): void {
    if (!this.canTransition(to)) throw new InvalidTransitionError(this.current, to);
    this.current = to;
    this.visited.push(to);
  }
}

// ─── Context ─────────────────────────────────────────────────────────────────

export interface SessionContext {
  targetDir: string;
  source: UpdateSource;
  io: Interaction;
  /** Preset update mode; when absent the user is asked. */
  mode?: UpdateMode;
  /** Answer confirmations with yes; an unset mode then defaults to quick. */
  assumeYes?: boolean;
  retention?: number;
  warnings?: Warning[];
  now?: () => Date;
}

export interface CheckResult {
  current: string;
  remote: string;
  change: VersionChange;
  available: boolean;
  manifest: ReleaseManifest;
}

export type UpdateStatus = "updated" | "up-to-date" | "cancelled" | "failed";

export interface UpdateOutcome {
  status: UpdateStatus;
  history: readonly SessionPhase[];
  check?: CheckResult;
  plan?: UpdatePlan;
  mode?: UpdateMode;
  backupLabel?: string;
  applied: AppliedFile[];
  error?: Error;
}

// ─── Check ───────────────────────────────────────────────────────────────────

/**
 * Compare the installed version against the source's manifest. Never writes.
 * Source problems surface as SourceError "Unable to determine remote version".
 */
export async function checkForUpdate(
  ctx: Pick<SessionContext, "targetDir" | "source" | "warnings">,
): Promise<CheckResult> {
  const current = readLocalVersion(ctx.targetDir, ctx.warnings);

  let manifest: ReleaseManifest;
  try {
    manifest = await ctx.source.fetchManifest();
  } catch (err: unknown) {
    throw new SourceError(`Unable to determine remote version from ${ctx.source.describe()}: ${errorMessage(err)}`);
  }

  const remote = parseVersion(manifest.version);
  const change = compareVersions(current, remote);
  return {
    current: formatVersion(current),
    remote: formatVersion(remote),
    change,
    available: isUpgrade(change),
    manifest,
  };
}

export function describeCheck(check: CheckResult): string[] {
  if (check.change === "same") return [`You're on the latest version (${check.current}).`];
  if (check.change === "older") {
    return [
      `Installed version ${check.current} is newer than the published ${check.remote}.`,
      "Downgrades are not supported; nothing to do.",
    ];
  }

  const lines = [`A ${check.change} update is available: ${check.current} -> ${check.remote}`];
  if (check.manifest.changelog.length > 0) {
    lines.push("What's new:");
    for (const entry of check.manifest.changelog) lines.push(`  - ${entry}`);
  }
  return lines;
}

// ─── Update ──────────────────────────────────────────────────────────────────

const MODE_OPTIONS: readonly ChoiceOption<"A" | "B">[] = [
  { key: "A", label: "Quick update", description: "apply everything; files you edited keep your version and get a .new copy" },
  { key: "B", label: "Careful update", description: "review a diff for every file you edited before it changes" },
];

const CONFLICT_OPTIONS: readonly ChoiceOption<"o" | "k" | "n">[] = [
  { key: "o", label: "Overwrite with the upstream version" },
  { key: "k", label: "Keep my version" },
  { key: "n", label: "Keep mine and save upstream as .new" },
];

export async function runUpdate(ctx: SessionContext): Promise<UpdateOutcome> {
  const session = new UpdateSession();
  const { io, targetDir } = ctx;
  const warnings = ctx.warnings ?? [];
  const outcome = (status: UpdateStatus, extra: Partial<UpdateOutcome> = {}): UpdateOutcome => ({
    status,
    history: session.history,
    applied: [],
    ...extra,
  });

  // 1. Version check and staging
  session.transition("checking-version");
  let check: CheckResult;
  let plan: UpdatePlan;
  try {
    check = await checkForUpdate({ targetDir, source: ctx.source, warnings });
    for (const line of describeCheck(check)) io.say(line);
    if (!check.available) {
      session.transition("done");
      return outcome("up-to-date", { check });
    }

    io.say(`Downloading ${check.manifest.files.length} file(s) from ${ctx.source.describe()}...`);
    const staged = await stageRelease(ctx.source, check.manifest);
    plan = planUpdate({
      targetDir,
      from: check.current,
      to: check.remote,
      change: check.change,
      staged,
      checksums: loadChecksums(targetDir, warnings),
    });
  } catch (err: unknown) {
    return fail(session, io, err, outcome);
  }

  // 2. Mode choice
  session.transition("awaiting-mode-choice");
  for (const line of summarizePlan(plan)) io.say(line);
  const mode = ctx.mode ?? (ctx.assumeYes ? "quick" : await chooseMode(io));
  if (!mode) {
    io.say("Update cancelled. Nothing was changed.");
    session.transition("done");
    return outcome("cancelled", { check, plan });
  }

  // 3. Backup
  session.transition("backing-up");
  let backupLabel: string;
  try {
    const { backup, pruned } = createBackup(
      targetDir,
      check.current,
      { retention: ctx.retention, now: ctx.now?.() },
      warnings,
    );
    backupLabel = backup.label;
    io.say(`Backup created: ${backup.label} (${backup.manifest.files.length} file(s))`);
    if (pruned.length > 0) io.say(`Removed old backup(s): ${pruned.join(", ")}`);
  } catch (err: unknown) {
    return fail(session, io, err, outcome, { check, plan, mode });
  }

  // 4. Copy
  session.transition("copying");
  const created: string[] = [];
  const applied: AppliedFile[] = [];
  try {
    for (const file of plan.files) {
      applied.push(await applyFile(file, mode, ctx, created));
    }
  } catch (err: unknown) {
    rollback(ctx, backupLabel, created, warnings);
    return fail(session, io, err, outcome, { check, plan, mode, backupLabel, applied });
  }

  // 5. Verify and record
  session.transition("verifying");
  try {
    verifyApplied(targetDir, plan, applied);
    saveChecksums(targetDir, nextChecksums(targetDir, plan, applied, warnings));
    writeLocalVersion(targetDir, parseVersion(plan.to));
  } catch (err: unknown) {
    rollback(ctx, backupLabel, created, warnings);
    return fail(session, io, err, outcome, { check, plan, mode, backupLabel, applied });
  }

  session.transition("done");
  for (const line of describeApplied(applied, plan.to)) io.say(line);
  return outcome("updated", { check, plan, mode, backupLabel, applied });
}

async function chooseMode(io: Interaction): Promise<UpdateMode | null> {
  const choice = await askChoice(io, "How would you like to update?", MODE_OPTIONS);
  if (choice === null) return null;
  return choice === "A" ? "quick" : "careful";
}

async function applyFile(
  file: PlannedFile,
  mode: UpdateMode,
  ctx: SessionContext,
  created: string[],
): Promise<AppliedFile> {
  const write = (relPath: string): void => {
    const absPath = join(ctx.targetDir, relPath);
    const existed = existsSync(absPath);
    writeFileSafe(absPath, file.content);
    if (!existed) created.push(relPath);
  };

  switch (file.status) {
    case "unchanged":
      return { path: file.path, action: "unchanged" };
    case "keep":
      return { path: file.path, action: "kept" };
    case "new":
      write(file.path);
      return { path: file.path, action: "created" };
    case "update":
      write(file.path);
      return { path: file.path, action: "written" };
    case "modified":
      break;
  }

  const decision = mode === "quick" ? "n" : await resolveConflict(file, ctx);
  if (decision === "o") {
    write(file.path);
    return { path: file.path, action: "written" };
  }
  if (decision === "n") {
    write(`${file.path}.new`);
    return { path: file.path, action: "saved-as-new" };
  }
  return { path: file.path, action: "kept" };
}

async function resolveConflict(file: PlannedFile, ctx: SessionContext): Promise<"o" | "k" | "n"> {
  ctx.io.say("");
  ctx.io.say(`You changed ${file.path} since the last update. Upstream changes:`);
  const diff = buildNumberedDiff(file.localContent ?? "", file.content, file.path);
  const stats = diffStats(diff);
  ctx.io.say(diff);
  ctx.io.say(`(${stats.removed} line(s) of yours replaced by ${stats.added} upstream)`);
  const choice = await askChoice(ctx.io, `What should happen to ${file.path}?`, CONFLICT_OPTIONS);
  return choice ?? "k";
}

function verifyApplied(targetDir: string, plan: UpdatePlan, applied: AppliedFile[]): void {
  const byPath = new Map(plan.files.map((f) => [f.path, f]));
  for (const entry of applied) {
    const file = byPath.get(entry.path);
    if (!file) continue;
    const written =
      entry.action === "written" || entry.action === "created"
        ? entry.path
        : entry.action === "saved-as-new"
          ? `${entry.path}.new`
          : undefined;
    if (written === undefined) continue;

    const actual = sha256(readFileSync(join(targetDir, written), "utf-8"));
    if (actual !== file.sha256) {
      throw new Error(`Verification failed: ${written} does not match the downloaded content`);
    }
  }
}

/** Smart files now holding upstream content get its checksum; others keep their record. */
function nextChecksums(
  targetDir: string,
  plan: UpdatePlan,
  applied: AppliedFile[],
  warnings: Warning[],
): Record<string, string> {
  const store = loadChecksums(targetDir, warnings);
  const actions = new Map(applied.map((a) => [a.path, a.action]));
  for (const file of plan.files) {
    if (file.category !== "smart-update") continue;
    const action = actions.get(file.path);
    if (action === "written" || action === "created" || action === "unchanged") {
      store[file.path] = file.sha256;
    }
  }
  return store;
}

/**
 * Undo a partially applied update: replay the session's backup and remove
 * files the session created.
 */
function rollback(ctx: SessionContext, backupLabel: string, created: string[], warnings: Warning[]): void {
  try {
    restoreBackup(ctx.targetDir, backupLabel, warnings);
    for (const relPath of created) {
      rmSync(join(ctx.targetDir, relPath), { force: true });
    }
    ctx.io.say(`Rolled back to backup ${backupLabel}.`);
  } catch (err: unknown) {
    warnings.push({
      level: "error",
      module: "session",
      message: `Rollback from ${backupLabel} failed: ${errorMessage(err)}. Run "memkit restore" to retry.`,
    });
  }
}

function describeApplied(applied: AppliedFile[], version: string): string[] {
  const count = (action: AppliedFile["action"]): number => applied.filter((a) => a.action === action).length;
  const lines = [`Updated to ${version}.`];
  const changed = count("written") + count("created");
  lines.push(`  ${changed} file(s) written, ${count("unchanged")} already current`);
  const savedAsNew = applied.filter((a) => a.action === "saved-as-new");
  if (savedAsNew.length > 0) {
    lines.push("  Your edits were kept; upstream versions saved next to them:");
    for (const entry of savedAsNew) lines.push(`    - ${entry.path}.new`);
  }
  return lines;
}

function fail(
  session: UpdateSession,
  io: Interaction,
  err: unknown,
  outcome: (status: UpdateStatus, extra?: Partial<UpdateOutcome>) => UpdateOutcome,
  extra: Partial<UpdateOutcome> = {},
): UpdateOutcome {
  const error = err instanceof Error ? err : new Error(String(err));
  session.transition("failed");
  io.say(`Update failed: ${error.message}`);
  return outcome("failed", { ...extra, error });
}

// ─── Restore ─────────────────────────────────────────────────────────────────

export type RestoreStatus = "restored" | "nothing-to-restore" | "cancelled" | "failed";

export interface RestoreOutcome {
  status: RestoreStatus;
  result?: RestoreResult;
  error?: Error;
}

export async function runRestore(
  ctx: Pick<SessionContext, "targetDir" | "io" | "assumeYes" | "warnings">,
): Promise<RestoreOutcome> {
  const { io, targetDir } = ctx;
  const [latest] = listBackups(targetDir, ctx.warnings);
  if (!latest) {
    io.say("Nothing to restore: no backups found.");
    return { status: "nothing-to-restore", error: new NothingToRestoreError(targetDir) };
  }

  io.say(`Latest backup: ${latest.label} (version ${latest.manifest.version}, ${latest.manifest.createdAt})`);
  io.say("System files will be replaced with the backup; your project files are not touched.");
  const proceed = await confirm(io, "Restore this backup?", { assumeYes: ctx.assumeYes });
  if (!proceed) {
    io.say("Restore cancelled.");
    return { status: "cancelled" };
  }

  try {
    const result = restoreLatest(targetDir, ctx.warnings);
    if (result.removed.length > 0) {
      io.say(`Removed ${result.removed.length} file(s) added after the backup: ${result.removed.join(", ")}`);
    }
    io.say(`Restored ${result.restored.length} file(s) from ${result.label}; now on version ${result.version}.`);
    return { status: "restored", result };
  } catch (err: unknown) {
    const error = err instanceof Error ? err : new Error(String(err));
    io.say(`Restore failed: ${error.message}`);
    return { status: error instanceof NothingToRestoreError ? "nothing-to-restore" : "failed", error };
  }
}
