// src/backup.ts - Labelled snapshots of managed files, retention and restore
// A backup is written before any update touches the tree; restore replays the newest one.

import { existsSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { loadChecksums, saveChecksums, sha256 } from "./checksums.js";
import { classify, listManagedFiles } from "./file-classifier.js";
import { BackupManifestSchema, formatIssues } from "./schemas.js";
import { errorMessage, writeFileSafe } from "./utils.js";
import type { BackupFileEntry, BackupInfo, BackupManifest, RestoreResult, Warning } from "./types.js";
import {
  BACKUP_MANIFEST_FILE,
  BACKUPS_DIR,
  BackupCorruptError,
  DEFAULT_RETENTION,
  NothingToRestoreError,
} from "./types.js";

const LABEL_PATTERN = /^backup-(\d{4,})-v(.+)$/;
const FILES_SUBDIR = "files";

export interface CreateBackupOptions {
  retention?: number;
  now?: Date;
}

export interface CreateBackupResult {
  backup: BackupInfo;
  pruned: string[];
}

// ─── Create ──────────────────────────────────────────────────────────────────

/**
 * Snapshot every always-update and smart-update file, then prune old backups.
 */
export function createBackup(
  targetDir: string,
  version: string,
  options: CreateBackupOptions = {},
  warnings: Warning[] = [],
): CreateBackupResult {
  const backupsRoot = join(targetDir, BACKUPS_DIR);
  const sequence = nextSequence(backupsRoot);
  const label = `backup-${String(sequence).padStart(4, "0")}-v${version}`;
  const dir = join(backupsRoot, label);

  let manifest: BackupManifest;
  try {
    const files: BackupFileEntry[] = [];
    for (const relPath of listManagedFiles(targetDir, warnings)) {
      const content = readFileSync(join(targetDir, relPath));
      writeFileSafe(join(dir, FILES_SUBDIR, relPath), content);
      files.push({ path: relPath, sha256: sha256(content), sizeBytes: content.length });
    }

    manifest = {
      formatVersion: 1,
      label,
      sequence,
      version,
      createdAt: (options.now ?? new Date()).toISOString(),
      files,
      checksums: loadChecksums(targetDir, warnings),
    };
    // Manifest goes last: a directory without one is an interrupted backup.
    writeFileSafe(join(dir, BACKUP_MANIFEST_FILE), JSON.stringify(manifest, null, 2) + "\n");
  } catch (err: unknown) {
    rmSync(dir, { recursive: true, force: true });
    throw err;
  }

  const pruned = pruneBackups(targetDir, options.retention ?? DEFAULT_RETENTION);
  return { backup: { label, dir, manifest }, pruned };
}

/**
 * Delete interrupted backups (no manifest) and the oldest complete backups
 * beyond the retention count. Returns the labels removed, oldest first.
 */
export function pruneBackups(targetDir: string, retention: number = DEFAULT_RETENTION): string[] {
  const keep = Math.max(1, Math.floor(retention));
  const backupsRoot = join(targetDir, BACKUPS_DIR);
  const labels = listBackupLabels(backupsRoot);
  const complete = labels.filter((label) => existsSync(join(backupsRoot, label, BACKUP_MANIFEST_FILE)));
  const excess = new Set(complete.slice(0, Math.max(0, complete.length - keep)));

  const removed = labels.filter((label) => excess.has(label) || !complete.includes(label));
  for (const label of removed) {
    rmSync(join(backupsRoot, label), { recursive: true, force: true });
  }
  return removed;
}

// ─── List ────────────────────────────────────────────────────────────────────

/** Usable backups, newest first. */
export function listBackups(targetDir: string, warnings: Warning[] = []): BackupInfo[] {
  const backupsRoot = join(targetDir, BACKUPS_DIR);
  const backups: BackupInfo[] = [];

  for (const label of listBackupLabels(backupsRoot).reverse()) {
    const dir = join(backupsRoot, label);
    try {
      backups.push({ label, dir, manifest: readBackupManifest(dir, label) });
    } catch (err: unknown) {
      warnings.push({ level: "warn", module: "backup", message: errorMessage(err), file: dir });
    }
  }

  return backups;
}

// ─── Restore ─────────────────────────────────────────────────────────────────

export function restoreLatest(targetDir: string, warnings: Warning[] = []): RestoreResult {
  const [latest] = listBackups(targetDir, warnings);
  if (!latest) throw new NothingToRestoreError(targetDir);
  return restoreFrom(targetDir, latest, warnings);
}

export function restoreBackup(targetDir: string, label: string, warnings: Warning[] = []): RestoreResult {
  const match = listBackups(targetDir, warnings).find((b) => b.label === label);
  if (!match) throw new BackupCorruptError(label, "no such backup");
  return restoreFrom(targetDir, match, warnings);
}

/**
 * Verify every file of the backup before writing any of them,
 * so a damaged backup leaves the tree as it was. Managed files the backup
 * does not hold (VERSION included) were added later and are removed.
 */
function restoreFrom(targetDir: string, backup: BackupInfo, warnings: Warning[]): RestoreResult {
  const staged: { path: string; content: Buffer }[] = [];
  const skipped: string[] = [];

  for (const entry of backup.manifest.files) {
    if (classify(entry.path) === "never-update") {
      skipped.push(entry.path);
      continue;
    }

    const source = join(backup.dir, FILES_SUBDIR, entry.path);
    let content: Buffer;
    try {
      content = readFileSync(source);
    } catch (err: unknown) {
      throw new BackupCorruptError(backup.label, `missing file ${entry.path}`, err instanceof Error ? err : undefined);
    }
    if (sha256(content) !== entry.sha256) {
      throw new BackupCorruptError(backup.label, `checksum mismatch for ${entry.path}`);
    }
    staged.push({ path: entry.path, content });
  }

  const backedUp = new Set(backup.manifest.files.map((entry) => entry.path));
  const removed = listManagedFiles(targetDir, warnings).filter((relPath) => !backedUp.has(relPath));

  for (const file of staged) {
    writeFileSafe(join(targetDir, file.path), file.content);
  }
  for (const relPath of removed) {
    rmSync(join(targetDir, relPath), { force: true });
  }
  saveChecksums(targetDir, backup.manifest.checksums);

  return {
    label: backup.label,
    version: backup.manifest.version,
    restored: staged.map((f) => f.path),
    removed,
    skipped,
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Backup directory names sorted oldest first by sequence. */
function listBackupLabels(backupsRoot: string): string[] {
  if (!existsSync(backupsRoot)) return [];
  return readdirSync(backupsRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && LABEL_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => labelSequence(a) - labelSequence(b));
}

function labelSequence(label: string): number {
  const match = LABEL_PATTERN.exec(label);
  return match ? Number.parseInt(match[1], 10) : 0;
}

function nextSequence(backupsRoot: string): number {
  const labels = listBackupLabels(backupsRoot);
  const last = labels[labels.length - 1];
  return last === undefined ? 1 : labelSequence(last) + 1;
}

function readBackupManifest(dir: string, label: string): BackupManifest {
  const manifestPath = join(dir, BACKUP_MANIFEST_FILE);
  if (!existsSync(manifestPath)) {
    throw new BackupCorruptError(label, `missing ${BACKUP_MANIFEST_FILE}`);
  }
  try {
    return parseBackupManifest(JSON.parse(readFileSync(manifestPath, "utf-8")));
  } catch (err: unknown) {
    if (err instanceof BackupCorruptError) throw err;
    throw new BackupCorruptError(label, errorMessage(err), err instanceof Error ? err : undefined);
  }
}

/** Exported for testing. */
export function parseBackupManifest(value: unknown): BackupManifest {
  const parsed = BackupManifestSchema.safeParse(value);
  if (!parsed.success) throw new Error(formatIssues(parsed.error));
  return parsed.data;
}
