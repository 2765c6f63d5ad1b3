// src/types.ts - Shared types, errors and constants for memkit

// ─── Versions ────────────────────────────────────────────────────────────────

export interface Version {
  major: number;
  minor: number;
  patch: number;
}

/** How a remote release relates to the installed one. */
export type VersionChange = "major" | "minor" | "patch" | "same" | "older";

// ─── Classification ──────────────────────────────────────────────────────────

export type FileCategory = "never-update" | "always-update" | "smart-update";

export type ClassificationRule =
  | "user-data"
  | "system-file"
  | "system-dir"
  | "smart-dir"
  | "unmatched"
  | "invalid-path";

export interface Classification {
  path: string;
  category: FileCategory;
  rule: ClassificationRule;
}

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Release manifest ────────────────────────────────────────────────────────

export interface ReleaseManifest {
  version: string;
  changelog: string[];
  /** Paths relative to both the source root and the target directory. */
  files: string[];
}

// ─── Backups ─────────────────────────────────────────────────────────────────

export interface BackupFileEntry {
  path: string;
  sha256: string;
  sizeBytes: number;
}

export interface BackupManifest {
  formatVersion: 1;
  label: string;
  sequence: number;
  version: string;
  createdAt: string;
  files: BackupFileEntry[];
  checksums: Record<string, string>;
}

export interface BackupInfo {
  label: string;
  dir: string;
  manifest: BackupManifest;
}

export interface RestoreResult {
  label: string;
  version: string;
  restored: string[];
  /** Managed files added after the backup was taken, now deleted. */
  removed: string[];
  skipped: string[];
}

// ─── Update plan ─────────────────────────────────────────────────────────────

export type UpdateMode = "quick" | "careful";

export type PlannedStatus = "new" | "unchanged" | "update" | "modified" | "keep";

export interface PlannedFile {
  path: string;
  category: FileCategory;
  status: PlannedStatus;
  content: string;
  sha256: string;
  /** Current local content, when the file exists. */
  localContent?: string;
}

export interface UpdatePlan {
  from: string;
  to: string;
  change: VersionChange;
  files: PlannedFile[];
}

export type FileAction = "written" | "created" | "kept" | "saved-as-new" | "unchanged";

export interface AppliedFile {
  path: string;
  action: FileAction;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  source?: string;
  targetDir: string;
  backupRetention: number;
  mode?: UpdateMode;
  timeoutMs: number;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class VersionParseError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid version "${input}": expected MAJOR.MINOR.PATCH`);
    this.name = "VersionParseError";
  }
}

export class SourceError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "SourceError";
  }
}

export class ManifestError extends Error {
  constructor(message: string) {
    super(`Invalid release manifest: ${message}`);
    this.name = "ManifestError";
  }
}

export class NothingToRestoreError extends Error {
  constructor(public readonly targetDir: string) {
    super("Nothing to restore: no backups found");
    this.name = "NothingToRestoreError";
  }
}

export class BackupCorruptError extends Error {
  constructor(
    public readonly label: string,
    detail: string,
    cause?: Error,
  ) {
    super(`Backup ${label} is unusable: ${detail}`);
    this.name = "BackupCorruptError";
    if (cause) this.cause = cause;
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid session transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const MEMKIT_VERSION = "0.1.0";

export const STATE_DIR = ".memkit";
export const BACKUPS_DIR = ".memkit/backups";
export const CHECKSUMS_FILE = ".memkit/checksums.json";
export const BACKUP_MANIFEST_FILE = "backup.json";
export const VERSION_FILE = "VERSION";
export const MANIFEST_FILE = "manifest.json";

export const DEFAULT_RETENTION = 3;
export const DEFAULT_TIMEOUT_MS = 15_000;

export const SCAN_EXCLUDE_DIRS = [STATE_DIR, ".git", "node_modules"] as const;
