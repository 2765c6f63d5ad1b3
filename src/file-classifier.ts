// src/file-classifier.ts - Update categories for files in a memory bank
// Rule order: user data, system files, system directories, smart directories.

import { readdirSync } from "node:fs";
import type { Dirent } from "node:fs";
import { isAbsolute, join, posix } from "node:path";
import picomatch from "picomatch";
import type { Classification, ClassificationRule, FileCategory, Warning } from "./types.js";
import { SCAN_EXCLUDE_DIRS, VERSION_FILE } from "./types.js";
import { comparePaths } from "./utils.js";

// ─── Rule table ──────────────────────────────────────────────────────────────

export const USER_DATA_FILES: readonly string[] = [
  "projectbrief.md",
  "productContext.md",
  "activeContext.md",
  "systemPatterns.md",
  "techContext.md",
  "progress.md",
];

export const SYSTEM_FILES: readonly string[] = [
  "CLAUDE.md",
  "UPDATE.md",
  "STACK_GUIDE.md",
  VERSION_FILE,
];

// Match files below each directory, never a root file of the same name.
export const SYSTEM_DIR_GLOBS: readonly string[] = ["commands/**/*", "templates/**/*"];

export const SMART_DIR_GLOBS: readonly string[] = ["stacks/**/*"];

const isInSystemDir = picomatch([...SYSTEM_DIR_GLOBS], { dot: true });
const isInSmartDir = picomatch([...SMART_DIR_GLOBS], { dot: true });

const RULE_CATEGORY: Record<ClassificationRule, FileCategory> = {
  "user-data": "never-update",
  "system-file": "always-update",
  "system-dir": "always-update",
  "smart-dir": "smart-update",
  unmatched: "never-update",
  "invalid-path": "never-update",
};

// ─── Classification ──────────────────────────────────────────────────────────

/**
 * Normalize a path relative to the memory bank root.
 * Returns null for absolute paths and paths that escape the root.
 */
export function normalizeRelativePath(filePath: string): string | null {
  const slashed = filePath.trim().replace(/\\/g, "/");
  if (!slashed || isAbsolute(slashed) || slashed.startsWith("/")) return null;
  if (slashed.split("/").includes("..")) return null;
  const normalized = posix.normalize(slashed).replace(/^(\.\/)+/, "");
  if (normalized === "." || normalized === "") return null;
  return normalized;
}

export function explainClassification(filePath: string): Classification {
  const normalized = normalizeRelativePath(filePath);
  if (normalized === null) {
    return { path: filePath, category: RULE_CATEGORY["invalid-path"], rule: "invalid-path" };
  }

  const rule = matchRule(normalized);
  return { path: normalized, category: RULE_CATEGORY[rule], rule };
}

export function classify(filePath: string): FileCategory {
  return explainClassification(filePath).category;
}

/** True for a normalized path under memkit's state directory, .git or node_modules. */
export function isReservedPath(normalized: string): boolean {
  return normalized.split("/").some((segment) => (SCAN_EXCLUDE_DIRS as readonly string[]).includes(segment));
}

/** True for files an update may overwrite and a backup must capture. */
export function isManaged(category: FileCategory): boolean {
  return category === "always-update" || category === "smart-update";
}

function matchRule(normalized: string): ClassificationRule {
  if (USER_DATA_FILES.includes(normalized)) return "user-data";
  if (SYSTEM_FILES.includes(normalized)) return "system-file";
  if (isInSystemDir(normalized)) return "system-dir";
  if (isInSmartDir(normalized)) return "smart-dir";
  return "unmatched";
}

// ─── Tree scan ───────────────────────────────────────────────────────────────

/**
 * Walk the target directory and classify every regular file, sorted by path.
 * memkit's own state directory, .git and node_modules are skipped.
 */
export function scanTarget(targetDir: string, warnings: Warning[] = []): Classification[] {
  const results: Classification[] = [];
  walk(targetDir, "", results, warnings);
  return results.sort((a, b) => comparePaths(a.path, b.path));
}

/** Relative paths of every file an update would back up. */
export function listManagedFiles(targetDir: string, warnings: Warning[] = []): string[] {
  return scanTarget(targetDir, warnings)
    .filter((entry) => isManaged(entry.category))
    .map((entry) => entry.path);
}

function walk(root: string, relDir: string, results: Classification[], warnings: Warning[]): void {
  const absDir = relDir ? join(root, relDir) : root;
  let entries: Dirent[];
  try {
    entries = readdirSync(absDir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-classifier",
      message: `Cannot read directory: ${msg}`,
      file: absDir,
    });
    return;
  }

  for (const entry of entries) {
    const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if ((SCAN_EXCLUDE_DIRS as readonly string[]).includes(entry.name)) continue;
      walk(root, relPath, results, warnings);
    } else if (entry.isFile()) {
      results.push(explainClassification(relPath));
    } else if (entry.isSymbolicLink()) {
      warnings.push({
        level: "info",
        module: "file-classifier",
        message: `Symlink ${relPath} skipped`,
        file: join(root, relPath),
      });
    }
  }
}

