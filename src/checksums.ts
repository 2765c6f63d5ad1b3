// src/checksums.ts - Content hashes of installed smart-update files

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Warning } from "./types.js";
import { CHECKSUMS_FILE } from "./types.js";
import { ChecksumStoreSchema, formatIssues } from "./schemas.js";
import { comparePaths, writeFileSafe } from "./utils.js";

export type ChecksumStore = Record<string, string>;

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Load the checksum store. A missing store is empty; an unreadable one is
 * reported and treated as empty, so every smart file counts as modified.
 */
export function loadChecksums(targetDir: string, warnings: Warning[] = []): ChecksumStore {
  const storePath = join(targetDir, CHECKSUMS_FILE);
  if (!existsSync(storePath)) return {};

  try {
    const parsed: unknown = JSON.parse(readFileSync(storePath, "utf-8"));
    return toChecksumStore(parsed);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "checksums",
      message: `Ignoring unreadable checksum store: ${msg}`,
      file: storePath,
    });
    return {};
  }
}

export function saveChecksums(targetDir: string, store: ChecksumStore): void {
  const sorted = Object.fromEntries(Object.entries(store).sort(([a], [b]) => comparePaths(a, b)));
  writeFileSafe(join(targetDir, CHECKSUMS_FILE), JSON.stringify(sorted, null, 2) + "\n");
}

/** True when the local content is exactly what the last update installed. */
export function isUnmodified(store: ChecksumStore, path: string, localContent: string): boolean {
  const recorded = store[path];
  return recorded !== undefined && recorded === sha256(localContent);
}

export function toChecksumStore(value: unknown): ChecksumStore {
  const parsed = ChecksumStoreSchema.safeParse(value);
  if (!parsed.success) throw new Error(`invalid checksum store: ${formatIssues(parsed.error)}`);
  return parsed.data;
}
