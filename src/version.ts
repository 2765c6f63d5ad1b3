// src/version.ts - Version parsing, comparison and the local marker file

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Version, VersionChange, Warning } from "./types.js";
import { VersionParseError, VERSION_FILE } from "./types.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(input: string): Version {
  const match = VERSION_PATTERN.exec(input.trim());
  if (!match) throw new VersionParseError(input);
  const [major, minor, patch] = [match[1], match[2], match[3]].map((part) => Number.parseInt(part, 10));
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    throw new VersionParseError(input);
  }
  return { major, minor, patch };
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Classify the remote release relative to the installed one.
 * The most significant differing component decides; a lower remote yields "older".
 */
export function compareVersions(current: Version, remote: Version): VersionChange {
  if (remote.major !== current.major) return remote.major > current.major ? "major" : "older";
  if (remote.minor !== current.minor) return remote.minor > current.minor ? "minor" : "older";
  if (remote.patch !== current.patch) return remote.patch > current.patch ? "patch" : "older";
  return "same";
}

export function isUpgrade(change: VersionChange): boolean {
  return change === "major" || change === "minor" || change === "patch";
}

/**
 * Read the VERSION marker in the target directory.
 * A missing marker means nothing has been installed yet and reads as 0.0.0.
 */
export function readLocalVersion(targetDir: string, warnings: Warning[] = []): Version {
  const markerPath = join(targetDir, VERSION_FILE);
  if (!existsSync(markerPath)) {
    warnings.push({
      level: "info",
      module: "version",
      message: `No ${VERSION_FILE} marker found, treating installed version as 0.0.0`,
      file: markerPath,
    });
    return { major: 0, minor: 0, patch: 0 };
  }
  return parseVersion(readFileSync(markerPath, "utf-8"));
}

export function writeLocalVersion(targetDir: string, version: Version): void {
  writeFileSync(join(targetDir, VERSION_FILE), formatVersion(version) + "\n");
}
