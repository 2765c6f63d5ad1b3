// src/update-plan.ts - Stage a release and decide what happens to each file

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { isUnmodified, sha256 } from "./checksums.js";
import type { ChecksumStore } from "./checksums.js";
import { classify } from "./file-classifier.js";
import type { UpdateSource } from "./source.js";
import type { PlannedFile, PlannedStatus, ReleaseManifest, UpdatePlan, VersionChange } from "./types.js";

/**
 * Fetch every file the manifest lists. Nothing is written, so a failed
 * fetch leaves the target untouched.
 */
export async function stageRelease(source: UpdateSource, manifest: ReleaseManifest): Promise<Map<string, string>> {
  const staged = new Map<string, string>();
  for (const path of manifest.files) {
    staged.set(path, await source.fetchFile(path));
  }
  return staged;
}

export interface PlanInput {
  targetDir: string;
  from: string;
  to: string;
  change: VersionChange;
  staged: Map<string, string>;
  checksums: ChecksumStore;
}

export function planUpdate(input: PlanInput): UpdatePlan {
  const files: PlannedFile[] = [];

  for (const [path, content] of input.staged) {
    const category = classify(path);
    const localPath = join(input.targetDir, path);
    const localContent = existsSync(localPath) ? readFileSync(localPath, "utf-8") : undefined;

    files.push({
      path,
      category,
      status: decideStatus(category, path, content, localContent, input.checksums),
      content,
      sha256: sha256(content),
      localContent,
    });
  }

  return { from: input.from, to: input.to, change: input.change, files };
}

function decideStatus(
  category: PlannedFile["category"],
  path: string,
  content: string,
  localContent: string | undefined,
  checksums: ChecksumStore,
): PlannedStatus {
  if (localContent === undefined) return "new";
  if (localContent === content) return "unchanged";

  switch (category) {
    case "always-update":
      return "update";
    case "smart-update":
      return isUnmodified(checksums, path, localContent) ? "update" : "modified";
    case "never-update":
      return "keep";
  }
}

export function countByStatus(plan: UpdatePlan): Record<PlannedStatus, number> {
  const counts: Record<PlannedStatus, number> = { new: 0, unchanged: 0, update: 0, modified: 0, keep: 0 };
  for (const file of plan.files) counts[file.status]++;
  return counts;
}

/** One-paragraph description of a plan, shown before the mode question. */
export function summarizePlan(plan: UpdatePlan): string[] {
  const counts = countByStatus(plan);
  const lines = [`Update ${plan.from} -> ${plan.to} (${plan.change})`];
  if (counts.new > 0) lines.push(`  ${counts.new} new file(s)`);
  if (counts.update > 0) lines.push(`  ${counts.update} file(s) will be replaced`);
  if (counts.modified > 0) {
    lines.push(`  ${counts.modified} file(s) you edited have upstream changes:`);
    for (const file of plan.files.filter((f) => f.status === "modified")) lines.push(`    - ${file.path}`);
  }
  if (counts.keep > 0) lines.push(`  ${counts.keep} of your own file(s) left as they are`);
  if (counts.unchanged > 0) lines.push(`  ${counts.unchanged} file(s) already current`);
  return lines;
}
