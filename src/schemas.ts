// src/schemas.ts - Runtime schemas for every JSON document memkit reads

import { z } from "zod";

// ─── Reusable components ─────────────────────────────────────────────────────

export const PositiveInt = z.number().int().positive();
export const StringList = z.array(z.string());

// ─── Release manifest ────────────────────────────────────────────────────────

export const ReleaseManifestSchema = z.object({
  version: z.string(),
  changelog: StringList.default([]),
  files: StringList,
});

// ─── Checksums and backups ───────────────────────────────────────────────────

export const ChecksumStoreSchema = z.record(z.string());

export const BackupFileEntrySchema = z.object({
  path: z.string(),
  sha256: z.string(),
  sizeBytes: z.number().int().nonnegative(),
});

/** `files` lists every managed file present when the backup was taken, and nothing else. */
export const BackupManifestSchema = z.object({
  formatVersion: z.literal(1),
  label: z.string(),
  sequence: PositiveInt,
  version: z.string(),
  createdAt: z.string(),
  files: z.array(BackupFileEntrySchema),
  checksums: ChecksumStoreSchema.default({}),
});

// ─── Stack guide ─────────────────────────────────────────────────────────────

export const GuideOptionSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  tags: StringList.default([]),
  /** Question to ask next; falls back to the question's own `next`. */
  next: z.string().optional(),
});

export const GuideQuestionSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  options: z.array(GuideOptionSchema).min(1, "needs at least one option"),
  next: z.string().optional(),
});

export const StackEntrySchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  requires: StringList.default([]),
  file: z.string().min(1),
  reason: z.string().default(""),
});

export const StackGuideSchema = z.object({
  start: z.string(),
  questions: z.array(GuideQuestionSchema),
  stacks: z.array(StackEntrySchema),
});

// ─── Config file ─────────────────────────────────────────────────────────────

export const FileConfigSchema = z
  .object({
    source: z.string().min(1),
    targetDir: z.string().min(1),
    backupRetention: PositiveInt,
    mode: z.string(),
    timeoutMs: PositiveInt,
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/** One line per issue, prefixed with the dotted path when there is one. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
