// src/index.ts - Library API

export type {
  Version,
  VersionChange,
  FileCategory,
  Classification,
  ClassificationRule,
  Warning,
  ReleaseManifest,
  BackupManifest,
  BackupFileEntry,
  BackupInfo,
  RestoreResult,
  UpdateMode,
  UpdatePlan,
  PlannedFile,
  PlannedStatus,
  AppliedFile,
  FileAction,
  ResolvedConfig,
} from "./types.js";

export {
  VersionParseError,
  SourceError,
  ManifestError,
  NothingToRestoreError,
  BackupCorruptError,
  InvalidTransitionError,
  MEMKIT_VERSION,
} from "./types.js";

export { parseVersion, formatVersion, compareVersions, readLocalVersion, writeLocalVersion } from "./version.js";
export { classify, explainClassification, isReservedPath, scanTarget, listManagedFiles } from "./file-classifier.js";
export { createBackup, listBackups, pruneBackups, restoreLatest, restoreBackup } from "./backup.js";
export { createSource, HttpSource, DirectorySource, parseManifest } from "./source.js";
export type { UpdateSource } from "./source.js";
export { planUpdate, stageRelease, summarizePlan } from "./update-plan.js";
export { buildNumberedDiff } from "./diff.js";
export { askChoice, confirm, resolveChoice, createTerminalInteraction } from "./interaction.js";
export type { Interaction, ChoiceOption } from "./interaction.js";
export { UpdateSession, checkForUpdate, describeCheck, runUpdate, runRestore } from "./session.js";
export type { SessionPhase, SessionContext, CheckResult, UpdateOutcome, RestoreOutcome } from "./session.js";
export { loadGuide, parseGuide, runGuide, recommendStacks, describeRecommendations } from "./guide.js";
export type { StackGuide, GuideResult, StackEntry } from "./guide.js";
export { resolveConfig, parseCliArgs } from "./config.js";
export { ReleaseManifestSchema, BackupManifestSchema, StackGuideSchema, FileConfigSchema } from "./schemas.js";
