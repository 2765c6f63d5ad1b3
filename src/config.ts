// src/config.ts - Config Resolver
// Precedence: defaults <- config file <- MEMKIT_* environment <- CLI flags.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { ResolvedConfig, UpdateMode, Warning } from "./types.js";
import { DEFAULT_RETENTION, DEFAULT_TIMEOUT_MS } from "./types.js";
import { FileConfigSchema, PositiveInt } from "./schemas.js";
import type { FileConfig } from "./schemas.js";
import { errorMessage, isRecord } from "./utils.js";

export interface ParsedArgs {
  command: string[];
  source?: string;
  dir?: string;
  config?: string;
  mode?: string;
  retention?: number;
  timeout?: number;
  guide?: string;
  yes: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

export const CONFIG_FILENAME = "memkit.config.json";

const DEFAULTS: ResolvedConfig = {
  source: undefined,
  targetDir: ".",
  backupRetention: DEFAULT_RETENTION,
  mode: undefined,
  timeoutMs: DEFAULT_TIMEOUT_MS,
};

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, cwd, warnings);

  const modeInput = args.mode ?? fileConfig.mode;
  const mode = modeInput === undefined ? undefined : parseMode(modeInput, warnings);

  const retention = positiveOrDefault("backupRetention", args.retention ?? fileConfig.backupRetention, DEFAULT_RETENTION, warnings);
  const timeoutMs = positiveOrDefault("timeoutMs", args.timeout ?? fileConfig.timeoutMs, DEFAULT_TIMEOUT_MS, warnings);

  return {
    source: args.source ?? env.MEMKIT_SOURCE ?? fileConfig.source ?? DEFAULTS.source,
    targetDir: resolve(cwd, args.dir ?? fileConfig.targetDir ?? DEFAULTS.targetDir),
    backupRetention: retention,
    mode,
    timeoutMs,
  };
}

function positiveOrDefault(name: string, value: number | undefined, fallback: number, warnings: Warning[]): number {
  if (value === undefined) return fallback;
  if (PositiveInt.safeParse(value).success) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `${name} must be a positive integer, got ${value}; using ${fallback}`,
  });
  return fallback;
}

function parseMode(value: string, warnings: Warning[]): UpdateMode | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "quick" || normalized === "a") return "quick";
  if (normalized === "careful" || normalized === "b") return "careful";
  warnings.push({
    level: "warn",
    module: "config",
    message: `Unknown update mode "${value}" (expected quick or careful); you will be asked`,
  });
  return undefined;
}

function loadConfigFile(configPath: string | undefined, cwd: string, warnings: Warning[]): FileConfig {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({ level: "warn", module: "config", message: `Config file not found: ${configPath}` });
      return {};
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // memkit key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && pkg.memkit !== undefined) return toFileConfig(pkg.memkit, pkgJson, warnings);
    } catch (err: unknown) {
      warnings.push({
        level: "info",
        module: "config",
        message: `Skipping unreadable package.json: ${errorMessage(err)}`,
        file: pkgJson,
      });
    }
  }

  return {};
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig {
  try {
    return toFileConfig(JSON.parse(readFileSync(filePath, "utf-8")), filePath, warnings);
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${errorMessage(err)}`,
    });
    return {};
  }
}

/** Keep the recognised keys with valid values; report the rest. */
function toFileConfig(value: unknown, filePath: string, warnings: Warning[]): FileConfig {
  if (!isRecord(value)) {
    warnings.push({ level: "warn", module: "config", message: "Config must be a JSON object", file: filePath });
    return {};
  }

  const parsed = FileConfigSchema.safeParse(value);
  if (parsed.success) return parsed.data;

  const rejected = new Set<string>();
  for (const issue of parsed.error.issues) {
    const keys = issue.code === "unrecognized_keys" ? issue.keys : [String(issue.path[0])];
    for (const key of keys) {
      rejected.add(key);
      warnings.push({
        level: "warn",
        module: "config",
        message: issue.code === "unrecognized_keys" ? `Ignoring config key "${key}"` : `Ignoring config key "${key}": ${issue.message}`,
        file: filePath,
      });
    }
  }

  const retry = FileConfigSchema.safeParse(Object.fromEntries(Object.entries(value).filter(([key]) => !rejected.has(key))));
  return retry.success ? retry.data : {};
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { s: "source", d: "dir", c: "config", m: "mode", y: "yes", q: "quiet", v: "verbose", h: "help" },
    boolean: ["yes", "quiet", "verbose", "help"],
    string: ["source", "dir", "config", "mode", "retention", "timeout", "guide"],
  });

  return {
    command: args._.map(String),
    source: optionalString(args.source),
    dir: optionalString(args.dir),
    config: optionalString(args.config),
    mode: optionalString(args.mode),
    retention: optionalInt(args.retention),
    timeout: optionalInt(args.timeout),
    guide: optionalString(args.guide),
    yes: args.yes === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function optionalInt(value: unknown): number | undefined {
  const text = optionalString(value);
  if (text === undefined) return undefined;
  const parsed = Number.parseInt(text, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
