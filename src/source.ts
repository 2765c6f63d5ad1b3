// src/source.ts - Where releases come from: an HTTP base URL or a local directory

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { isReservedPath, normalizeRelativePath } from "./file-classifier.js";
import { formatIssues, ReleaseManifestSchema } from "./schemas.js";
import { parseVersion } from "./version.js";
import type { ReleaseManifest } from "./types.js";
import { DEFAULT_TIMEOUT_MS, MANIFEST_FILE, ManifestError, SourceError } from "./types.js";
import { errorMessage } from "./utils.js";

export interface UpdateSource {
  /** Human-readable location, used in messages. */
  describe(): string;
  fetchManifest(): Promise<ReleaseManifest>;
  fetchFile(path: string): Promise<string>;
}

/**
 * Pick a source implementation from a location string.
 */
export function createSource(location: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): UpdateSource {
  if (/^https?:\/\//i.test(location)) return new HttpSource(location, timeoutMs);
  return new DirectorySource(location);
}

// ─── HTTP ────────────────────────────────────────────────────────────────────

export class HttpSource implements UpdateSource {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  describe(): string {
    return this.baseUrl;
  }

  async fetchManifest(): Promise<ReleaseManifest> {
    const body = await this.get(MANIFEST_FILE);
    return parseManifest(parseJson(body));
  }

  async fetchFile(path: string): Promise<string> {
    return this.get(requireSafePath(path));
  }

  private async get(path: string): Promise<string> {
    const url = `${this.baseUrl}/${path.split("/").map(encodeURIComponent).join("/")}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new SourceError(`GET ${url} returned ${response.status}`, response.status);
      }
      return await response.text();
    } catch (err) {
      if (err instanceof SourceError) throw err;
      if (err instanceof Error && err.name === "AbortError") {
        throw new SourceError(`GET ${url} timed out after ${this.timeoutMs}ms`);
      }
      throw new SourceError(`GET ${url} failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─── Local directory ─────────────────────────────────────────────────────────

export class DirectorySource implements UpdateSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  describe(): string {
    return this.root;
  }

  async fetchManifest(): Promise<ReleaseManifest> {
    return parseManifest(parseJson(this.read(MANIFEST_FILE)));
  }

  async fetchFile(path: string): Promise<string> {
    return this.read(requireSafePath(path));
  }

  private read(path: string): string {
    const filePath = join(this.root, path);
    if (!existsSync(filePath)) {
      throw new SourceError(`${path} not found in ${this.root}`);
    }
    try {
      return readFileSync(filePath, "utf-8");
    } catch (err: unknown) {
      throw new SourceError(`Cannot read ${filePath}: ${errorMessage(err)}`);
    }
  }
}

// ─── Manifest validation ─────────────────────────────────────────────────────

export function parseManifest(value: unknown): ReleaseManifest {
  const parsed = ReleaseManifestSchema.safeParse(value);
  if (!parsed.success) throw new ManifestError(formatIssues(parsed.error));

  const { version, changelog, files } = parsed.data;
  try {
    parseVersion(version);
  } catch (err: unknown) {
    throw new ManifestError(errorMessage(err));
  }

  const normalized: string[] = [];
  for (const file of files) {
    const path = normalizeRelativePath(file);
    if (path === null) throw new ManifestError(`unsafe file path "${file}"`);
    if (isReservedPath(path)) throw new ManifestError(`file path "${file}" is inside a reserved directory`);
    if (!normalized.includes(path)) normalized.push(path);
  }

  return { version: version.trim(), changelog, files: normalized };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err: unknown) {
    throw new ManifestError(errorMessage(err));
  }
}

function requireSafePath(path: string): string {
  const normalized = normalizeRelativePath(path);
  if (normalized === null || isReservedPath(normalized)) {
    throw new SourceError(`Refusing to fetch unsafe path "${path}"`);
  }
  return normalized;
}
