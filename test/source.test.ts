import { describe, it, expect, afterEach, vi } from "vitest";
import { createSource, DirectorySource, HttpSource, parseManifest } from "../src/source.js";
import { ManifestError, SourceError } from "../src/types.js";
import { cleanupTrees, makeTree } from "./helpers.js";

const MANIFEST = {
  version: "1.2.0",
  changelog: ["New auth stack"],
  files: ["CLAUDE.md", "stacks/auth/auth-better-auth.md"],
};

describe("parseManifest", () => {
  it("accepts a well-formed manifest", () => {
    expect(parseManifest(MANIFEST)).toEqual(MANIFEST);
  });

  it("defaults the changelog and trims the version", () => {
    expect(parseManifest({ version: " 2.0.0 ", files: [] })).toEqual({ version: "2.0.0", changelog: [], files: [] });
  });

  it("normalises paths and drops duplicates", () => {
    const manifest = parseManifest({ version: "1.0.0", files: ["./CLAUDE.md", "CLAUDE.md", "stacks\\db\\pg.md"] });
    expect(manifest.files).toEqual(["CLAUDE.md", "stacks/db/pg.md"]);
  });

  it.each([
    [null, "Invalid release manifest: Expected object, received null"],
    [{ files: [] }, "Invalid release manifest: version: Required"],
    [{ version: "1.2", files: [] }, 'Invalid release manifest: Invalid version "1.2": expected MAJOR.MINOR.PATCH'],
    [{ version: "1.0.0", changelog: "fixes", files: [] }, "Invalid release manifest: changelog: Expected array, received string"],
    [{ version: "1.0.0" }, "Invalid release manifest: files: Required"],
    [{ version: "1.0.0", files: ["CLAUDE.md", 7] }, "Invalid release manifest: files.1: Expected string, received number"],
    [{ version: "1.0.0", files: ["../etc/passwd"] }, 'Invalid release manifest: unsafe file path "../etc/passwd"'],
  ])("rejects %j", (value, message) => {
    expect(() => parseManifest(value)).toThrow(message);
  });

  it.each([".git/hooks/pre-commit", ".memkit/backups/backup-9999-v9.9.9/backup.json", "stacks/node_modules/x.md"])(
    "rejects %j inside a reserved directory",
    (path) => {
      expect(() => parseManifest({ version: "1.0.0", files: ["CLAUDE.md", path] })).toThrow(
        `Invalid release manifest: file path "${path}" is inside a reserved directory`,
      );
    },
  );
});

describe("DirectorySource", () => {
  afterEach(() => cleanupTrees());

  it("reads the manifest and files", async () => {
    const root = makeTree({
      "manifest.json": JSON.stringify(MANIFEST),
      "CLAUDE.md": "# System v2\n",
    });
    const source = new DirectorySource(root);

    expect(source.describe()).toBe(root);
    await expect(source.fetchManifest()).resolves.toEqual(MANIFEST);
    await expect(source.fetchFile("CLAUDE.md")).resolves.toBe("# System v2\n");
  });

  it("reports missing files", async () => {
    const root = makeTree({});
    const source = new DirectorySource(root);
    await expect(source.fetchFile("CLAUDE.md")).rejects.toThrow(`CLAUDE.md not found in ${root}`);
    await expect(source.fetchManifest()).rejects.toBeInstanceOf(SourceError);
  });

  it("reports a manifest that is not JSON", async () => {
    const root = makeTree({ "manifest.json": "version: 1.0.0" });
    await expect(new DirectorySource(root).fetchManifest()).rejects.toBeInstanceOf(ManifestError);
  });

  it("refuses paths outside the release", async () => {
    const root = makeTree({});
    await expect(new DirectorySource(root).fetchFile("../secret.md")).rejects.toThrow(
      'Refusing to fetch unsafe path "../secret.md"',
    );
    await expect(new DirectorySource(root).fetchFile(".git/config")).rejects.toThrow(
      'Refusing to fetch unsafe path ".git/config"',
    );
  });
});

describe("HttpSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches files relative to the base URL", async () => {
    const fetchMock = vi.fn(async (url: string) => {
      if (url.endsWith("/manifest.json")) return new Response(JSON.stringify(MANIFEST));
      return new Response("# System v2\n");
    });
    vi.stubGlobal("fetch", fetchMock);

    const source = new HttpSource("https://releases.test/memory-bank/");
    expect(source.describe()).toBe("https://releases.test/memory-bank");
    await expect(source.fetchManifest()).resolves.toEqual(MANIFEST);
    await expect(source.fetchFile("stacks/my stack.md")).resolves.toBe("# System v2\n");

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      "https://releases.test/memory-bank/manifest.json",
      "https://releases.test/memory-bank/stacks/my%20stack.md",
    ]);
  });

  it("turns an error status into a SourceError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("gone", { status: 404 })),
    );
    const source = new HttpSource("https://releases.test");

    const error = await source.fetchManifest().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({
      message: "GET https://releases.test/manifest.json returned 404",
      statusCode: 404,
    });
  });

  it("wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );
    await expect(new HttpSource("https://releases.test").fetchFile("CLAUDE.md")).rejects.toThrow(
      "GET https://releases.test/CLAUDE.md failed: fetch failed",
    );
  });

  it("gives up after the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: { signal: AbortSignal }) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal.addEventListener("abort", () => {
              const aborted = new Error("This operation was aborted");
              aborted.name = "AbortError";
              reject(aborted);
            });
          }),
      ),
    );
    await expect(new HttpSource("https://releases.test", 10).fetchManifest()).rejects.toThrow(
      "GET https://releases.test/manifest.json timed out after 10ms",
    );
  });
});

describe("createSource", () => {
  it("picks HTTP for URLs and a directory otherwise", () => {
    expect(createSource("https://releases.test")).toBeInstanceOf(HttpSource);
    expect(createSource("HTTP://releases.test")).toBeInstanceOf(HttpSource);
    expect(createSource("./release")).toBeInstanceOf(DirectorySource);
  });
});
