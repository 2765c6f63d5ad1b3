import { describe, it, expect, afterEach } from "vitest";
import {
  classify,
  explainClassification,
  isReservedPath,
  listManagedFiles,
  normalizeRelativePath,
  scanTarget,
} from "../src/file-classifier.js";
import { cleanupTrees, makeTree } from "./helpers.js";

describe("classify", () => {
  it("keeps user data files out of updates", () => {
    expect(classify("projectbrief.md")).toBe("never-update");
    expect(classify("activeContext.md")).toBe("never-update");
    expect(explainClassification("progress.md").rule).toBe("user-data");
  });

  it("always updates named system files", () => {
    expect(classify("CLAUDE.md")).toBe("always-update");
    expect(classify("VERSION")).toBe("always-update");
    expect(explainClassification("UPDATE.md").rule).toBe("system-file");
  });

  it("always updates anything under the system directories", () => {
    expect(classify("commands/update.md")).toBe("always-update");
    expect(classify("templates/nested/deep/file.md")).toBe("always-update");
    expect(explainClassification("commands/restore.md").rule).toBe("system-dir");
  });

  it("smart-updates files under stacks/", () => {
    expect(classify("stacks/auth/auth-better-auth.md")).toBe("smart-update");
    expect(explainClassification("stacks/database/postgres.md").rule).toBe("smart-dir");
  });

  it("does not treat a root file named like a managed directory as managed", () => {
    for (const name of ["stacks", "commands", "templates"]) {
      expect(explainClassification(name)).toEqual({ path: name, category: "never-update", rule: "unmatched" });
    }
    expect(classify("stacks/.hidden.md")).toBe("smart-update");
  });

  it("spots paths inside reserved directories", () => {
    expect(isReservedPath(".git/hooks/pre-commit")).toBe(true);
    expect(isReservedPath("stacks/node_modules/a.md")).toBe(true);
    expect(isReservedPath(".memkit/checksums.json")).toBe(true);
    expect(isReservedPath("stacks/.gitkeep")).toBe(false);
  });

  it("leaves unmatched files untouched", () => {
    expect(classify("my-notes.md")).toBe("never-update");
    expect(explainClassification("my-notes.md").rule).toBe("unmatched");
  });

  it("matches exact names only at the root", () => {
    expect(explainClassification("notes/CLAUDE.md")).toEqual({
      path: "notes/CLAUDE.md",
      category: "never-update",
      rule: "unmatched",
    });
    expect(classify("docs/stacks/auth.md")).toBe("never-update");
  });

  it("normalizes separators and leading ./", () => {
    expect(explainClassification("./CLAUDE.md").path).toBe("CLAUDE.md");
    expect(classify("stacks\\auth\\auth-better-auth.md")).toBe("smart-update");
    expect(classify("commands//update.md")).toBe("always-update");
  });

  it("treats paths that leave the root as never-update", () => {
    expect(explainClassification("../CLAUDE.md").rule).toBe("invalid-path");
    expect(classify("stacks/../../CLAUDE.md")).toBe("never-update");
    expect(classify("/etc/CLAUDE.md")).toBe("never-update");
  });
});

describe("normalizeRelativePath", () => {
  it("returns null for empty and escaping paths", () => {
    expect(normalizeRelativePath("")).toBeNull();
    expect(normalizeRelativePath(".")).toBeNull();
    expect(normalizeRelativePath("a/../b")).toBeNull();
    expect(normalizeRelativePath("./a/b.md")).toBe("a/b.md");
  });
});

describe("scanTarget", () => {
  afterEach(() => cleanupTrees());

  it("classifies every file and skips memkit state", () => {
    const dir = makeTree({
      "CLAUDE.md": "system",
      "projectbrief.md": "brief",
      "my-notes.md": "notes",
      "commands/update.md": "cmd",
      "stacks/auth/auth-better-auth.md": "auth",
      ".memkit/checksums.json": "{}",
      ".memkit/backups/backup-0001-v1.0.0/files/CLAUDE.md": "old",
    });

    expect(scanTarget(dir).map((c) => [c.path, c.category])).toEqual([
      ["CLAUDE.md", "always-update"],
      ["commands/update.md", "always-update"],
      ["my-notes.md", "never-update"],
      ["projectbrief.md", "never-update"],
      ["stacks/auth/auth-better-auth.md", "smart-update"],
    ]);
  });

  it("lists only the files an update manages", () => {
    const dir = makeTree({
      "CLAUDE.md": "system",
      "progress.md": "mine",
      "templates/brief.md": "tpl",
      "stacks/db/postgres.md": "db",
      "node_modules/pkg/CLAUDE.md": "ignored",
    });

    expect(listManagedFiles(dir)).toEqual(["CLAUDE.md", "stacks/db/postgres.md", "templates/brief.md"]);
  });
});
