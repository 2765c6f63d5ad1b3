import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Interaction } from "../src/interaction.js";

const created: string[] = [];

/** Create a temporary directory holding the given files. */
export function makeTree(files: Record<string, string> = {}): string {
  const dir = mkdtempSync(join(tmpdir(), "memkit-test-"));
  created.push(dir);
  writeTree(dir, files);
  return dir;
}

export function writeTree(dir: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const fullPath = join(dir, path);
    mkdirSync(join(fullPath, ".."), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

/** Every file under dir, keyed by relative path with forward slashes. */
export function readTree(dir: string, prefix = ""): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of readdirSync(join(dir, prefix), { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) Object.assign(out, readTree(dir, rel));
    else out[rel] = readFileSync(join(dir, rel), "utf-8");
  }
  return out;
}

export function cleanupTrees(): void {
  for (const dir of created.splice(0)) rmSync(dir, { recursive: true, force: true });
}

/** Answers questions from a script; runs dry with null like closed input. */
export class ScriptedInteraction implements Interaction {
  readonly said: string[] = [];
  readonly asked: string[] = [];

  constructor(private readonly answers: string[] = []) {}

  say(text: string): void {
    this.said.push(text);
  }

  async ask(question: string): Promise<string | null> {
    this.asked.push(question);
    return this.answers.shift() ?? null;
  }

  get remaining(): number {
    return this.answers.length;
  }
}
