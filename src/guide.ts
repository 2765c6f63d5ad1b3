// src/guide.ts - "Help me choose": branching stack questionnaire
// Questions and stacks live in data/stack-guide.json; this module only walks them.

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { askChoice } from "./interaction.js";
import type { Interaction } from "./interaction.js";
import type { z } from "zod";
import { formatIssues, StackGuideSchema } from "./schemas.js";
import type { GuideOptionSchema, GuideQuestionSchema, StackEntrySchema } from "./schemas.js";
import { errorMessage } from "./utils.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type GuideOption = z.infer<typeof GuideOptionSchema>;
export type GuideQuestion = z.infer<typeof GuideQuestionSchema>;
export type StackEntry = z.infer<typeof StackEntrySchema>;
export type StackGuide = z.infer<typeof StackGuideSchema>;

export interface GuideAnswer {
  questionId: string;
  optionKey: string;
}

export interface GuideResult {
  answers: GuideAnswer[];
  tags: string[];
  recommendations: StackEntry[];
}

export const DEFAULT_GUIDE_PATH = fileURLToPath(new URL("../data/stack-guide.json", import.meta.url));

// ─── Loading ─────────────────────────────────────────────────────────────────

export function loadGuide(filePath: string = DEFAULT_GUIDE_PATH): StackGuide {
  if (!existsSync(filePath)) throw new Error(`Stack guide not found: ${filePath}`);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new Error(`Failed to parse stack guide ${filePath}: ${errorMessage(err)}`);
  }
  return parseGuide(raw);
}

/**
 * Validate guide data. Every `next` and `start` must name a known question.
 */
export function parseGuide(value: unknown): StackGuide {
  const parsed = StackGuideSchema.safeParse(value);
  if (!parsed.success) throw new Error(`Invalid stack guide: ${formatIssues(parsed.error)}`);

  const guide = parsed.data;
  const ids = new Set(guide.questions.map((q) => q.id));
  const refs = [guide.start, ...guide.questions.flatMap((q) => [q.next, ...q.options.map((o) => o.next)])];
  for (const ref of refs) {
    if (ref !== undefined && !ids.has(ref)) throw new Error(`stack guide refers to unknown question "${ref}"`);
  }
  return guide;
}

// ─── Walking ─────────────────────────────────────────────────────────────────

/**
 * Ask the questions from `start`, following each answer's branch.
 * Resolves to null if the user stops answering.
 */
export async function runGuide(io: Interaction, guide: StackGuide): Promise<GuideResult | null> {
  const byId = new Map(guide.questions.map((q) => [q.id, q]));
  const answers: GuideAnswer[] = [];
  const tags = new Set<string>();
  const asked = new Set<string>();

  let nextId: string | undefined = guide.start;
  while (nextId !== undefined) {
    const question = byId.get(nextId);
    if (!question || asked.has(question.id)) break;
    asked.add(question.id);

    const key = await askChoice(io, question.text, question.options);
    if (key === null) return null;
    const option = question.options.find((o) => o.key === key);
    if (!option) return null;

    answers.push({ questionId: question.id, optionKey: option.key });
    for (const tag of option.tags) tags.add(tag);
    nextId = option.next ?? question.next;
  }

  return { answers, tags: [...tags], recommendations: recommendStacks(guide, tags) };
}

/** First stack per category, in declared order, whose required tags are all present. */
export function recommendStacks(guide: StackGuide, tags: ReadonlySet<string>): StackEntry[] {
  const picked = new Map<string, StackEntry>();
  for (const stack of guide.stacks) {
    if (picked.has(stack.category)) continue;
    if (stack.requires.every((tag) => tags.has(tag))) picked.set(stack.category, stack);
  }
  return [...picked.values()];
}

export function describeRecommendations(result: GuideResult, targetDir?: string): string[] {
  if (result.recommendations.length === 0) {
    return ["No stack files match those answers. Browse stacks/ to pick one yourself."];
  }
  const lines = ["Recommended stack:"];
  for (const stack of result.recommendations) {
    const missing = targetDir !== undefined && !existsSync(join(targetDir, stack.file));
    lines.push(`  ${stack.category}: ${stack.file}${missing ? " (not installed, run memkit update)" : ""}`);
    if (stack.reason) lines.push(`    ${stack.reason}`);
  }
  return lines;
}
