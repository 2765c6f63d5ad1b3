// src/diff.ts - Compact line diff shown before overwriting an edited file
// One changed region: common prefix and suffix are trimmed, 3 context lines kept.

const CONTEXT_LINES = 3;

type DiffPrefix = "-" | "+" | " ";

function toLines(content: string): string[] {
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function row(prefix: DiffPrefix, lineNumber: number | undefined, width: number, text: string): string {
  const num = lineNumber === undefined ? " ".repeat(width) : String(lineNumber).padStart(width, " ");
  return `${prefix}${num} ${text}`;
}

/**
 * Render the differing region between the local and upstream versions.
 * Removed lines carry local line numbers, added lines upstream ones.
 */
export function buildNumberedDiff(localContent: string, upstreamContent: string, path?: string): string {
  const local = toLines(localContent);
  const upstream = toLines(upstreamContent);
  const header = path ? [`--- ${path} (yours)`, `+++ ${path} (upstream)`] : [];

  let start = 0;
  while (start < local.length && start < upstream.length && local[start] === upstream[start]) {
    start++;
  }
  if (start === local.length && start === upstream.length) {
    return [...header, "(no changes)"].join("\n");
  }

  let localEnd = local.length - 1;
  let upstreamEnd = upstream.length - 1;
  while (localEnd >= start && upstreamEnd >= start && local[localEnd] === upstream[upstreamEnd]) {
    localEnd--;
    upstreamEnd--;
  }

  const width = String(Math.max(local.length, upstream.length, 1)).length;
  const out: string[] = [...header];

  const contextStart = Math.max(0, start - CONTEXT_LINES);
  if (contextStart > 0) out.push(row(" ", undefined, width, "..."));
  for (let i = contextStart; i < start; i++) out.push(row(" ", i + 1, width, local[i]));

  for (let i = start; i <= localEnd; i++) out.push(row("-", i + 1, width, local[i]));
  for (let i = start; i <= upstreamEnd; i++) out.push(row("+", i + 1, width, upstream[i]));

  const contextEnd = Math.min(local.length, localEnd + 1 + CONTEXT_LINES);
  for (let i = localEnd + 1; i < contextEnd; i++) out.push(row(" ", i + 1, width, local[i]));
  if (contextEnd < local.length) out.push(row(" ", undefined, width, "..."));

  return out.join("\n");
}

export interface DiffStats {
  removed: number;
  added: number;
}

export function diffStats(diff: string): DiffStats {
  let removed = 0;
  let added = 0;
  for (const line of diff.split("\n")) {
    if (line.startsWith("---") || line.startsWith("+++")) continue;
    if (line.startsWith("-")) removed++;
    else if (line.startsWith("+")) added++;
  }
  return { removed, added };
}
