// src/interaction.ts - Question/answer plumbing for the interactive commands

import { createInterface } from "node:readline";

/**
 * The conversation surface. `ask` resolves to null once input is closed.
 */
export interface Interaction {
  say(text: string): void;
  ask(question: string): Promise<string | null>;
  close?(): void;
}

export interface ChoiceOption<K extends string = string> {
  key: K;
  label: string;
  description?: string;
}

export interface AskOptions {
  /** How many unclear answers are tolerated before giving up. */
  attempts?: number;
}

const CANCEL_WORDS = new Set(["cancel", "quit", "q", "exit", "abort"]);
const YES_WORDS = new Set(["y", "yes", "ok", "sure", "proceed"]);
const NO_WORDS = new Set(["n", "no", "nope", "skip"]);

/**
 * Map a free-text answer to one option: by key, by 1-based number, by exact
 * label, or by a label prefix that only one option has.
 * Returns undefined when the answer is empty, unknown or ambiguous.
 */
export function resolveChoice<K extends string>(
  answer: string,
  options: readonly ChoiceOption<K>[],
): K | undefined {
  const text = answer.trim().toLowerCase().replace(/[).:]+$/, "");
  if (!text) return undefined;

  const byKey = options.find((o) => o.key.toLowerCase() === text);
  if (byKey) return byKey.key;

  if (/^\d+$/.test(text)) {
    return options[Number.parseInt(text, 10) - 1]?.key;
  }

  const byLabel = options.find((o) => o.label.toLowerCase() === text);
  if (byLabel) return byLabel.key;

  const byPrefix = options.filter((o) => o.label.toLowerCase().startsWith(text));
  return byPrefix.length === 1 ? byPrefix[0].key : undefined;
}

/**
 * Ask until the answer names exactly one option.
 * Resolves to null when the user cancels, input closes, or attempts run out.
 */
export async function askChoice<K extends string>(
  io: Interaction,
  question: string,
  options: readonly ChoiceOption<K>[],
  { attempts = 3 }: AskOptions = {},
): Promise<K | null> {
  io.say(question);
  for (const [i, option] of options.entries()) {
    const tag = option.key.length <= 2 ? option.key : String(i + 1);
    io.say(`  ${tag}) ${option.label}${option.description ? ` - ${option.description}` : ""}`);
  }

  for (let attempt = 0; attempt < attempts; attempt++) {
    const answer = await io.ask(">");
    if (answer === null) return null;
    if (CANCEL_WORDS.has(answer.trim().toLowerCase())) return null;

    const key = resolveChoice(answer, options);
    if (key !== undefined) return key;
    io.say(`Sorry, "${answer.trim()}" doesn't match one option. Please answer with ${describeKeys(options)}.`);
  }

  io.say("No clear answer, stopping here.");
  return null;
}

/** Yes/no question; anything other than a clear yes within the attempts is a no. */
export async function confirm(
  io: Interaction,
  question: string,
  { attempts = 3, assumeYes = false }: AskOptions & { assumeYes?: boolean } = {},
): Promise<boolean> {
  if (assumeYes) {
    io.say(`${question} yes`);
    return true;
  }

  for (let attempt = 0; attempt < attempts; attempt++) {
    const answer = await io.ask(`${question} [y/n]`);
    if (answer === null) return false;
    const text = answer.trim().toLowerCase();
    if (YES_WORDS.has(text)) return true;
    if (NO_WORDS.has(text) || CANCEL_WORDS.has(text)) return false;
    io.say('Please answer "yes" or "no".');
  }
  return false;
}

function describeKeys(options: readonly ChoiceOption[]): string {
  const keys = options.map((o, i) => (o.key.length <= 2 ? o.key : String(i + 1)));
  if (keys.length <= 1) return keys.join("");
  return `${keys.slice(0, -1).join(", ")} or ${keys[keys.length - 1]}`;
}

// ─── Terminal ────────────────────────────────────────────────────────────────

/**
 * readline-backed interaction on stdin/stdout. Lines that arrive before a
 * question is asked are queued, so piped answers are not lost.
 */
export function createTerminalInteraction(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Interaction {
  const rl = createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: ((answer: string | null) => void)[] = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else queued.push(line);
  });
  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  return {
    say(text: string): void {
      output.write(text + "\n");
    },
    ask(question: string): Promise<string | null> {
      output.write(`${question} `);
      const line = queued.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => waiting.push(resolve));
    },
    close(): void {
      rl.close();
    },
  };
}
