import { createInterface } from "node:readline/promises";
import type { ConversationTurn } from "./channel/types";
import { InvalidChannelInputError } from "./channel/errors";
import { assertChannelUrl } from "./apify-scraper";
import type { Out } from "./log";

/** Reads one line; `null` means the input stream ended. */
export interface Prompter {
  question(prompt: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  const closedSignal = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });
  return {
    async question(prompt) {
      if (closed) return null;
      // A pending question is not settled when the stream ends (Ctrl+D), so race it against close.
      return await Promise.race([rl.question(prompt), closedSignal]);
    },
    close() {
      rl.close();
    },
  };
}

export type ChatCommand =
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "history" }
  | { kind: "clear" }
  | { kind: "empty" }
  | { kind: "question"; text: string };

const EXIT_WORDS = new Set(["exit", "quit", "q", "bye"]);

export function parseChatCommand(raw: string): ChatCommand {
  const text = raw.trim();
  if (!text) return { kind: "empty" };
  const lower = text.toLowerCase();
  if (EXIT_WORDS.has(lower)) return { kind: "exit" };
  if (lower === "help") return { kind: "help" };
  if (lower === "history") return { kind: "history" };
  if (lower === "clear") return { kind: "clear" };
  return { kind: "question", text };
}

export const DEFAULT_VIDEO_COUNT = 10;
const LARGE_VIDEO_COUNT = 50;
const RULE = "=".repeat(80);

export type ChannelInput = {
  channelUrl: string;
  count: number;
  channelName: string;
};

export function channelNameFromUrl(channelUrl: string) {
  const segments = channelUrl.trim().replace(/\/+$/, "").split("/");
  const last = segments[segments.length - 1] ?? "";
  return last.replace(/^@/, "") || channelUrl.trim();
}

/** Startup prompts. Returns null if input ends before both answers are given. */
export async function collectChannelInput(prompter: Prompter, out: Out): Promise<ChannelInput | null> {
  let channelUrl = "";
  for (;;) {
    const raw = await prompter.question("Enter YouTube channel URL: ");
    if (raw === null) return null;
    try {
      assertChannelUrl(raw);
      channelUrl = raw.trim();
      break;
    } catch (e) {
      if (!(e instanceof InvalidChannelInputError)) throw e;
      out(`Error: ${e.message} Please try again.`);
    }
  }

  let count = DEFAULT_VIDEO_COUNT;
  for (;;) {
    const raw = await prompter.question(`How many videos to process (default: ${DEFAULT_VIDEO_COUNT}): `);
    if (raw === null) return null;
    const trimmed = raw.trim();
    if (!trimmed) break;
    if (!/^\d+$/.test(trimmed)) {
      out("Error: invalid number. Please enter a positive integer.");
      continue;
    }
    const n = Number(trimmed);
    if (n < 1) {
      out("Error: please enter a positive number.");
      continue;
    }
    if (n > LARGE_VIDEO_COUNT) {
      out("Warning: processing many videos may take a while and incur API costs.");
      const confirm = await prompter.question("Continue? (y/n): ");
      if (confirm === null) return null;
      if (confirm.trim().toLowerCase() !== "y") continue;
    }
    count = n;
    break;
  }

  return { channelUrl, count, channelName: channelNameFromUrl(channelUrl) };
}

export function printWelcome(out: Out, channelName: string) {
  out(RULE);
  out(`YouTube Channel Chat - ${channelName}`);
  out(RULE);
  out("Ask anything about the videos from this channel.");
  out("Commands: help, history, clear, exit (or quit)");
  out(RULE);
}

export function printHelp(out: Out) {
  out(RULE);
  out("HELP");
  out(RULE);
  out("Answers are generated from the channel's video transcripts.");
  out("Sources list the transcript excerpts each answer was grounded on.");
  out("");
  out("  help      show this message");
  out("  history   show the conversation so far");
  out("  clear     clear the conversation history");
  out("  exit/quit leave the chat");
  out(RULE);
}

function clip(text: string, max: number) {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export function printAnswer(out: Out, turn: ConversationTurn) {
  out("");
  out("Assistant:");
  out(turn.text);
  if (!turn.citations.length) return;
  out("");
  out(`Sources (${turn.citations.length} citations):`);
  turn.citations.forEach((c, i) => {
    out(`  [${i + 1}] ${c.documentDisplayName}: ${clip(c.excerpt, 100)}`);
  });
}

export function printHistory(out: Out, turns: readonly ConversationTurn[]) {
  if (!turns.length) {
    out("No conversation history yet.");
    return;
  }
  out(RULE);
  out("CONVERSATION HISTORY");
  out(RULE);
  let n = 0;
  for (const t of turns) {
    if (t.role === "USER") {
      n += 1;
      out(`[${n}] You: ${t.text}`);
      continue;
    }
    if (t.error) out(`    Bot: (no answer: ${t.error})`);
    else out(`    Bot: ${clip(t.text, 200)}`);
  }
  out(RULE);
}
