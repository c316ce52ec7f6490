import { describe, expect, it } from "vitest";
import {
  channelNameFromUrl,
  collectChannelInput,
  parseChatCommand,
  printAnswer,
  printHistory,
} from "@/lib/chat-cli";
import { scriptedPrompter } from "./fakes";

describe("parseChatCommand", () => {
  it.each([
    ["exit", "exit"],
    ["QUIT", "exit"],
    [" q ", "exit"],
    ["Bye", "exit"],
    ["Help", "help"],
    ["HISTORY", "history"],
    ["clear", "clear"],
    ["   ", "empty"],
  ])("parses %j as %s", (input, kind) => {
    expect(parseChatCommand(input).kind).toBe(kind);
  });

  it("treats anything else as a question", () => {
    expect(parseChatCommand("  clear the air?  ")).toEqual({ kind: "question", text: "clear the air?" });
  });
});

describe("collectChannelInput", () => {
  it("re-prompts on invalid values and applies the default count", async () => {
    const lines: string[] = [];
    const prompter = scriptedPrompter(["", "https://example.com/x", " https://www.youtube.com/@testchannel/ ", ""]);
    const input = await collectChannelInput(prompter, (l) => lines.push(l));

    expect(input).toEqual({
      channelUrl: "https://www.youtube.com/@testchannel/",
      count: 10,
      channelName: "testchannel",
    });
    expect(lines).toEqual([
      "Error: Channel URL cannot be empty. Please try again.",
      "Error: Not a YouTube URL: https://example.com/x Please try again.",
    ]);
  });

  it("rejects non-numeric and zero counts", async () => {
    const lines: string[] = [];
    const prompter = scriptedPrompter(["https://www.youtube.com/@c", "ten", "0", "3"]);
    const input = await collectChannelInput(prompter, (l) => lines.push(l));
    expect(input?.count).toBe(3);
    expect(lines).toEqual([
      "Error: invalid number. Please enter a positive integer.",
      "Error: please enter a positive number.",
    ]);
  });

  it("asks for confirmation above 50 videos", async () => {
    const prompter = scriptedPrompter(["https://www.youtube.com/@c", "80", "n", "60", "y"]);
    const input = await collectChannelInput(prompter, () => undefined);
    expect(input?.count).toBe(60);
    expect(prompter.prompts.filter((p) => p.startsWith("Continue?"))).toHaveLength(2);
  });

  it("returns null when input ends", async () => {
    expect(await collectChannelInput(scriptedPrompter([]), () => undefined)).toBeNull();
    expect(await collectChannelInput(scriptedPrompter(["https://www.youtube.com/@c"]), () => undefined)).toBeNull();
  });
});

describe("channelNameFromUrl", () => {
  it("uses the last path segment without @", () => {
    expect(channelNameFromUrl("https://www.youtube.com/@mkbhd")).toBe("mkbhd");
    expect(channelNameFromUrl("https://www.youtube.com/c/SomeChannel/")).toBe("SomeChannel");
  });
});

describe("rendering", () => {
  it("prints answers with clipped source excerpts", () => {
    const lines: string[] = [];
    printAnswer((l) => lines.push(l), {
      role: "ASSISTANT",
      text: "The answer.",
      citations: [{ documentDisplayName: "Video_1", excerpt: `${"a".repeat(120)}` }],
    });
    expect(lines).toEqual([
      "",
      "Assistant:",
      "The answer.",
      "",
      "Sources (1 citations):",
      `  [1] Video_1: ${"a".repeat(100)}...`,
    ]);
  });

  it("prints an empty-history notice", () => {
    const lines: string[] = [];
    printHistory((l) => lines.push(l), []);
    expect(lines).toEqual(["No conversation history yet."]);
  });
});
