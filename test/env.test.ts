import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "@/lib/env";
import { loadEnv, parseEnvFile } from "@/lib/load-env";
import { MissingConfigError } from "@/lib/channel/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ APIFY_API_TOKEN: "test-apify", OPENAI_API_KEY: "test-openai" });
    expect(config).toEqual({
      apifyToken: "test-apify",
      openaiApiKey: "test-openai",
      answerModel: "gpt-4o-mini",
      apifyActorId: "streamers/youtube-scraper",
      indexTimeoutMs: 300_000,
      indexPollIntervalMs: 1_000,
      transcriptsDir: "transcripts",
      keepTranscripts: false,
      keepRemoteStore: false,
      debug: false,
    });
  });

  it("reads overrides and flags", () => {
    const config = loadConfig({
      APIFY_API_TOKEN: "test-apify",
      OPENAI_API_KEY: "test-openai",
      INDEX_TIMEOUT_MS: "5000",
      INDEX_POLL_INTERVAL_MS: "0",
      KEEP_TRANSCRIPTS: "true",
      CHANNEL_CHAT_DEBUG: "1",
    });
    expect(config).toMatchObject({ indexTimeoutMs: 5000, indexPollIntervalMs: 0, keepTranscripts: true, debug: true });
  });

  it("names the missing credential", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-openai" })).toThrow(MissingConfigError);
    expect(() => loadConfig({ APIFY_API_TOKEN: "test-apify", OPENAI_API_KEY: "  " })).toThrow(
      "Missing OPENAI_API_KEY. Add it to .env.local or .env (see .env.example).",
    );
  });

  it("rejects a non-numeric timeout", () => {
    expect(() =>
      loadConfig({ APIFY_API_TOKEN: "test-apify", OPENAI_API_KEY: "test-openai", INDEX_TIMEOUT_MS: "soon" }),
    ).toThrow();
  });
});

describe("parseEnvFile", () => {
  it("handles comments, export and quoting", () => {
    const parsed = parseEnvFile(
      [
        "# comment",
        "export A=1",
        "B = plain value # trailing",
        'C="line\\nbreak"',
        "D='raw # kept'",
        "not a pair",
      ].join("\r\n"),
    );
    expect(parsed).toEqual({ A: "1", B: "plain value", C: "line\nbreak", D: "raw # kept" });
  });
});

describe("loadEnv", () => {
  it("prefers .env.local and never overrides existing variables", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "channel-chat-env-"));
    try {
      await fs.writeFile(path.join(dir, ".env.local"), "X=local\n");
      await fs.writeFile(path.join(dir, ".env"), "X=base\nY=base\nZ=base\n");
      const env: NodeJS.ProcessEnv = { Z: "preset" };

      expect(loadEnv(dir, env)).toEqual([".env.local", ".env"]);
      expect(env).toEqual({ X: "local", Y: "base", Z: "preset" });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
