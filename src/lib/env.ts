import { z } from "zod";
import { MissingConfigError } from "./channel/errors";

const flag = z
  .string()
  .optional()
  .transform((v) => ["1", "true", "yes", "on"].includes((v ?? "").trim().toLowerCase()));

const EnvSchema = z.object({
  APIFY_API_TOKEN: z.string().trim().optional(),
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_ANSWER_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  APIFY_ACTOR_ID: z.string().trim().min(1).default("streamers/youtube-scraper"),
  INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  INDEX_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1_000),
  TRANSCRIPTS_DIR: z.string().trim().min(1).default("transcripts"),
  KEEP_TRANSCRIPTS: flag,
  KEEP_REMOTE_STORE: flag,
  CHANNEL_CHAT_DEBUG: flag,
});

export type AppConfig = {
  apifyToken: string;
  openaiApiKey: string;
  answerModel: string;
  apifyActorId: string;
  indexTimeoutMs: number;
  indexPollIntervalMs: number;
  transcriptsDir: string;
  keepTranscripts: boolean;
  keepRemoteStore: boolean;
  debug: boolean;
};

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(env)) out[k] = v?.trim() ? v : undefined;
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(blankToUndefined(env));
  if (!parsed.APIFY_API_TOKEN) throw new MissingConfigError("APIFY_API_TOKEN");
  if (!parsed.OPENAI_API_KEY) throw new MissingConfigError("OPENAI_API_KEY");

  return {
    apifyToken: parsed.APIFY_API_TOKEN,
    openaiApiKey: parsed.OPENAI_API_KEY,
    answerModel: parsed.OPENAI_ANSWER_MODEL,
    apifyActorId: parsed.APIFY_ACTOR_ID,
    indexTimeoutMs: parsed.INDEX_TIMEOUT_MS,
    indexPollIntervalMs: parsed.INDEX_POLL_INTERVAL_MS,
    transcriptsDir: parsed.TRANSCRIPTS_DIR,
    keepTranscripts: parsed.KEEP_TRANSCRIPTS,
    keepRemoteStore: parsed.KEEP_REMOTE_STORE,
    debug: parsed.CHANNEL_CHAT_DEBUG,
  };
}
