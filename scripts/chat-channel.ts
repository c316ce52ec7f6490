import { loadEnv } from "../src/lib/load-env";
import { loadConfig, type AppConfig } from "../src/lib/env";
import { MissingConfigError } from "../src/lib/channel/errors";
import { getOpenAIClient } from "../src/lib/openai";
import { OpenAIKnowledgeStore } from "../src/lib/openai-file-search";
import { ApifyScrapingProvider } from "../src/lib/apify-scraper";
import { collectChannelInput, createReadlinePrompter } from "../src/lib/chat-cli";
import { SessionController } from "../src/lib/session";
import { consoleOut, setDebugLogging } from "../src/lib/log";

function banner() {
  consoleOut("=".repeat(80));
  consoleOut("YouTube Channel Chat");
  consoleOut("Build a chatbot for any YouTube channel from its video transcripts.");
  consoleOut("=".repeat(80));
}

async function main() {
  loadEnv();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof MissingConfigError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }
  setDebugLogging(config.debug);

  banner();
  const prompter = createReadlinePrompter();
  const controller = new SessionController({
    scraper: new ApifyScrapingProvider({ token: config.apifyToken, actorId: config.apifyActorId }),
    store: new OpenAIKnowledgeStore(getOpenAIClient(config.openaiApiKey), { answerModel: config.answerModel }),
    options: {
      transcriptsDir: config.transcriptsDir,
      indexTimeoutMs: config.indexTimeoutMs,
      indexPollIntervalMs: config.indexPollIntervalMs,
      keepTranscripts: config.keepTranscripts,
      keepRemoteStore: config.keepRemoteStore,
    },
  });

  let exitCode = 0;
  try {
    const input = await collectChannelInput(prompter, consoleOut);
    if (!input) return;
    consoleOut(`Channel: ${input.channelName}, videos to process: ${input.count}`);

    const outcome = await controller.prepare(input);
    if (outcome.state === "ABORTED") {
      exitCode = 1;
      return;
    }
    await controller.chat(prompter, input.channelName);
  } finally {
    prompter.close();
    await controller.dispose();
    process.exitCode = exitCode;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
