import OpenAI from "openai";

let cached: { apiKey: string; client: OpenAI } | undefined;

export function getOpenAIClient(apiKey = process.env.OPENAI_API_KEY): OpenAI {
  if (!apiKey) {
    throw new Error("Missing OPENAI_API_KEY. Add it to .env.local or .env.");
  }
  if (cached?.apiKey === apiKey) return cached.client;
  const client = new OpenAI({ apiKey });
  cached = { apiKey, client };
  return client;
}
