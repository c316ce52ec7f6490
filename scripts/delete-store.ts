import { loadEnv } from "../src/lib/load-env";
import { getOpenAIClient } from "../src/lib/openai";
import { OpenAIKnowledgeStore } from "../src/lib/openai-file-search";

// Removes a vector store left behind by a session run with KEEP_REMOTE_STORE.
async function main() {
  loadEnv();
  const storeRef = process.argv.slice(2).find((a) => !a.startsWith("--"));
  const dryRun = process.argv.includes("--dry-run");
  if (!storeRef) {
    console.error("Usage: npm run store:delete -- <vector-store-id> [--dry-run]");
    process.exit(1);
  }

  const store = new OpenAIKnowledgeStore(getOpenAIClient());
  const refs = await store.listRemoteReferences(storeRef);
  if (!dryRun) await store.deleteStore(storeRef, refs);

  console.log(JSON.stringify({ ok: true, storeRef, files: refs.length, dryRun }, null, 2));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
