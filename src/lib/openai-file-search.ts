import OpenAI, { toFile } from "openai";
import type { ResponseIncludable } from "openai/resources/responses/responses";
import type { IndexedFileState, TranscriptDocument } from "./channel/types";
import { debugLog } from "./log";

export type HistoryMessage = {
  role: "user" | "assistant";
  content: string;
};

export type RetrievedSnippet = {
  fileReference?: string;
  fileName?: string;
  text: string;
};

export type StoreQuery = {
  storeRef: string;
  prompt: string;
  history: HistoryMessage[];
};

export type StoreAnswer = {
  answer: string;
  snippets: RetrievedSnippet[];
};

/** A managed search store: chunking, embedding and retrieval all happen remotely. */
export interface KnowledgeStore {
  createStore(name: string): Promise<string>;
  upload(storeRef: string, document: TranscriptDocument): Promise<string>;
  getStatus(storeRef: string, remoteRef: string): Promise<IndexedFileState>;
  query(q: StoreQuery): Promise<StoreAnswer>;
  deleteStore(storeRef: string, remoteRefs: readonly string[]): Promise<void>;
}

const INSTRUCTIONS = [
  "You answer questions about a YouTube channel using transcripts of its videos.",
  "Use file search to ground every factual claim in the transcripts.",
  "If the transcripts do not cover the question, say so instead of guessing.",
  "Mention the video title when you rely on a specific video.",
  "Be concise and quote short excerpts when helpful.",
].join("\n");

export class OpenAIKnowledgeStore implements KnowledgeStore {
  private readonly client: OpenAI;
  private readonly answerModel: string;

  constructor(client: OpenAI, opts: { answerModel?: string } = {}) {
    this.client = client;
    this.answerModel = opts.answerModel ?? "gpt-4o-mini";
  }

  async createStore(name: string): Promise<string> {
    const created = await this.client.vectorStores.create({
      name,
      metadata: { app: "channel-chat" },
    });
    return created.id;
  }

  async upload(storeRef: string, document: TranscriptDocument): Promise<string> {
    const uploadedFile = await this.client.files.create({
      file: await toFile(Buffer.from(document.body, "utf8"), document.fileName),
      purpose: "assistants",
    });
    try {
      const vsFile = await this.client.vectorStores.files.create(storeRef, {
        file_id: uploadedFile.id,
        attributes: { displayName: document.displayName, videoId: document.sourceVideoId },
      });
      return vsFile.id;
    } catch (e) {
      // Unattached files are invisible to deleteStore, so remove it here.
      await this.client.files.delete(uploadedFile.id).catch((deleteError: unknown) => {
        debugLog("index", "orphaned file delete failed", {
          fileId: uploadedFile.id,
          error: deleteError instanceof Error ? deleteError.message : String(deleteError),
        });
      });
      throw e;
    }
  }

  async getStatus(storeRef: string, remoteRef: string): Promise<IndexedFileState> {
    const file = await this.client.vectorStores.files.retrieve(remoteRef, { vector_store_id: storeRef });
    if (file.status === "completed") return "ACTIVE";
    if (file.status === "failed" || file.status === "cancelled") {
      debugLog("index", "remote processing failed", { remoteRef, error: file.last_error?.message ?? null });
      return "FAILED";
    }
    return "PENDING";
  }

  async query(q: StoreQuery): Promise<StoreAnswer> {
    const response = await this.client.responses.create({
      model: this.answerModel,
      instructions: INSTRUCTIONS,
      input: [...q.history, { role: "user" as const, content: q.prompt }],
      include: ["file_search_call.results"] as ResponseIncludable[],
      tools: [{ type: "file_search", vector_store_ids: [q.storeRef], max_num_results: 8 }],
      max_output_tokens: 1200,
      temperature: 0.5,
    });

    const snippets: RetrievedSnippet[] = [];
    for (const item of response.output) {
      if (item.type !== "file_search_call" || !Array.isArray(item.results)) continue;
      for (const r of item.results) {
        const text = (r.text ?? "").trim();
        if (!text) continue;
        snippets.push({ fileReference: r.file_id, fileName: r.filename, text });
      }
    }

    return { answer: response.output_text.trim(), snippets };
  }

  async listRemoteReferences(storeRef: string): Promise<string[]> {
    const refs: string[] = [];
    for await (const f of this.client.vectorStores.files.list(storeRef, { limit: 100 })) refs.push(f.id);
    return refs;
  }

  async deleteStore(storeRef: string, remoteRefs: readonly string[]): Promise<void> {
    await this.client.vectorStores.delete(storeRef);
    const leftover: string[] = [];
    for (const ref of remoteRefs) {
      try {
        await this.client.files.delete(ref);
      } catch (e) {
        debugLog("index", "file delete failed", { ref, error: e instanceof Error ? e.message : String(e) });
        leftover.push(ref);
      }
    }
    if (leftover.length) throw new Error(`Could not delete ${leftover.length} uploaded file(s): ${leftover.join(", ")}`);
  }
}
