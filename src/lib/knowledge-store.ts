import { setTimeout as delay } from "node:timers/promises";
import type { IndexedFile, IndexedFileState, TranscriptDocument } from "./channel/types";
import { IndexingIncompleteError } from "./channel/errors";
import type { KnowledgeStore } from "./openai-file-search";
import { debugLog } from "./log";

export type AwaitReadyOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
};

export type AwaitReadyResult = {
  files: IndexedFile[];
  timedOut: boolean;
};

export type IndexingSummary = {
  total: number;
  active: number;
  failed: number;
  pending: number;
  report: string;
};

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function transition(file: IndexedFile, next: Exclude<IndexedFileState, "PENDING">, error?: string): IndexedFile {
  if (file.state !== "PENDING") {
    throw new Error(`IndexedFile ${file.document.displayName} is already ${file.state}.`);
  }
  return Object.freeze({ ...file, state: next, error });
}

export function summarizeIndexing(files: readonly IndexedFile[]): IndexingSummary {
  let active = 0;
  let failed = 0;
  let pending = 0;
  for (const f of files) {
    if (f.state === "ACTIVE") active += 1;
    else if (f.state === "FAILED") failed += 1;
    else pending += 1;
  }
  return { total: files.length, active, failed, pending, report: `${active} of ${files.length} videos indexed` };
}

export function requireQueryable(summary: IndexingSummary) {
  if (summary.active === 0) throw new IndexingIncompleteError(summary);
}

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export class KnowledgeStoreIndexer {
  private readonly store: KnowledgeStore;
  private readonly clock: Clock;

  constructor(store: KnowledgeStore, clock: Clock = systemClock) {
    this.store = store;
    this.clock = clock;
  }

  /** Uploads each document on its own; an upload error only fails that document. */
  async submit(storeRef: string, documents: readonly TranscriptDocument[]): Promise<IndexedFile[]> {
    const out: IndexedFile[] = [];
    for (const document of documents) {
      const pending: IndexedFile = Object.freeze({ document, state: "PENDING" });
      try {
        const remoteReference = await this.store.upload(storeRef, document);
        out.push(Object.freeze({ ...pending, remoteReference }));
        debugLog("index", "submitted", { displayName: document.displayName, remoteReference });
      } catch (e) {
        out.push(transition(pending, "FAILED", errorMessage(e)));
        debugLog("index", "upload failed", { displayName: document.displayName, error: errorMessage(e) });
      }
    }
    return out;
  }

  /**
   * Polls PENDING entries until every entry is ACTIVE or FAILED, or until `timeoutMs` elapses.
   * Entries are returned in submission order.
   */
  async awaitReady(
    storeRef: string,
    files: readonly IndexedFile[],
    opts: AwaitReadyOptions,
  ): Promise<AwaitReadyResult> {
    const current = [...files];
    const deadline = this.clock.now() + opts.timeoutMs;

    for (;;) {
      for (let i = 0; i < current.length; i += 1) {
        const f = current[i];
        if (f.state !== "PENDING") continue;
        if (!f.remoteReference) {
          current[i] = transition(f, "FAILED", "No remote reference.");
          continue;
        }
        try {
          const status = await this.store.getStatus(storeRef, f.remoteReference);
          if (status !== "PENDING") {
            current[i] = transition(f, status, status === "FAILED" ? "Remote processing failed." : undefined);
          }
        } catch (e) {
          current[i] = transition(f, "FAILED", errorMessage(e));
        }
      }

      const pending = current.filter((f) => f.state === "PENDING").length;
      if (pending === 0) return { files: current, timedOut: false };
      if (this.clock.now() >= deadline) {
        debugLog("index", "timed out", { pending });
        return { files: current, timedOut: true };
      }
      await this.clock.sleep(opts.pollIntervalMs);
    }
  }
}
