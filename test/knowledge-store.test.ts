import { describe, expect, it } from "vitest";
import type { IndexedFile, TranscriptDocument } from "@/lib/channel/types";
import { IndexingIncompleteError } from "@/lib/channel/errors";
import {
  KnowledgeStoreIndexer,
  requireQueryable,
  summarizeIndexing,
  transition,
} from "@/lib/knowledge-store";
import { FakeKnowledgeStore, fakeClock } from "./fakes";

function doc(name: string): TranscriptDocument {
  return Object.freeze({ sourceVideoId: name, displayName: name, fileName: `${name}.txt`, body: `body of ${name}` });
}

const FAST = { timeoutMs: 1_000, pollIntervalMs: 0 };

describe("KnowledgeStoreIndexer.submit", () => {
  it("keeps submitting after one upload fails", async () => {
    const store = new FakeKnowledgeStore({ uploadFailures: { b: "413 payload too large" } });
    const indexer = new KnowledgeStoreIndexer(store, fakeClock());
    const files = await indexer.submit("vs_1", [doc("a"), doc("b"), doc("c")]);

    expect(files.map((f) => [f.document.displayName, f.state, f.remoteReference])).toEqual([
      ["a", "PENDING", "file_1"],
      ["b", "FAILED", undefined],
      ["c", "PENDING", "file_2"],
    ]);
    expect(files[1]?.error).toBe("413 payload too large");
  });
});

describe("KnowledgeStoreIndexer.awaitReady", () => {
  it("polls until every entry is terminal and keeps submission order", async () => {
    const store = new FakeKnowledgeStore({
      statuses: {
        a: ["PENDING", "PENDING", "ACTIVE"],
        b: ["PENDING", "FAILED"],
        c: ["ACTIVE"],
      },
    });
    const clock = fakeClock();
    const indexer = new KnowledgeStoreIndexer(store, clock);
    const submitted = await indexer.submit("vs_1", [doc("a"), doc("b"), doc("c")]);
    const { files, timedOut } = await indexer.awaitReady("vs_1", submitted, { timeoutMs: 10_000, pollIntervalMs: 250 });

    expect(timedOut).toBe(false);
    expect(files.map((f) => f.state)).toEqual(["ACTIVE", "FAILED", "ACTIVE"]);
    expect(files[1]?.error).toBe("Remote processing failed.");
    // round 1: a, b, c; round 2: a, b; round 3: a
    expect(store.statusCalls).toBe(6);
    expect(clock.slept).toEqual([250, 250]);
  });

  it("returns immediately when nothing is pending", async () => {
    const store = new FakeKnowledgeStore({ uploadFailures: { a: "boom" } });
    const clock = fakeClock();
    const indexer = new KnowledgeStoreIndexer(store, clock);
    const submitted = await indexer.submit("vs_1", [doc("a")]);
    const { files, timedOut } = await indexer.awaitReady("vs_1", submitted, FAST);
    expect(timedOut).toBe(false);
    expect(files[0]?.state).toBe("FAILED");
    expect(store.statusCalls).toBe(0);
    expect(clock.slept).toEqual([]);
  });

  it("only returns with PENDING entries once the timeout elapses", async () => {
    const store = new FakeKnowledgeStore({ statuses: { a: ["PENDING"], b: ["ACTIVE"] } });
    const clock = fakeClock(100);
    const indexer = new KnowledgeStoreIndexer(store, clock);
    const submitted = await indexer.submit("vs_1", [doc("a"), doc("b")]);
    const { files, timedOut } = await indexer.awaitReady("vs_1", submitted, { timeoutMs: 500, pollIntervalMs: 100 });

    expect(timedOut).toBe(true);
    expect(files.map((f) => f.state)).toEqual(["PENDING", "ACTIVE"]);
    expect(clock.now()).toBeGreaterThanOrEqual(500);
  });

  it("marks an entry FAILED when its status check errors", async () => {
    const store = new FakeKnowledgeStore();
    store.getStatus = async () => {
      throw new Error("503 service unavailable");
    };
    const indexer = new KnowledgeStoreIndexer(store, fakeClock());
    const submitted = await indexer.submit("vs_1", [doc("a")]);
    const { files } = await indexer.awaitReady("vs_1", submitted, FAST);
    expect(files[0]).toMatchObject({ state: "FAILED", error: "503 service unavailable" });
  });
});

describe("indexing summary", () => {
  const pending: IndexedFile = Object.freeze({ document: doc("a"), remoteReference: "file_1", state: "PENDING" });

  it("reports N of M indexed", () => {
    const summary = summarizeIndexing([
      transition(pending, "ACTIVE"),
      transition(pending, "FAILED"),
      transition(pending, "ACTIVE"),
      pending,
    ]);
    expect(summary).toEqual({ total: 4, active: 2, failed: 1, pending: 1, report: "2 of 4 videos indexed" });
  });

  it("requires at least one ACTIVE file", () => {
    const summary = summarizeIndexing([transition(pending, "FAILED"), transition(pending, "FAILED")]);
    expect(() => requireQueryable(summary)).toThrow(IndexingIncompleteError);
    expect(() => requireQueryable(summary)).toThrow("0 of 2 videos indexed (2 failed).");
    expect(() => requireQueryable(summarizeIndexing([transition(pending, "ACTIVE")]))).not.toThrow();
  });

  it("refuses to move a terminal file", () => {
    const active = transition(pending, "ACTIVE");
    expect(() => transition(active, "FAILED")).toThrow("IndexedFile a is already ACTIVE.");
  });
});
