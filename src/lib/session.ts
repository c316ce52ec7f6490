import type {
  ConversationSession,
  IndexedFile,
  PipelineStage,
  SessionState,
  TranscriptDocument,
  VideoRecord,
} from "./channel/types";
import {
  AnswerUnavailableError,
  ChannelChatError,
  EmptyResultError,
  IllegalTransitionError,
  IndexingIncompleteError,
  InvalidChannelInputError,
} from "./channel/errors";
import { assertChannelUrl, fetchChannelVideos, type ScrapingProvider } from "./apify-scraper";
import { clearTranscriptFiles, materialize, writeTranscriptFiles } from "./transcripts";
import { KnowledgeStoreIndexer, requireQueryable, summarizeIndexing, type Clock, type IndexingSummary } from "./knowledge-store";
import type { KnowledgeStore } from "./openai-file-search";
import { ConversationEngine, clearHistory, createSession } from "./conversation";
import { parseChatCommand, printAnswer, printHelp, printHistory, printWelcome, type Prompter } from "./chat-cli";
import { consoleOut, debugLog, type Out } from "./log";

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  COLLECTING_INPUT: ["SCRAPING", "ABORTED"],
  SCRAPING: ["MATERIALIZING", "ABORTED"],
  MATERIALIZING: ["INDEXING", "ABORTED"],
  INDEXING: ["CHATTING", "ABORTED"],
  CHATTING: ["TERMINATED", "ABORTED"],
  TERMINATED: [],
  ABORTED: [],
};

export type SessionInput = {
  channelUrl: string;
  count: number;
  channelName?: string;
};

export type ControllerOptions = {
  transcriptsDir: string;
  indexTimeoutMs: number;
  indexPollIntervalMs: number;
  keepTranscripts?: boolean;
  keepRemoteStore?: boolean;
  maxContextTurns?: number;
};

export type ControllerDeps = {
  scraper: ScrapingProvider;
  store: KnowledgeStore;
  options: ControllerOptions;
  out?: Out;
  clock?: Clock;
  onTransition?: (from: SessionState, to: SessionState) => void;
};

export type PrepareOutcome =
  | { state: "CHATTING"; session: ConversationSession; indexing: IndexingSummary }
  | { state: "ABORTED"; stage: PipelineStage; error: ChannelChatError; diagnostic: string };

function asChannelChatError(stage: PipelineStage, e: unknown): ChannelChatError {
  if (e instanceof ChannelChatError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ChannelChatError(stage, message, { cause: e });
}

/**
 * Runs one channel through scrape -> materialize -> index, then hosts the chat loop.
 * Owns the ConversationSession and is the only writer of its store reference.
 */
export class SessionController {
  private current: SessionState = "COLLECTING_INPUT";
  private session: ConversationSession | null = null;
  private storeRef: string | null = null;
  private remoteRefs: string[] = [];
  private artifactPaths: string[] = [];

  private readonly deps: ControllerDeps;
  private readonly out: Out;
  private readonly indexer: KnowledgeStoreIndexer;
  private readonly engine: ConversationEngine;

  constructor(deps: ControllerDeps) {
    this.deps = deps;
    this.out = deps.out ?? consoleOut;
    this.indexer = new KnowledgeStoreIndexer(deps.store, deps.clock);
    this.engine = new ConversationEngine(deps.store, { maxContextTurns: deps.options.maxContextTurns });
  }

  get state(): SessionState {
    return this.current;
  }

  getSession(): ConversationSession | null {
    return this.session;
  }

  private moveTo(next: SessionState) {
    if (!TRANSITIONS[this.current].includes(next)) throw new IllegalTransitionError(this.current, next);
    const prev = this.current;
    this.current = next;
    debugLog("session", "transition", { from: prev, to: next });
    this.deps.onTransition?.(prev, next);
  }

  private abort(stage: PipelineStage, e: unknown): PrepareOutcome {
    const error = asChannelChatError(stage, e);
    const diagnostic = `${error.stage} failed: ${error.message}`;
    this.moveTo("ABORTED");
    this.out(`Error: ${diagnostic}`);
    return { state: "ABORTED", stage: error.stage, error, diagnostic };
  }

  private heading(title: string) {
    this.out("");
    this.out("=".repeat(80));
    this.out(title);
    this.out("=".repeat(80));
  }

  async prepare(input: SessionInput): Promise<PrepareOutcome> {
    if (this.current !== "COLLECTING_INPUT") throw new IllegalTransitionError(this.current, "SCRAPING");
    const { options } = this.deps;

    try {
      if (!Number.isInteger(input.count) || input.count < 1) {
        throw new InvalidChannelInputError(`Video count must be a positive integer (got ${input.count}).`);
      }
      assertChannelUrl(input.channelUrl);
    } catch (e) {
      return this.abort("input", e);
    }

    this.heading("STEP 1: Scraping YouTube channel");
    this.moveTo("SCRAPING");
    let videos: VideoRecord[];
    try {
      this.out(`Fetching up to ${input.count} videos from ${input.channelUrl}...`);
      videos = await fetchChannelVideos(this.deps.scraper, input.channelUrl, input.count);
    } catch (e) {
      return this.abort("scrape", e);
    }
    for (const v of videos) {
      this.out(`  ${v.transcriptText ? "+" : "-"} ${v.title.slice(0, 60)}${v.transcriptText ? "" : " (no transcript)"}`);
    }

    this.heading("STEP 2: Creating transcript files");
    this.moveTo("MATERIALIZING");
    let documents: TranscriptDocument[];
    try {
      const result = materialize(videos);
      if (result.kind === "empty") throw new EmptyResultError(videos.length);
      documents = result.documents;
      this.artifactPaths = await writeTranscriptFiles(options.transcriptsDir, documents);
    } catch (e) {
      return this.abort("materialize", e);
    }
    this.out(`Created ${documents.length} transcript files in '${options.transcriptsDir}' (${videos.length - documents.length} without transcript).`);

    this.heading("STEP 3: Indexing transcripts");
    this.moveTo("INDEXING");
    let storeRef: string;
    let files: IndexedFile[];
    let summary: IndexingSummary;
    try {
      try {
        storeRef = await this.deps.store.createStore(`channel-chat: ${input.channelName ?? input.channelUrl}`);
      } catch (e) {
        throw new IndexingIncompleteError({ total: documents.length, failed: documents.length, pending: 0 }, e);
      }
      this.storeRef = storeRef;
      const submitted = await this.indexer.submit(storeRef, documents);
      this.remoteRefs = submitted.flatMap((f) => (f.remoteReference ? [f.remoteReference] : []));
      const ready = await this.indexer.awaitReady(storeRef, submitted, {
        timeoutMs: options.indexTimeoutMs,
        pollIntervalMs: options.indexPollIntervalMs,
      });
      files = ready.files;
      summary = summarizeIndexing(files);
      for (const f of files) {
        this.out(`  ${f.state === "ACTIVE" ? "+" : "-"} ${f.document.displayName} [${f.state}]${f.error ? ` ${f.error}` : ""}`);
      }
      if (ready.timedOut) this.out(`Timed out after ${options.indexTimeoutMs} ms with ${summary.pending} file(s) still processing.`);
      requireQueryable(summary);
    } catch (e) {
      return this.abort("index", e);
    }
    this.out(summary.report);

    const activeDocuments = new Map<string, string>();
    for (const f of files) {
      if (f.state === "ACTIVE" && f.remoteReference) activeDocuments.set(f.remoteReference, f.document.displayName);
    }
    this.session = createSession({
      channelIdentifier: input.channelUrl,
      activeStoreReference: storeRef,
      activeDocuments,
    });
    this.moveTo("CHATTING");
    return { state: "CHATTING", session: this.session, indexing: summary };
  }

  /** Read-answer loop; returns once the user exits or input ends. */
  async chat(prompter: Prompter, channelName?: string): Promise<void> {
    const session = this.session;
    if (this.current !== "CHATTING" || !session) throw new IllegalTransitionError(this.current, "CHATTING");

    printWelcome(this.out, channelName ?? session.channelIdentifier);
    try {
      await this.chatLoop(prompter, session);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.moveTo("ABORTED");
      this.out(`Error: chat failed: ${message}`);
      throw e;
    }

    this.out("Thanks for chatting! Goodbye!");
    this.moveTo("TERMINATED");
  }

  private async chatLoop(prompter: Prompter, session: ConversationSession) {
    for (;;) {
      const raw = await prompter.question("\nYou: ");
      if (raw === null) break;
      const cmd = parseChatCommand(raw);
      if (cmd.kind === "exit") break;
      if (cmd.kind === "empty") continue;
      if (cmd.kind === "help") {
        printHelp(this.out);
        continue;
      }
      if (cmd.kind === "history") {
        printHistory(this.out, session.orderedTurns);
        continue;
      }
      if (cmd.kind === "clear") {
        clearHistory(session);
        this.out("History cleared.");
        continue;
      }

      try {
        const turn = await this.engine.ask(session, cmd.text);
        printAnswer(this.out, turn);
      } catch (e) {
        if (!(e instanceof AnswerUnavailableError)) throw e;
        this.out(`Error: ${e.message}`);
      }
    }
  }

  /** Removes the remote store and local transcript files unless configured to keep them. */
  async dispose(): Promise<void> {
    const { options } = this.deps;
    if (this.storeRef && !options.keepRemoteStore) {
      const storeRef = this.storeRef;
      this.storeRef = null;
      try {
        await this.deps.store.deleteStore(storeRef, this.remoteRefs);
        this.out("Deleted remote knowledge store.");
      } catch (e) {
        console.error(`Failed to delete remote store ${storeRef}:`, e instanceof Error ? e.message : e);
      }
    }
    if (this.artifactPaths.length && !options.keepTranscripts) {
      const removed = await clearTranscriptFiles(this.artifactPaths);
      this.artifactPaths = [];
      this.out(`Removed ${removed} local transcript files.`);
    }
  }
}
