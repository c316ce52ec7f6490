import type { Citation, ConversationSession, ConversationTurn } from "./channel/types";
import { AnswerUnavailableError } from "./channel/errors";
import type { HistoryMessage, KnowledgeStore, RetrievedSnippet } from "./openai-file-search";
import { debugLog } from "./log";

const MAX_CITATIONS = 12;

export function createSession(opts: {
  channelIdentifier: string;
  activeStoreReference: string;
  activeDocuments: ReadonlyMap<string, string>;
}): ConversationSession {
  return { ...opts, orderedTurns: [] };
}

/** Empties the turn history; the store reference stays. */
export function clearHistory(session: ConversationSession) {
  session.orderedTurns.length = 0;
}

function historyForContext(turns: readonly ConversationTurn[], maxTurns: number): HistoryMessage[] {
  const usable = turns.filter((t) => !t.error && t.text.trim());
  return usable.slice(-maxTurns).map((t) => ({
    role: t.role === "USER" ? ("user" as const) : ("assistant" as const),
    content: t.text,
  }));
}

function resolveDisplayName(s: RetrievedSnippet, active: ReadonlyMap<string, string>): string | null {
  if (s.fileReference) return active.get(s.fileReference) ?? null;
  if (!s.fileName) return null;
  // No file reference: accept only an exact file-name match.
  for (const displayName of active.values()) {
    if (s.fileName === `${displayName}.txt` || s.fileName === displayName) return displayName;
  }
  return null;
}

export function toCitations(snippets: readonly RetrievedSnippet[], active: ReadonlyMap<string, string>): Citation[] {
  const uniq = new Map<string, Citation>();
  for (const s of snippets) {
    const displayName = resolveDisplayName(s, active);
    const excerpt = s.text.trim();
    if (!displayName || !excerpt) continue;
    const key = `${displayName}:${excerpt.slice(0, 120)}`;
    if (uniq.has(key)) continue;
    uniq.set(key, { documentDisplayName: displayName, excerpt });
  }
  return Array.from(uniq.values()).slice(0, MAX_CITATIONS);
}

export class ConversationEngine {
  private readonly store: KnowledgeStore;
  private readonly maxContextTurns: number;

  constructor(store: KnowledgeStore, opts: { maxContextTurns?: number } = {}) {
    this.store = store;
    this.maxContextTurns = opts.maxContextTurns ?? 20;
  }

  /**
   * Asks one question against the session's store and returns the ASSISTANT turn.
   *
   * On failure the ASSISTANT turn is still recorded, with `error` set, and
   * `AnswerUnavailableError` is thrown; the session remains usable.
   */
  async ask(session: ConversationSession, userText: string): Promise<ConversationTurn> {
    const prompt = userText.trim();
    const history = historyForContext(session.orderedTurns, this.maxContextTurns);
    session.orderedTurns.push({ role: "USER", text: prompt, citations: [] });

    const startedAt = Date.now();
    let answer: string;
    let citations: Citation[];
    try {
      const res = await this.store.query({ storeRef: session.activeStoreReference, prompt, history });
      answer = res.answer.trim();
      citations = toCitations(res.snippets, session.activeDocuments);
      debugLog("chat", "done", { ms: Date.now() - startedAt, snippets: res.snippets.length, citations: citations.length });
    } catch (e) {
      const message = e instanceof Error ? e.message : "Unknown error.";
      session.orderedTurns.push({ role: "ASSISTANT", text: "", citations: [], error: message });
      throw new AnswerUnavailableError(`Answer unavailable: ${message}`, e);
    }

    if (!answer) {
      const message = "The answering service returned no content.";
      session.orderedTurns.push({ role: "ASSISTANT", text: "", citations: [], error: message });
      throw new AnswerUnavailableError(message);
    }

    const turn: ConversationTurn = { role: "ASSISTANT", text: answer, citations };
    session.orderedTurns.push(turn);
    return turn;
  }
}
