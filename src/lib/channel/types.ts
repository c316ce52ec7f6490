export type VideoRecord = {
  id: string;
  title: string;
  sourceUrl: string;
  // 1 = newest video on the channel.
  recencyRank: number;
  transcriptText?: string;
  description?: string;
  duration?: string;
  viewCount?: number;
};

export type TranscriptDocument = Readonly<{
  sourceVideoId: string;
  displayName: string;
  fileName: string;
  body: string;
}>;

export type IndexedFileState = "PENDING" | "ACTIVE" | "FAILED";

export type IndexedFile = Readonly<{
  document: TranscriptDocument;
  remoteReference?: string;
  state: IndexedFileState;
  error?: string;
}>;

export type Citation = {
  documentDisplayName: string;
  excerpt: string;
};

export type TurnRole = "USER" | "ASSISTANT";

export type ConversationTurn = {
  role: TurnRole;
  text: string;
  citations: Citation[];
  // Set on ASSISTANT turns whose answer could not be produced.
  error?: string;
};

export type ConversationSession = {
  channelIdentifier: string;
  orderedTurns: ConversationTurn[];
  activeStoreReference: string;
  // remote reference -> displayName, ACTIVE files only
  activeDocuments: ReadonlyMap<string, string>;
};

export type SessionState =
  | "COLLECTING_INPUT"
  | "SCRAPING"
  | "MATERIALIZING"
  | "INDEXING"
  | "CHATTING"
  | "TERMINATED"
  | "ABORTED";

export type PipelineStage = "input" | "scrape" | "materialize" | "index" | "chat";
