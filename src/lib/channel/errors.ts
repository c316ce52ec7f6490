import type { PipelineStage, SessionState } from "./types";

export class ChannelChatError extends Error {
  public readonly stage: PipelineStage;
  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChannelChatError";
    this.stage = stage;
  }
}

export class InvalidChannelInputError extends ChannelChatError {
  constructor(message: string) {
    super("input", message);
    this.name = "InvalidChannelInputError";
  }
}

export class MissingConfigError extends ChannelChatError {
  public readonly variable: string;
  constructor(variable: string) {
    super("input", `Missing ${variable}. Add it to .env.local or .env (see .env.example).`);
    this.name = "MissingConfigError";
    this.variable = variable;
  }
}

export class NoVideosFoundError extends ChannelChatError {
  public readonly channelUrl: string;
  constructor(channelUrl: string) {
    super("scrape", `No videos found for ${channelUrl}.`);
    this.name = "NoVideosFoundError";
    this.channelUrl = channelUrl;
  }
}

export class ProviderError extends ChannelChatError {
  constructor(message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super("scrape", `${message}${detail}`, { cause });
    this.name = "ProviderError";
  }
}

export class EmptyResultError extends ChannelChatError {
  public readonly scrapedCount: number;
  constructor(scrapedCount: number) {
    super(
      "materialize",
      `None of the ${scrapedCount} scraped videos has a transcript (captions may be disabled).`,
    );
    this.name = "EmptyResultError";
    this.scrapedCount = scrapedCount;
  }
}

export class IndexingIncompleteError extends ChannelChatError {
  public readonly total: number;
  public readonly failed: number;
  public readonly pending: number;
  constructor(counts: { total: number; failed: number; pending: number }, cause?: unknown) {
    const timedOut = counts.pending > 0 ? `, ${counts.pending} still processing at timeout` : "";
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(
      "index",
      `0 of ${counts.total} videos indexed (${counts.failed} failed${timedOut})${detail}.`,
      { cause },
    );
    this.name = "IndexingIncompleteError";
    this.total = counts.total;
    this.failed = counts.failed;
    this.pending = counts.pending;
  }
}

export class AnswerUnavailableError extends ChannelChatError {
  constructor(message: string, cause?: unknown) {
    super("chat", message, { cause });
    this.name = "AnswerUnavailableError";
  }
}

export class IllegalTransitionError extends Error {
  public readonly from: SessionState;
  public readonly to: SessionState;
  constructor(from: SessionState, to: SessionState) {
    super(`Illegal session transition ${from} -> ${to}.`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}
