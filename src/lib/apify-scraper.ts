import { ApifyClient } from "apify-client";
import { z } from "zod";
import type { VideoRecord } from "./channel/types";
import { InvalidChannelInputError, NoVideosFoundError, ProviderError } from "./channel/errors";
import { debugLog } from "./log";

export type ChannelScrapeRequest = {
  channelUrl: string;
  maxResults: number;
};

/** Anything that can list a channel's videos newest-first. Items are validated downstream. */
export interface ScrapingProvider {
  scrapeChannel(req: ChannelScrapeRequest): Promise<unknown[]>;
}

export class ApifyScrapingProvider implements ScrapingProvider {
  private readonly client: ApifyClient;
  private readonly actorId: string;

  constructor(opts: { token: string; actorId?: string; client?: ApifyClient }) {
    this.client = opts.client ?? new ApifyClient({ token: opts.token });
    this.actorId = opts.actorId ?? "streamers/youtube-scraper";
  }

  async scrapeChannel(req: ChannelScrapeRequest): Promise<unknown[]> {
    const run = await this.client.actor(this.actorId).call({
      startUrls: [{ url: req.channelUrl }],
      maxResults: req.maxResults,
      searchType: "channel",
      includeSubtitles: true,
    });
    if (run.status !== "SUCCEEDED") {
      throw new Error(`Actor run ${run.id} finished with status ${run.status}`);
    }
    const { items } = await this.client.dataset(run.defaultDatasetId).listItems();
    return items;
  }
}

const SubtitleSchema = z.union([
  z.string(),
  z.object({ text: z.string().optional(), srt: z.string().optional() }).passthrough(),
]);

const ScrapedItemSchema = z.object({
  id: z.string().nullish().transform((v) => v?.trim() ?? ""),
  title: z.string().nullish().transform((v) => v?.trim() || "Untitled"),
  url: z.string().nullish().transform((v) => v ?? ""),
  description: z.string().nullish().transform((v) => v ?? ""),
  duration: z.unknown().transform((v) => (typeof v === "string" && v.trim() ? v.trim() : undefined)),
  viewCount: z.unknown().transform((v) => (typeof v === "number" && Number.isFinite(v) ? v : undefined)),
  subtitles: z.array(SubtitleSchema).nullish(),
});

const SINGLE_VIDEO_PATTERNS = [/[?&]v=/, /youtu\.be\//i, /\/shorts\//i, /\/embed\//i, /\/live\//i];

export function assertChannelUrl(channelUrl: string) {
  const url = channelUrl.trim();
  if (!url) throw new InvalidChannelInputError("Channel URL cannot be empty.");
  if (!/(^|\.|\/\/)(youtube\.com|youtu\.be)(\/|$)/i.test(url)) {
    throw new InvalidChannelInputError(`Not a YouTube URL: ${url}`);
  }
  if (SINGLE_VIDEO_PATTERNS.some((re) => re.test(url))) {
    throw new InvalidChannelInputError(`${url} points at a single video, not a channel.`);
  }
}

function stripSrt(srt: string): string {
  return srt
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l && !/^\d+$/.test(l) && !/-->/.test(l))
    .join(" ");
}

export function flattenSubtitles(subtitles: z.infer<typeof SubtitleSchema>[] | null | undefined): string {
  if (!subtitles?.length) return "";
  const parts: string[] = [];
  for (const s of subtitles) {
    if (typeof s === "string") {
      if (s.trim()) parts.push(s.trim());
      continue;
    }
    const text = s.text?.trim() || (s.srt ? stripSrt(s.srt) : "");
    if (text) parts.push(text);
  }
  return parts.join(" ").trim();
}

/**
 * Scrapes up to `count` videos from a channel, newest first.
 *
 * Provider order is kept as-is and becomes `recencyRank` (1-based); nothing downstream re-sorts.
 * Videos without captions are returned with no `transcriptText`.
 */
export async function fetchChannelVideos(
  provider: ScrapingProvider,
  channelUrl: string,
  count: number,
): Promise<VideoRecord[]> {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidChannelInputError(`Video count must be a positive integer (got ${count}).`);
  }
  assertChannelUrl(channelUrl);

  let rawItems: unknown[];
  try {
    rawItems = await provider.scrapeChannel({ channelUrl: channelUrl.trim(), maxResults: count });
  } catch (e) {
    throw new ProviderError("Scraping provider request failed", e);
  }

  const records: VideoRecord[] = [];
  for (const raw of rawItems) {
    if (records.length >= count) break;
    const parsed = ScrapedItemSchema.safeParse(raw);
    if (!parsed.success) {
      debugLog("scrape", "skipping malformed item", { issues: parsed.error.issues.length });
      continue;
    }
    const item = parsed.data;
    const transcript = flattenSubtitles(item.subtitles);
    records.push({
      id: item.id,
      title: item.title,
      sourceUrl: item.url,
      recencyRank: records.length + 1,
      transcriptText: transcript || undefined,
      description: item.description || undefined,
      duration: item.duration,
      viewCount: item.viewCount,
    });
  }

  debugLog("scrape", "done", { channelUrl, requested: count, received: rawItems.length, kept: records.length });
  if (records.length === 0) throw new NoVideosFoundError(channelUrl);
  return records;
}
