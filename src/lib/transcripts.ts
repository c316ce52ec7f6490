import fs from "node:fs/promises";
import path from "node:path";
import type { TranscriptDocument, VideoRecord } from "./channel/types";
import { debugLog } from "./log";

export type MaterializeResult =
  | { kind: "documents"; documents: TranscriptDocument[]; skipped: VideoRecord[] }
  | { kind: "empty"; skipped: VideoRecord[] };

const MAX_NAME_LENGTH = 100;
const RULE = "=".repeat(80);

export function sanitizeFileName(name: string) {
  const cleaned = name
    .replace(/[<>:"/\\|?*\u0000-\u001F]/g, "")
    .replace(/\s+/g, "_")
    .slice(0, MAX_NAME_LENGTH)
    .replace(/[._]+$/, "");
  return cleaned || "video";
}

// `taken` holds lower-cased names: "Intro.txt" and "intro.txt" are one file on macOS and Windows.
function uniqueName(base: string, sourceId: string, taken: Set<string>) {
  const isTaken = (name: string) => taken.has(name.toLowerCase());
  if (!isTaken(base)) return base;
  const withId = sourceId ? `${base}_${sanitizeFileName(sourceId)}` : base;
  if (!isTaken(withId)) return withId;
  let n = 2;
  while (isTaken(`${withId}_${n}`)) n += 1;
  return `${withId}_${n}`;
}

export function formatTranscriptBody(video: VideoRecord, transcript: string) {
  const views = video.viewCount != null ? video.viewCount.toLocaleString("en-US") : "N/A";
  return [
    RULE,
    `VIDEO: ${video.title}`,
    RULE,
    `URL: ${video.sourceUrl || "N/A"}`,
    `Video ID: ${video.id || "N/A"}`,
    `Duration: ${video.duration ?? "N/A"}`,
    `Views: ${views}`,
    RULE,
    "",
    "DESCRIPTION:",
    video.description?.trim() || "No description available",
    "",
    RULE,
    "",
    "TRANSCRIPT:",
    transcript,
    "",
    RULE,
  ].join("\n");
}

/**
 * Turns scraped videos into one document per captioned video, in input order.
 * Display names are unique within the batch.
 */
export function materialize(records: readonly VideoRecord[]): MaterializeResult {
  const documents: TranscriptDocument[] = [];
  const skipped: VideoRecord[] = [];
  const taken = new Set<string>();

  for (const video of records) {
    const transcript = video.transcriptText?.trim() ?? "";
    if (!transcript) {
      skipped.push(video);
      continue;
    }
    const displayName = uniqueName(sanitizeFileName(video.title), video.id, taken);
    taken.add(displayName.toLowerCase());
    documents.push(
      Object.freeze({
        sourceVideoId: video.id,
        displayName,
        fileName: `${displayName}.txt`,
        body: formatTranscriptBody(video, transcript),
      }),
    );
  }

  debugLog("materialize", "done", { input: records.length, documents: documents.length, skipped: skipped.length });
  if (documents.length === 0 && records.length > 0) return { kind: "empty", skipped };
  return { kind: "documents", documents, skipped };
}

export async function writeTranscriptFiles(dir: string, documents: readonly TranscriptDocument[]) {
  await fs.mkdir(dir, { recursive: true });
  const paths: string[] = [];
  try {
    for (const doc of documents) {
      const p = path.join(dir, doc.fileName);
      await fs.writeFile(p, doc.body, "utf8");
      paths.push(p);
    }
  } catch (e) {
    // A partial write set is never handed back, so remove it before failing.
    await clearTranscriptFiles(paths).catch((cleanupError: unknown) => {
      debugLog("materialize", "cleanup after failed write failed", {
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw e;
  }
  return paths;
}

export async function clearTranscriptFiles(paths: readonly string[]) {
  let removed = 0;
  for (const p of paths) {
    try {
      await fs.unlink(p);
      removed += 1;
    } catch (e) {
      if (e instanceof Error && "code" in e && (e as { code?: unknown }).code === "ENOENT") continue;
      throw e;
    }
  }
  return removed;
}
