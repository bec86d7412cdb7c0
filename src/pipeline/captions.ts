import { fetch } from "undici";
import { z } from "zod";
import type { TranscriptEntry, TranscriptOptions, TranscriptResult } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { formatTimestamp } from "../utils/time.js";
import { errorMessage } from "../errors.js";
import type { CaptionTrack, YtDlpVideo } from "./ytdlp.js";

export type FetchFn = (url: string) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface TranscriptApiItem {
  text: string;
  /** Milliseconds. */
  offset: number;
  /** Milliseconds. */
  duration: number;
  lang?: string;
}

/** Shape of `YoutubeTranscript.fetchTranscript`. */
export type TranscriptApi = (videoId: string, config?: { lang?: string }) => Promise<TranscriptApiItem[]>;

export const defaultTranscriptApi: TranscriptApi = async (videoId, config) => {
  const { YoutubeTranscript } = await import("youtube-transcript");
  return YoutubeTranscript.fetchTranscript(videoId, config);
};

export interface SelectedTrack {
  url: string;
  language: string;
  isGenerated: boolean;
}

type TrackMap = Record<string, CaptionTrack[]>;

function baseLang(code: string): string {
  return code.split("-")[0].toLowerCase();
}

function json3Url(tracks: CaptionTrack[] | undefined): string | null {
  return tracks?.find((t) => t.ext === "json3")?.url ?? null;
}

function matchLanguage(keys: string[], lang: string): string | undefined {
  return keys.find((k) => k === lang) ?? keys.find((k) => baseLang(k) === baseLang(lang));
}

/**
 * Chooses a json3 caption track from yt-dlp's `subtitles` (manual) and
 * `automatic_captions` (generated) maps.
 */
export function pickCaptionTrack(
  info: Pick<YtDlpVideo, "subtitles" | "automatic_captions">,
  languages: string[],
  preferManual: boolean,
): SelectedTrack | null {
  const manual: TrackMap = { ...info.subtitles };
  delete manual.live_chat;
  const generated: TrackMap = { ...info.automatic_captions };

  const kinds: Array<{ tracks: TrackMap; isGenerated: boolean }> = preferManual
    ? [{ tracks: manual, isGenerated: false }, { tracks: generated, isGenerated: true }]
    : [{ tracks: generated, isGenerated: true }, { tracks: manual, isGenerated: false }];

  for (const { tracks, isGenerated } of kinds) {
    const keys = Object.keys(tracks).filter((k) => json3Url(tracks[k]));
    for (const lang of languages) {
      const key = matchLanguage(keys, lang);
      const url = key ? json3Url(tracks[key]) : null;
      if (key && url) return { url, language: key, isGenerated };
    }
  }

  for (const [language, tracks] of Object.entries(manual)) {
    const url = json3Url(tracks);
    if (url) return { url, language, isGenerated: false };
  }
  for (const [key, tracks] of Object.entries(generated)) {
    const url = key.endsWith("-orig") ? json3Url(tracks) : null;
    if (url) return { url, language: key.slice(0, -"-orig".length), isGenerated: true };
  }
  return null;
}

const Json3Schema = z.object({
  events: z
    .array(
      z.object({
        tStartMs: z.number().optional(),
        dDurationMs: z.number().optional(),
        segs: z.array(z.object({ utf8: z.string().optional() })).optional(),
      }),
    )
    .default([]),
});

/** Parses YouTube's json3 timed-text format. */
export function parseJson3(raw: string): TranscriptEntry[] {
  const data = Json3Schema.parse(JSON.parse(raw));
  const entries: TranscriptEntry[] = [];
  for (const event of data.events) {
    if (!event.segs) continue;
    const text = event.segs
      .map((s) => s.utf8 ?? "")
      .join("")
      .replace(/\s*\n+\s*/g, " ")
      .trim();
    if (!text) continue;
    const start = (event.tStartMs ?? 0) / 1000;
    entries.push({
      start,
      duration: (event.dDurationMs ?? 0) / 1000,
      text,
      timestamp: formatTimestamp(start),
    });
  }
  return entries;
}

const MAX_CODE_POINT = 0x10ffff;

/**
 * Decodes numeric character references (`&#39;`, `&#x27;`) left over from
 * YouTube's double encoding. Named entities are kept as they are.
 */
export function decodeCharacterReferences(text: string): string {
  return text.replace(/&#(?:x([0-9a-f]+)|(\d+));/gi, (match, hex: string | undefined, dec: string | undefined) => {
    const code = hex !== undefined ? parseInt(hex, 16) : parseInt(dec ?? "", 10);
    return Number.isInteger(code) && code >= 0 && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
  });
}

export interface TranscriptFetcherOptions {
  fetchFn?: FetchFn;
  transcriptApi?: TranscriptApi;
  logger?: Logger;
}

export class TranscriptFetcher {
  private readonly fetchFn: FetchFn;
  private readonly transcriptApi: TranscriptApi;
  private readonly logger?: Logger;

  constructor(opts: TranscriptFetcherOptions = {}) {
    this.fetchFn = opts.fetchFn ?? ((url) => fetch(url));
    this.transcriptApi = opts.transcriptApi ?? defaultTranscriptApi;
    this.logger = opts.logger;
  }

  /**
   * Tries the caption track yt-dlp reported, then the youtube-transcript
   * package for each language and finally with no language hint.
   */
  async fetch(
    videoId: string,
    info: Pick<YtDlpVideo, "subtitles" | "automatic_captions"> | null,
    opts: TranscriptOptions,
  ): Promise<TranscriptResult> {
    const track = info ? pickCaptionTrack(info, opts.languages, opts.preferManual) : null;
    if (track) {
      try {
        const entries = await this.downloadTrack(track.url);
        if (entries.length) {
          this.logger?.info({ videoId, language: track.language, isGenerated: track.isGenerated }, "transcript fetched");
          return { entries, language: track.language, isGenerated: track.isGenerated, source: "yt-dlp" };
        }
      } catch (err) {
        this.logger?.warn({ videoId, err: errorMessage(err) }, "caption track download failed");
      }
    }

    const attempts: Array<string | undefined> = [...opts.languages, undefined];
    for (const lang of attempts) {
      try {
        const items = await this.transcriptApi(videoId, lang ? { lang } : undefined);
        const entries = items
          .map((item) => {
            const start = item.offset / 1000;
            return {
              start,
              duration: item.duration / 1000,
              text: decodeCharacterReferences(item.text).replace(/\s*\n+\s*/g, " ").trim(),
              timestamp: formatTimestamp(start),
            };
          })
          .filter((e) => e.text);
        if (entries.length) {
          const language = lang ?? items[0]?.lang ?? null;
          this.logger?.info({ videoId, language }, "transcript fetched via fallback");
          return { entries, language, isGenerated: null, source: "youtube-transcript" };
        }
      } catch (err) {
        this.logger?.debug({ videoId, lang, err: errorMessage(err) }, "fallback transcript lookup failed");
      }
    }

    this.logger?.warn({ videoId }, "no transcript available");
    return { entries: [], language: null, isGenerated: null, source: "none" };
  }

  private async downloadTrack(url: string): Promise<TranscriptEntry[]> {
    const res = await this.fetchFn(url);
    if (!res.ok) {
      throw new Error(`caption download failed: HTTP ${res.status}`);
    }
    return parseJson3(await res.text());
  }
}
