import { z } from "zod";
import { runCommand, type CommandRunner } from "../utils/process.js";
import type { Logger } from "../utils/logger.js";

export const CaptionTrackSchema = z
  .object({
    ext: z.string().nullish(),
    url: z.string(),
    name: z.string().nullish(),
  })
  .passthrough();

const ThumbnailSchema = z
  .object({
    id: z.string().nullish(),
    url: z.string(),
    width: z.number().nullish(),
    height: z.number().nullish(),
  })
  .passthrough();

const TrackMapSchema = z.record(z.array(CaptionTrackSchema));

export const YtDlpVideoSchema = z
  .object({
    id: z.string(),
    _type: z.string().nullish(),
    title: z.string().nullish(),
    channel: z.string().nullish(),
    channel_id: z.string().nullish(),
    uploader: z.string().nullish(),
    uploader_id: z.string().nullish(),
    upload_date: z.string().nullish(),
    duration: z.number().nullish(),
    view_count: z.number().nullish(),
    like_count: z.number().nullish(),
    comment_count: z.number().nullish(),
    description: z.string().nullish(),
    thumbnail: z.string().nullish(),
    thumbnails: z.array(ThumbnailSchema).nullish(),
    language: z.string().nullish(),
    format_note: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    categories: z.array(z.string()).nullish(),
    subtitles: TrackMapSchema.nullish(),
    automatic_captions: TrackMapSchema.nullish(),
  })
  .passthrough();

const PlaylistEntrySchema = z
  .object({
    id: z.string().nullish(),
    url: z.string().nullish(),
    title: z.string().nullish(),
  })
  .passthrough();

export const YtDlpPlaylistSchema = z
  .object({
    id: z.string(),
    _type: z.string().nullish(),
    title: z.string().nullish(),
    uploader: z.string().nullish(),
    uploader_id: z.string().nullish(),
    channel: z.string().nullish(),
    channel_id: z.string().nullish(),
    description: z.string().nullish(),
    playlist_count: z.number().nullish(),
    modified_date: z.string().nullish(),
    entries: z.array(z.union([PlaylistEntrySchema, z.string(), z.null()])).nullish(),
  })
  .passthrough();

export type CaptionTrack = z.infer<typeof CaptionTrackSchema>;
export type YtDlpVideo = z.infer<typeof YtDlpVideoSchema>;
export type YtDlpPlaylist = z.infer<typeof YtDlpPlaylistSchema>;
export type YtDlpPlaylistEntry = z.infer<typeof PlaylistEntrySchema>;

const BASE_ARGS = ["--dump-single-json", "--skip-download", "--no-warnings"];

export interface YtDlpClientOptions {
  command?: string;
  timeoutMs?: number;
  run?: CommandRunner;
  logger?: Logger;
}

export class YtDlpClient {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly logger?: Logger;

  constructor(opts: YtDlpClientOptions = {}) {
    this.command = opts.command ?? "yt-dlp";
    this.timeoutMs = opts.timeoutMs ?? 60000;
    this.run = opts.run ?? runCommand;
    this.logger = opts.logger;
  }

  async fetchVideoInfo(url: string): Promise<YtDlpVideo> {
    const json = await this.dumpJson([...BASE_ARGS, url]);
    const parsed = YtDlpVideoSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`yt-dlp returned unexpected video info: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  async fetchPlaylistInfo(url: string): Promise<YtDlpPlaylist> {
    const json = await this.dumpJson([...BASE_ARGS, "--flat-playlist", url]);
    const parsed = YtDlpPlaylistSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`yt-dlp returned unexpected playlist info: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private async dumpJson(args: string[]): Promise<unknown> {
    this.logger?.debug({ args }, "running yt-dlp");
    const { stdout } = await this.run(this.command, args, { timeoutMs: this.timeoutMs });
    try {
      const json: unknown = JSON.parse(stdout);
      return json;
    } catch (err) {
      throw new Error(`yt-dlp output is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
