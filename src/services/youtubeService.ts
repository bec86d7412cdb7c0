import { InvalidUrlError, PlaylistUnavailableError, errorMessage } from "../errors.js";
import { TranscriptFetcher } from "../pipeline/captions.js";
import { YtDlpClient, type YtDlpVideo } from "../pipeline/ytdlp.js";
import type {
  PlaylistDetails,
  PlaylistVideo,
  ResolvedUrl,
  TranscriptOptions,
  TranscriptResult,
  VideoInfo,
  VideoMetadata,
} from "../types.js";
import type { Logger } from "../utils/logger.js";
import {
  toApiV3Playlist,
  toApiV3PlaylistItem,
  toApiV3Video,
  type ApiV3Playlist,
  type ApiV3PlaylistItem,
  type ApiV3Video,
} from "../youtube/apiV3.js";
import { toPlaylistInfo, toPlaylistVideos, toVideoMetadata } from "../youtube/metadata.js";
import { extractPlaylistId, extractVideoId, isPlaylistUrl, watchUrl } from "../youtube/url.js";

export interface YouTubeServiceDeps {
  ytdlp: YtDlpClient;
  transcripts: TranscriptFetcher;
  logger: Logger;
}

export class YouTubeService {
  constructor(private readonly deps: YouTubeServiceDeps) {}

  extractVideoId(url: string): string | null {
    return extractVideoId(url);
  }

  isPlaylistUrl(url: string): boolean {
    return isPlaylistUrl(url);
  }

  async getVideoMetadata(videoId: string): Promise<VideoMetadata> {
    const info = await this.deps.ytdlp.fetchVideoInfo(watchUrl(videoId));
    return toVideoMetadata(info, videoId);
  }

  async getVideoResource(videoId: string): Promise<ApiV3Video> {
    return toApiV3Video(await this.deps.ytdlp.fetchVideoInfo(watchUrl(videoId)));
  }

  /** Looks up caption tracks first; if that fails only the fallback source is tried. */
  async getTranscript(videoId: string, opts: TranscriptOptions): Promise<TranscriptResult> {
    let info: YtDlpVideo | null = null;
    try {
      info = await this.deps.ytdlp.fetchVideoInfo(watchUrl(videoId));
    } catch (err) {
      this.deps.logger.warn({ videoId, err: errorMessage(err) }, "caption discovery failed, using fallback");
    }
    return this.deps.transcripts.fetch(videoId, info, opts);
  }

  async getVideoInfo(url: string, opts: TranscriptOptions): Promise<VideoInfo> {
    const videoId = extractVideoId(url);
    if (!videoId) throw new InvalidUrlError(url);

    const info = await this.deps.ytdlp.fetchVideoInfo(watchUrl(videoId));
    const metadata = toVideoMetadata(info, videoId);
    const transcript = await this.deps.transcripts.fetch(videoId, info, opts);
    this.deps.logger.info(
      { videoId, entries: transcript.entries.length, language: transcript.language },
      "video info collected",
    );
    return {
      videoId,
      metadata,
      transcript: transcript.entries,
      transcriptLanguage: transcript.language,
    };
  }

  async getPlaylistInfo(url: string): Promise<PlaylistDetails | null> {
    try {
      const raw = await this.deps.ytdlp.fetchPlaylistInfo(url);
      if (raw._type !== "playlist") {
        this.deps.logger.warn({ url, type: raw._type }, "URL did not resolve to a playlist");
        return null;
      }
      const details = { info: toPlaylistInfo(raw), videos: toPlaylistVideos(raw) };
      this.deps.logger.info({ playlistId: details.info.playlistId, videos: details.videos.length }, "playlist loaded");
      return details;
    } catch (err) {
      this.deps.logger.error({ url, err: errorMessage(err) }, "failed to read playlist");
      return null;
    }
  }

  async getPlaylistVideos(url: string, maxVideos?: number): Promise<PlaylistVideo[]> {
    const details = await this.getPlaylistInfo(url);
    if (!details) throw new PlaylistUnavailableError(url);
    return maxVideos && maxVideos > 0 ? details.videos.slice(0, maxVideos) : details.videos;
  }

  async getPlaylistResource(
    url: string,
    maxVideos?: number,
  ): Promise<{ playlist: ApiV3Playlist; items: ApiV3PlaylistItem[] }> {
    const raw = await this.deps.ytdlp.fetchPlaylistInfo(url).catch((err: unknown) => {
      this.deps.logger.error({ url, err: errorMessage(err) }, "failed to read playlist");
      throw new PlaylistUnavailableError(url);
    });
    if (raw._type !== "playlist") throw new PlaylistUnavailableError(url);

    const playlistId = extractPlaylistId(url) ?? raw.id;
    const videos = toPlaylistVideos(raw);
    const limited = maxVideos && maxVideos > 0 ? videos.slice(0, maxVideos) : videos;
    return {
      playlist: toApiV3Playlist(raw),
      items: limited.map((v) => toApiV3PlaylistItem(v, playlistId)),
    };
  }

  /** Classifies a URL and lists the videos it covers. */
  async resolveUrl(url: string): Promise<ResolvedUrl> {
    if (isPlaylistUrl(url)) {
      const details = await this.getPlaylistInfo(url);
      if (details) {
        return { type: "playlist", videos: details.videos, playlistInfo: details.info };
      }
    }
    const videoId = extractVideoId(url);
    if (videoId) {
      return {
        type: "video",
        videos: [{ id: videoId, url: watchUrl(videoId), title: "", position: 0 }],
        playlistInfo: null,
      };
    }
    return { type: "unknown", videos: [], playlistInfo: null };
  }
}
