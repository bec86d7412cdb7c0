/**
 * Maps yt-dlp output onto YouTube Data API v3 resource shapes
 * (https://developers.google.com/youtube/v3/docs) for clients that already
 * speak that format.
 */
import type { PlaylistVideo } from "../types.js";
import type { YtDlpPlaylist, YtDlpVideo } from "../pipeline/ytdlp.js";

export interface Thumbnail {
  url: string;
  width: number | null;
  height: number | null;
}

export interface ApiV3Video {
  kind: "youtube#video";
  id: string;
  snippet: {
    publishedAt: string | null;
    channelId: string;
    title: string;
    description: string;
    channelTitle: string;
    categoryId: string;
    tags: string[];
    defaultLanguage: string | null;
    thumbnails: Record<string, Thumbnail>;
  };
  contentDetails: {
    duration: string;
    dimension: "2d";
    definition: string;
    caption: "true" | "false";
  };
  statistics: {
    viewCount: string;
    likeCount?: string;
    commentCount?: string;
  };
}

export interface ApiV3Playlist {
  kind: "youtube#playlist";
  id: string;
  snippet: {
    publishedAt: null;
    channelId: string;
    title: string;
    description: string | null;
    channelTitle: string;
  };
  contentDetails: { itemCount: number };
}

export interface ApiV3PlaylistItem {
  kind: "youtube#playlistItem";
  id: string;
  snippet: {
    publishedAt: null;
    title: string;
    playlistId: string;
    position: number;
    resourceId: { kind: "youtube#video"; videoId: string };
  };
  contentDetails: { videoId: string; videoPublishedAt: null };
}

/** 3730 -> `PT1H2M10S`; zero or missing -> `PT0S`. */
export function durationToIso8601(seconds: number | null | undefined): string {
  const total = seconds && seconds > 0 ? Math.floor(seconds) : 0;
  if (total === 0) return "PT0S";
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  let out = "PT";
  if (h > 0) out += `${h}H`;
  if (m > 0) out += `${m}M`;
  if (s > 0) out += `${s}S`;
  return out;
}

export function parseIso8601Duration(duration: string): number {
  if (!duration.startsWith("PT")) return 0;
  const part = (unit: string) => {
    const match = new RegExp(`(\\d+)${unit}`).exec(duration);
    return match ? parseInt(match[1], 10) : 0;
  };
  return part("H") * 3600 + part("M") * 60 + part("S");
}

export function uploadDateToIso8601(uploadDate: string | null | undefined): string | null {
  if (!uploadDate) return null;
  if (/^\d{8}$/.test(uploadDate)) {
    return `${uploadDate.slice(0, 4)}-${uploadDate.slice(4, 6)}-${uploadDate.slice(6, 8)}T00:00:00Z`;
  }
  return uploadDate.includes("T") ? uploadDate : null;
}

function thumbnailsOf(info: YtDlpVideo): Record<string, Thumbnail> {
  const out: Record<string, Thumbnail> = {};
  if (info.thumbnails?.length) {
    for (const t of info.thumbnails) {
      out[t.id ?? "default"] = { url: t.url, width: t.width ?? null, height: t.height ?? null };
    }
  } else if (info.thumbnail) {
    out.default = { url: info.thumbnail, width: null, height: null };
  }
  return out;
}

export function toApiV3Video(info: YtDlpVideo): ApiV3Video {
  const statistics: ApiV3Video["statistics"] = { viewCount: String(info.view_count ?? 0) };
  if (info.like_count != null) statistics.likeCount = String(info.like_count);
  if (info.comment_count != null) statistics.commentCount = String(info.comment_count);

  return {
    kind: "youtube#video",
    id: info.id,
    snippet: {
      publishedAt: uploadDateToIso8601(info.upload_date),
      channelId: info.channel_id ?? "",
      title: info.title || "Unknown Title",
      description: info.description || "No description available",
      channelTitle: info.channel || info.uploader || "Unknown Channel",
      categoryId: info.categories?.[0] ?? "0",
      tags: info.tags ?? [],
      defaultLanguage: info.language ?? null,
      thumbnails: thumbnailsOf(info),
    },
    contentDetails: {
      duration: durationToIso8601(info.duration),
      dimension: "2d",
      definition: (info.format_note ?? "sd").toLowerCase(),
      caption: info.subtitles && Object.keys(info.subtitles).length > 0 ? "true" : "false",
    },
    statistics,
  };
}

export function toApiV3Playlist(info: YtDlpPlaylist): ApiV3Playlist {
  return {
    kind: "youtube#playlist",
    id: info.id,
    snippet: {
      publishedAt: null,
      channelId: info.uploader_id ?? info.channel_id ?? "",
      title: info.title || "Unknown Playlist",
      description: info.description ?? null,
      channelTitle: info.uploader || info.channel || "Unknown Channel",
    },
    contentDetails: { itemCount: info.playlist_count ?? 0 },
  };
}

export function toApiV3PlaylistItem(video: PlaylistVideo, playlistId: string): ApiV3PlaylistItem {
  return {
    kind: "youtube#playlistItem",
    id: `${playlistId}_${video.id}`,
    snippet: {
      publishedAt: null,
      title: video.title,
      playlistId,
      position: video.position,
      resourceId: { kind: "youtube#video", videoId: video.id },
    },
    contentDetails: { videoId: video.id, videoPublishedAt: null },
  };
}
