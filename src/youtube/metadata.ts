import type { PlaylistInfo, PlaylistVideo, VideoMetadata } from "../types.js";
import type { YtDlpPlaylist, YtDlpVideo } from "../pipeline/ytdlp.js";
import { extractVideoId, watchUrl } from "./url.js";

export function toVideoMetadata(info: YtDlpVideo, videoId: string): VideoMetadata {
  return {
    videoId,
    title: info.title || "Unknown Title",
    channel: info.channel || info.uploader || "Unknown Channel",
    channelId: info.channel_id ?? null,
    uploadDate: info.upload_date ?? null,
    duration: info.duration ?? 0,
    viewCount: info.view_count ?? 0,
    likeCount: info.like_count ?? null,
    commentCount: info.comment_count ?? null,
    description: info.description || "No description available",
    thumbnailUrl: info.thumbnail ?? null,
    tags: info.tags ?? [],
    categories: info.categories ?? [],
  };
}

export function toPlaylistInfo(info: YtDlpPlaylist): PlaylistInfo {
  const entries = info.entries ?? [];
  return {
    playlistId: info.id,
    title: info.title || "Unknown Playlist",
    uploader: info.uploader || info.channel || "Unknown Channel",
    uploaderId: info.uploader_id ?? info.channel_id ?? null,
    videoCount: info.playlist_count ?? entries.filter((e) => e !== null).length,
    description: info.description ?? null,
  };
}

export function toPlaylistVideos(info: YtDlpPlaylist): PlaylistVideo[] {
  const videos: PlaylistVideo[] = [];
  (info.entries ?? []).forEach((entry, position) => {
    if (entry === null) return;
    if (typeof entry === "string") {
      const id = extractVideoId(entry) ?? entry;
      videos.push({ id, url: watchUrl(id), title: "Unknown Title", position });
      return;
    }
    const id = entry.id ?? (entry.url ? extractVideoId(entry.url) : null);
    if (!id) return;
    videos.push({ id, url: watchUrl(id), title: entry.title || "Unknown Title", position });
  });
  return videos;
}
