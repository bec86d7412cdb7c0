export interface TranscriptEntry {
  /** Offset from the start of the video, in seconds. */
  start: number;
  /** Seconds the caption stays on screen. */
  duration: number;
  text: string;
  /** `start` rendered as MM:SS or HH:MM:SS. */
  timestamp: string;
}

export interface VideoMetadata {
  videoId: string;
  title: string;
  channel: string;
  channelId: string | null;
  /** yt-dlp style YYYYMMDD. */
  uploadDate: string | null;
  /** Length in seconds. */
  duration: number;
  viewCount: number;
  likeCount: number | null;
  commentCount: number | null;
  description: string;
  thumbnailUrl: string | null;
  tags: string[];
  categories: string[];
}

export interface TranscriptResult {
  entries: TranscriptEntry[];
  /** Language code of the track actually used, when known. */
  language: string | null;
  /** True for auto-generated captions, null when the source cannot tell. */
  isGenerated: boolean | null;
  source: "yt-dlp" | "youtube-transcript" | "none";
}

export interface VideoInfo {
  videoId: string;
  metadata: VideoMetadata;
  transcript: TranscriptEntry[];
  transcriptLanguage: string | null;
}

export interface TranscriptOptions {
  /** Caption languages in priority order. */
  languages: string[];
  preferManual: boolean;
}

export interface PlaylistInfo {
  playlistId: string;
  title: string;
  uploader: string;
  uploaderId: string | null;
  videoCount: number;
  description: string | null;
}

export interface PlaylistVideo {
  id: string;
  url: string;
  title: string;
  /** 0-based index in the playlist. */
  position: number;
}

export interface PlaylistDetails {
  info: PlaylistInfo;
  videos: PlaylistVideo[];
}

export type UrlKind = "video" | "playlist" | "unknown";

export interface ResolvedUrl {
  type: UrlKind;
  videos: PlaylistVideo[];
  playlistInfo: PlaylistInfo | null;
}

export interface AiExtras {
  summary?: string | null;
  translation?: string | null;
  keyTopics?: string[] | null;
}
