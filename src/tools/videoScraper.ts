import { DEFAULT_LANGUAGES } from "../constants.js";
import { InvalidUrlError } from "../errors.js";
import type { YouTubeService } from "../services/youtubeService.js";
import type { TranscriptEntry, VideoInfo, VideoMetadata } from "../types.js";
import type { ToolSchema } from "./schema.js";

export interface VideoScraperArgs {
  videoUrl: string;
  languages?: string[];
  preferManual?: boolean;
}

export class VideoScraperTool {
  static readonly schema: ToolSchema = {
    type: "function",
    function: {
      name: "video_scraper",
      description:
        "Extracts metadata and a timestamped transcript from a YouTube video: title, description, view count and captions.",
      parameters: {
        type: "object",
        properties: {
          video_url: { type: "string", description: "YouTube video URL" },
          languages: {
            type: "array",
            items: { type: "string" },
            description: "Caption languages in priority order, e.g. ['ko', 'en']",
            default: [...DEFAULT_LANGUAGES],
          },
          prefer_manual: {
            type: "boolean",
            description: "Prefer manually created captions over auto-generated ones",
            default: true,
          },
        },
        required: ["video_url"],
      },
    },
  };

  constructor(private readonly youtube: YouTubeService) {}

  async run(args: VideoScraperArgs): Promise<VideoInfo> {
    if (!args.videoUrl) throw new Error("videoUrl is required");
    return this.youtube.getVideoInfo(args.videoUrl, {
      languages: args.languages?.length ? args.languages : [...DEFAULT_LANGUAGES],
      preferManual: args.preferManual ?? true,
    });
  }

  async getMetadataOnly(videoUrl: string): Promise<VideoMetadata> {
    const videoId = this.youtube.extractVideoId(videoUrl);
    if (!videoId) throw new InvalidUrlError(videoUrl);
    return this.youtube.getVideoMetadata(videoId);
  }

  async getTranscriptOnly(videoUrl: string, languages?: string[]): Promise<TranscriptEntry[]> {
    const videoId = this.youtube.extractVideoId(videoUrl);
    if (!videoId) throw new InvalidUrlError(videoUrl);
    const result = await this.youtube.getTranscript(videoId, {
      languages: languages?.length ? languages : [...DEFAULT_LANGUAGES],
      preferManual: true,
    });
    return result.entries;
  }
}
