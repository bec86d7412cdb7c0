import path from "node:path";
import type { TranscriptEntry, VideoMetadata } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { generateSafeFilename } from "../utils/time.js";
import type { AIService } from "./aiService.js";
import type { FormatterService } from "./formatterService.js";
import type { YouTubeService } from "./youtubeService.js";

export interface ScrapeOptions {
  languages: string[];
  preferManual?: boolean;
  enableSummary?: boolean;
  summaryMaxPoints?: number;
  enableTranslation?: boolean;
  targetLanguage?: string;
  enableTopics?: boolean;
  numTopics?: number;
  /** When set the result is also written to disk in this format. */
  outputFormat?: string;
  outputDir?: string;
}

export interface ScrapeResult {
  videoId: string;
  metadata: VideoMetadata;
  transcript: TranscriptEntry[];
  transcriptLanguage: string | null;
  summary: string | null;
  translation: string | null;
  keyTopics: string[] | null;
  outputFile: string | null;
}

export class ScrapeService {
  constructor(
    private readonly youtube: YouTubeService,
    private readonly ai: AIService,
    private readonly formatter: FormatterService,
    private readonly defaultOutputDir: string,
    private readonly logger?: Logger,
  ) {}

  async scrape(url: string, opts: ScrapeOptions): Promise<ScrapeResult> {
    // an unknown format fails before any lookup or generation
    const formatter = opts.outputFormat ? this.formatter.getFormatter(opts.outputFormat) : null;

    const video = await this.youtube.getVideoInfo(url, {
      languages: opts.languages,
      preferManual: opts.preferManual ?? true,
    });
    const language = opts.languages[0] ?? "ko";

    let summary: string | null = null;
    let translation: string | null = null;
    let keyTopics: string[] | null = null;
    if (video.transcript.length) {
      if (opts.enableSummary) {
        summary = await this.ai.generateSummary(video.transcript, opts.summaryMaxPoints ?? 5, language);
      }
      if (opts.enableTranslation && opts.targetLanguage) {
        translation = await this.ai.translateTranscript(
          video.transcript,
          opts.targetLanguage,
          video.transcriptLanguage ?? undefined,
        );
      }
      if (opts.enableTopics) {
        keyTopics = await this.ai.extractTopics(video.transcript, opts.numTopics ?? 5, language);
      }
    }

    let outputFile: string | null = null;
    if (formatter) {
      const fileName = generateSafeFilename(video.metadata.title, video.videoId, formatter.extension);
      outputFile = await this.formatter.saveToFile(
        { metadata: video.metadata, transcript: video.transcript, summary, translation, keyTopics },
        path.join(opts.outputDir ?? this.defaultOutputDir, fileName),
        formatter.name,
      );
    }

    this.logger?.info({ videoId: video.videoId, outputFile }, "scrape complete");
    return { ...video, summary, translation, keyTopics, outputFile };
  }
}
