import type { ServiceConfig } from "./config.js";
import { isKnownModel } from "./constants.js";
import { GeminiClient, isGeminiAvailable, type TextGenerator } from "./ai/geminiClient.js";
import { TranscriptFetcher, type FetchFn, type TranscriptApi } from "./pipeline/captions.js";
import { YtDlpClient } from "./pipeline/ytdlp.js";
import { AIService } from "./services/aiService.js";
import { FormatterService } from "./services/formatterService.js";
import { ScrapeService } from "./services/scrapeService.js";
import { YouTubeService } from "./services/youtubeService.js";
import { SummarizerTool, TopicExtractorTool, TranslatorTool, VideoScraperTool } from "./tools/index.js";
import type { Logger } from "./utils/logger.js";
import type { CommandRunner } from "./utils/process.js";

export interface Services {
  youtube: YouTubeService;
  ai: AIService;
  formatter: FormatterService;
  scrape: ScrapeService;
  tools: {
    videoScraper: VideoScraperTool;
    summarizer: SummarizerTool;
    translator: TranslatorTool;
    topicExtractor: TopicExtractorTool;
  };
}

/** Seams for swapping the external processes and APIs. */
export interface ServiceOverrides {
  run?: CommandRunner;
  fetchFn?: FetchFn;
  transcriptApi?: TranscriptApi;
  generator?: TextGenerator;
}

export function createServices(config: ServiceConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const ytdlp = new YtDlpClient({
    command: config.ytdlpCmd,
    timeoutMs: config.ytdlpTimeoutMs,
    run: overrides.run,
    logger: logger.child({ component: "yt-dlp" }),
  });
  const transcripts = new TranscriptFetcher({
    fetchFn: overrides.fetchFn,
    transcriptApi: overrides.transcriptApi,
    logger: logger.child({ component: "captions" }),
  });
  const youtube = new YouTubeService({ ytdlp, transcripts, logger: logger.child({ component: "youtube" }) });

  const aiLogger = logger.child({ component: "ai" });
  const gemini =
    overrides.generator || isGeminiAvailable(config.geminiApiKey)
      ? new GeminiClient({
          apiKey: config.geminiApiKey,
          model: config.geminiModel,
          generator: overrides.generator,
          retryCount: config.geminiRetryCount,
          retryDelayMs: config.geminiRetryDelayMs,
          timeoutMs: config.geminiTimeoutMs,
          logger: aiLogger,
        })
      : null;
  if (!gemini) {
    aiLogger.warn("GEMINI_API_KEY is not set; AI features are disabled");
  } else if (!isKnownModel(gemini.model)) {
    aiLogger.warn({ model: gemini.model }, "unknown Gemini model, passing it to the API as given");
  }
  const ai = new AIService(gemini, aiLogger);

  const formatter = new FormatterService(logger.child({ component: "formatter" }));
  const scrape = new ScrapeService(youtube, ai, formatter, config.outputDir, logger.child({ component: "scrape" }));

  return {
    youtube,
    ai,
    formatter,
    scrape,
    tools: {
      videoScraper: new VideoScraperTool(youtube),
      summarizer: new SummarizerTool(ai, aiLogger),
      translator: new TranslatorTool(ai, aiLogger),
      topicExtractor: new TopicExtractorTool(ai, aiLogger),
    },
  };
}
