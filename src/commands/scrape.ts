import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_LANGUAGES } from "../constants.js";
import type { Services } from "../container.js";
import { errorMessage } from "../errors.js";

export interface ScrapeCliOptions {
  lang: string[];
  preferManual: boolean;
  summary?: boolean;
  summaryPoints: number;
  translate?: string;
  topics?: number;
  format?: string;
  maxVideos?: number;
  outputDir?: string;
  verbose?: boolean;
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

/**
 * Scrapes a video or every video of a playlist and writes one file per
 * video. Resolves to the process exit code.
 */
export async function runScrape(
  url: string,
  formatArg: string | undefined,
  opts: ScrapeCliOptions,
  services: Services,
  io: CliIo,
): Promise<number> {
  const format = opts.format ?? formatArg ?? "json";
  try {
    services.formatter.getFormatter(format);
  } catch (err) {
    io.err(errorMessage(err));
    return 1;
  }

  const resolved = await services.youtube.resolveUrl(url);
  if (resolved.type === "unknown") {
    io.err(`Invalid YouTube URL: ${url}`);
    return 1;
  }

  let enableSummary = Boolean(opts.summary);
  let targetLanguage = opts.translate;
  let numTopics = opts.topics;
  if ((enableSummary || targetLanguage || numTopics) && !services.ai.isAvailable()) {
    io.err("Warning: GEMINI_API_KEY is not set; continuing without AI features.");
    enableSummary = false;
    targetLanguage = undefined;
    numTopics = undefined;
  }

  let videos = resolved.videos;
  if (resolved.type === "playlist") {
    if (opts.maxVideos) videos = videos.slice(0, opts.maxVideos);
    const title = resolved.playlistInfo?.title ?? "Unknown Playlist";
    io.out(`Playlist: ${title} (${videos.length} of ${resolved.playlistInfo?.videoCount ?? videos.length} videos)`);
  }

  let succeeded = 0;
  let failed = 0;
  for (const [i, video] of videos.entries()) {
    io.out(`[${i + 1}/${videos.length}] ${video.title || video.url}`);
    try {
      const result = await services.scrape.scrape(video.url, {
        languages: opts.lang,
        preferManual: opts.preferManual,
        enableSummary,
        summaryMaxPoints: opts.summaryPoints,
        enableTranslation: Boolean(targetLanguage),
        targetLanguage,
        enableTopics: numTopics !== undefined,
        numTopics,
        outputFormat: format,
        outputDir: opts.outputDir,
      });
      if (!result.transcript.length) io.out("  no transcript available");
      io.out(`  saved ${result.outputFile}`);
      succeeded++;
    } catch (err) {
      io.err(`  failed: ${errorMessage(err)}`);
      failed++;
    }
  }

  io.out(`Done: ${succeeded} succeeded, ${failed} failed`);
  return succeeded === 0 ? 1 : 0;
}

export function scrapeCommand(
  createContext: (opts: ScrapeCliOptions) => Services,
  io: CliIo,
  onExit: (code: number) => void,
): Command {
  return new Command("yt-script-scraper")
    .description("Scrape metadata and transcripts of a YouTube video or playlist")
    .argument("<url>", "YouTube video or playlist URL")
    .argument("[format]", "output format: 1-6 or txt, json, xml, markdown, srt, vtt")
    .option("-l, --lang <codes...>", "caption languages in priority order", [...DEFAULT_LANGUAGES])
    .option("--no-prefer-manual", "prefer auto-generated captions")
    .option("-s, --summary", "add an AI summary")
    .option("--summary-points <n>", "number of summary points", parsePositiveInt, 5)
    .option("-t, --translate <lang>", "add an AI translation into this language")
    .option("--topics <n>", "add this many AI key topics", parsePositiveInt)
    .option("-f, --format <choice>", "output format (overrides the positional format)")
    .option("-m, --max-videos <n>", "process at most this many playlist videos", parsePositiveInt)
    .option("-o, --output-dir <dir>", "directory for output files")
    .option("-v, --verbose", "log progress details")
    .action(async (url: string, format: string | undefined, opts: ScrapeCliOptions) => {
      const services = createContext(opts);
      onExit(await runScrape(url, format, opts, services, io));
    });
}
