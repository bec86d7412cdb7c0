import { z } from "zod";
import { InvalidUrlError } from "../errors.js";
import { queryBoolean, queryList, sendFailure, type App, type RouteDeps } from "./shared.js";

const Languages = z.array(z.string().min(1)).min(1);

const VideoInfoBody = z.object({
  videoUrl: z.string().min(1),
  languages: Languages.optional(),
  preferManual: z.boolean().optional(),
});

const ScrapeBody = VideoInfoBody.extend({
  enableSummary: z.boolean().default(false),
  summaryMaxPoints: z.number().int().min(1).max(10).default(5),
  enableTranslation: z.boolean().default(false),
  targetLanguage: z.string().min(1).optional(),
  enableTopics: z.boolean().default(false),
  numTopics: z.number().int().min(1).max(20).default(5),
  outputFormat: z.string().min(1).optional(),
});

const MetadataQuery = z.object({
  videoUrl: z.string().min(1),
  apiV3: queryBoolean.optional(),
});

const TranscriptQuery = z.object({
  videoUrl: z.string().min(1),
  languages: queryList.optional(),
  preferManual: queryBoolean.optional(),
});

export function registerVideoRoutes(app: App, { config, services, logger }: RouteDeps) {
  const log = logger.child({ router: "video" });

  app.post("/video/info", async (req, reply) => {
    const parsed = VideoInfoBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const body = parsed.data;
    try {
      const info = await services.youtube.getVideoInfo(body.videoUrl, {
        languages: body.languages ?? config.defaultLanguages,
        preferManual: body.preferManual ?? true,
      });
      return reply.code(200).send({
        metadata: info.metadata,
        transcript: info.transcript,
        transcriptLanguage: info.transcriptLanguage,
      });
    } catch (err) {
      return sendFailure(reply, log, err, "get video info");
    }
  });

  app.post("/video/scrape", async (req, reply) => {
    const parsed = ScrapeBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const body = parsed.data;
    try {
      log.info({ videoUrl: body.videoUrl }, "scraping video");
      const result = await services.scrape.scrape(body.videoUrl, {
        languages: body.languages ?? config.defaultLanguages,
        preferManual: body.preferManual ?? true,
        enableSummary: body.enableSummary,
        summaryMaxPoints: body.summaryMaxPoints,
        enableTranslation: body.enableTranslation,
        targetLanguage: body.targetLanguage,
        enableTopics: body.enableTopics,
        numTopics: body.numTopics,
        outputFormat: body.outputFormat,
      });
      return reply.code(200).send({
        metadata: result.metadata,
        transcript: result.transcript,
        transcriptLanguage: result.transcriptLanguage,
        summary: result.summary,
        translation: result.translation,
        keyTopics: result.keyTopics,
        outputFile: result.outputFile,
      });
    } catch (err) {
      return sendFailure(reply, log, err, "scrape video");
    }
  });

  app.get("/video/metadata", async (req, reply) => {
    const parsed = MetadataQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { videoUrl, apiV3 } = parsed.data;
    try {
      const videoId = services.youtube.extractVideoId(videoUrl);
      if (!videoId) throw new InvalidUrlError(videoUrl);
      const body = apiV3
        ? await services.youtube.getVideoResource(videoId)
        : await services.youtube.getVideoMetadata(videoId);
      return reply.code(200).send(body);
    } catch (err) {
      return sendFailure(reply, log, err, "get metadata");
    }
  });

  app.get("/video/transcript", async (req, reply) => {
    const parsed = TranscriptQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { videoUrl, languages, preferManual } = parsed.data;
    try {
      const videoId = services.youtube.extractVideoId(videoUrl);
      if (!videoId) throw new InvalidUrlError(videoUrl);
      const result = await services.youtube.getTranscript(videoId, {
        languages: languages?.length ? languages : config.defaultLanguages,
        preferManual: preferManual ?? true,
      });
      return reply.code(200).send(result.entries);
    } catch (err) {
      return sendFailure(reply, log, err, "get transcript");
    }
  });
}
