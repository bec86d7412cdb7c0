import { z } from "zod";
import { AiUnavailableError } from "../errors.js";
import { sendFailure, type App, type RouteDeps } from "./shared.js";

const Text = z.string().min(1);

const SummaryBody = z.object({
  text: Text,
  maxPoints: z.number().int().min(1).max(10).default(5),
  language: z.string().min(1).default("ko"),
});

const TranslateBody = z.object({
  text: Text,
  targetLanguage: z.string().min(1),
  sourceLanguage: z.string().min(1).optional(),
});

const TopicsBody = z.object({
  text: Text,
  numTopics: z.number().int().min(1).max(20).default(5),
  language: z.string().min(1).default("ko"),
});

const EnhanceBody = z.object({
  text: Text,
  enableSummary: z.boolean().default(true),
  summaryMaxPoints: z.number().int().min(1).max(10).default(5),
  enableTranslation: z.boolean().default(false),
  targetLanguage: z.string().min(1).optional(),
  enableTopics: z.boolean().default(true),
  numTopics: z.number().int().min(1).max(20).default(5),
  language: z.string().min(1).default("ko"),
});

class EmptyResultError extends Error {}

export function registerAiRoutes(app: App, { config, services, logger }: RouteDeps) {
  const log = logger.child({ router: "ai" });
  const ai = services.ai;

  app.post("/ai/summary", async (req, reply) => {
    const parsed = SummaryBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { text, maxPoints, language } = parsed.data;
    try {
      if (!ai.isAvailable()) throw new AiUnavailableError();
      const summary = await ai.generateSummaryFromText(text, maxPoints, language);
      if (summary === null) throw new EmptyResultError("no summary returned");
      return reply.code(200).send({
        summary,
        originalLength: text.length,
        summaryLength: summary.length,
        language,
      });
    } catch (err) {
      return sendFailure(reply, log, err, "generate summary");
    }
  });

  app.post("/ai/translate", async (req, reply) => {
    const parsed = TranslateBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { text, targetLanguage, sourceLanguage } = parsed.data;
    try {
      if (!ai.isAvailable()) throw new AiUnavailableError();
      const translatedText = await ai.translateText(text, targetLanguage, sourceLanguage);
      if (translatedText === null) throw new EmptyResultError("no translation returned");
      return reply.code(200).send({
        translatedText,
        sourceLanguage: sourceLanguage ?? null,
        targetLanguage,
        originalLength: text.length,
        translatedLength: translatedText.length,
      });
    } catch (err) {
      return sendFailure(reply, log, err, "translate text");
    }
  });

  app.post("/ai/topics", async (req, reply) => {
    const parsed = TopicsBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const { text, numTopics, language } = parsed.data;
    try {
      if (!ai.isAvailable()) throw new AiUnavailableError();
      const topics = await ai.extractTopicsFromText(text, numTopics, language);
      if (topics === null) throw new EmptyResultError("no topics returned");
      return reply.code(200).send({ topics, numTopics: topics.length, language });
    } catch (err) {
      return sendFailure(reply, log, err, "extract topics");
    }
  });

  app.post("/ai/enhance", async (req, reply) => {
    const parsed = EnhanceBody.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }
    const body = parsed.data;
    try {
      if (!ai.isAvailable()) throw new AiUnavailableError();
      const transcript = [{ start: 0, duration: 0, text: body.text, timestamp: "00:00" }];
      const result = await ai.enhanceTranscript(transcript, body);
      return reply.code(200).send(result);
    } catch (err) {
      return sendFailure(reply, log, err, "enhance text");
    }
  });

  app.get("/ai/health", async (_req, reply) => {
    return reply.code(200).send({
      available: ai.isAvailable(),
      model: ai.model ?? config.geminiModel,
      apiKeyConfigured: Boolean(config.geminiApiKey),
    });
  });
}
