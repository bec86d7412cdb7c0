import { GoogleGenerativeAI } from "@google/generative-ai";
import {
  DEFAULT_GEMINI_MODEL,
  MAX_PROMPT_CHARS,
  SUMMARY_TEMPERATURE,
  TOPICS_TEMPERATURE,
  TRANSLATION_TEMPERATURE,
} from "../constants.js";
import { errorMessage } from "../errors.js";
import type { TranscriptEntry } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { sleep } from "../utils/time.js";
import { summaryPrompt, topicsPrompt, translationPrompt } from "./prompts.js";
import { combineTranscriptText, parseTopicLines, truncateForPrompt, truncateSmartly } from "./text.js";

export interface GenerateOptions {
  temperature: number;
  timeoutMs?: number;
}

/** Anything that turns a prompt into text. */
export interface TextGenerator {
  generate(prompt: string, opts: GenerateOptions): Promise<string>;
}

export class GoogleTextGenerator implements TextGenerator {
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly model: string = DEFAULT_GEMINI_MODEL) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate(prompt: string, opts: GenerateOptions): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      { model: this.model, generationConfig: { temperature: opts.temperature } },
      opts.timeoutMs ? { timeout: opts.timeoutMs } : undefined,
    );
    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}

export function isGeminiAvailable(apiKey: string | null | undefined): apiKey is string {
  return typeof apiKey === "string" && apiKey.trim().length > 0;
}

export interface GeminiClientOptions {
  apiKey?: string;
  model?: string;
  /** Replaces the Google SDK; used by tests. */
  generator?: TextGenerator;
  retryCount?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  /** Waits between failed attempts. */
  sleep?: (ms: number) => Promise<void>;
}

export class GeminiClient {
  readonly model: string;
  private readonly generator: TextGenerator;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: GeminiClientOptions) {
    this.model = opts.model ?? DEFAULT_GEMINI_MODEL;
    if (opts.generator) {
      this.generator = opts.generator;
    } else if (isGeminiAvailable(opts.apiKey)) {
      this.generator = new GoogleTextGenerator(opts.apiKey, this.model);
    } else {
      throw new Error("Gemini API key is not configured. Set GEMINI_API_KEY or GOOGLE_API_KEY.");
    }
    this.retryCount = Math.max(1, opts.retryCount ?? 3);
    this.retryDelayMs = Math.max(0, opts.retryDelayMs ?? 1000);
    this.timeoutMs = opts.timeoutMs ?? 30000;
    this.logger = opts.logger;
    this.sleep = opts.sleep ?? sleep;
    this.logger?.info({ model: this.model }, "Gemini client ready");
  }

  /**
   * Calls the model up to `retryCount` times. Thrown errors back off
   * linearly; empty answers are retried straight away. Resolves to null
   * when every attempt fails.
   */
  async generate(prompt: string, opts: GenerateOptions): Promise<string | null> {
    for (let attempt = 0; attempt < this.retryCount; attempt++) {
      try {
        const text = (await this.generator.generate(prompt, opts)).trim();
        if (text) return text;
        this.logger?.warn({ attempt: attempt + 1, of: this.retryCount }, "empty response from Gemini");
      } catch (err) {
        this.logger?.warn({ attempt: attempt + 1, of: this.retryCount, err: errorMessage(err) }, "Gemini call failed");
        if (attempt < this.retryCount - 1) {
          await this.sleep(this.retryDelayMs * (attempt + 1));
        }
      }
    }
    this.logger?.error({ attempts: this.retryCount }, "Gemini gave no usable response");
    return null;
  }

  async generateSummary(transcript: TranscriptEntry[], maxPoints = 5, language = "ko"): Promise<string | null> {
    if (!transcript.length) return null;
    return this.summarizeText(combineTranscriptText(transcript), maxPoints, language);
  }

  async summarizeText(text: string, maxPoints = 5, language = "ko"): Promise<string | null> {
    if (!text.trim()) return null;
    const prompt = summaryPrompt(truncateForPrompt(text, MAX_PROMPT_CHARS), maxPoints, language);
    return this.generate(prompt, { temperature: SUMMARY_TEMPERATURE, timeoutMs: this.timeoutMs });
  }

  async translateText(text: string, targetLanguage = "en", sourceLanguage?: string): Promise<string | null> {
    if (!text.trim()) return null;
    if (text.length > MAX_PROMPT_CHARS) {
      this.logger?.warn({ length: text.length, limit: MAX_PROMPT_CHARS }, "translation input truncated");
    }
    const prompt = translationPrompt(truncateSmartly(text, MAX_PROMPT_CHARS), targetLanguage, sourceLanguage);
    return this.generate(prompt, { temperature: TRANSLATION_TEMPERATURE, timeoutMs: this.timeoutMs });
  }

  async translateTranscript(
    transcript: TranscriptEntry[],
    targetLanguage = "en",
    sourceLanguage?: string,
  ): Promise<string | null> {
    if (!transcript.length) return null;
    return this.translateText(combineTranscriptText(transcript), targetLanguage, sourceLanguage);
  }

  async extractKeyTopics(transcript: TranscriptEntry[], numTopics = 5, language = "ko"): Promise<string[] | null> {
    if (!transcript.length) return null;
    return this.extractTopicsFromText(combineTranscriptText(transcript), numTopics, language);
  }

  async extractTopicsFromText(text: string, numTopics = 5, language = "ko"): Promise<string[] | null> {
    if (!text.trim()) return null;
    const prompt = topicsPrompt(truncateForPrompt(text, MAX_PROMPT_CHARS), numTopics, language);
    const raw = await this.generate(prompt, { temperature: TOPICS_TEMPERATURE, timeoutMs: this.timeoutMs });
    if (raw === null) return null;
    const topics = parseTopicLines(raw, numTopics);
    return topics.length ? topics : null;
  }
}
