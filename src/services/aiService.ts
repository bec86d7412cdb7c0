import type { GeminiClient } from "../ai/geminiClient.js";
import type { TranscriptEntry } from "../types.js";
import type { Logger } from "../utils/logger.js";

export interface EnhanceOptions {
  enableSummary?: boolean;
  summaryMaxPoints?: number;
  enableTranslation?: boolean;
  targetLanguage?: string;
  enableTopics?: boolean;
  numTopics?: number;
  /** Output language for summary and topics. */
  language?: string;
}

export interface EnhanceResult {
  summary: string | null;
  translation: string | null;
  topics: string[] | null;
  /** Seconds. */
  processingTime: number;
}

/** Null-safe facade over GeminiClient: every call resolves to null when AI is off. */
export class AIService {
  constructor(
    private readonly client: GeminiClient | null,
    private readonly logger?: Logger,
  ) {}

  isAvailable(): boolean {
    return this.client !== null;
  }

  get model(): string | null {
    return this.client?.model ?? null;
  }

  async generateSummary(transcript: TranscriptEntry[], maxPoints = 5, language = "ko"): Promise<string | null> {
    return this.client ? this.client.generateSummary(transcript, maxPoints, language) : null;
  }

  async generateSummaryFromText(text: string, maxPoints = 5, language = "ko"): Promise<string | null> {
    return this.client ? this.client.summarizeText(text, maxPoints, language) : null;
  }

  async translateText(text: string, targetLanguage = "en", sourceLanguage?: string): Promise<string | null> {
    return this.client ? this.client.translateText(text, targetLanguage, sourceLanguage) : null;
  }

  async translateTranscript(
    transcript: TranscriptEntry[],
    targetLanguage = "en",
    sourceLanguage?: string,
  ): Promise<string | null> {
    return this.client ? this.client.translateTranscript(transcript, targetLanguage, sourceLanguage) : null;
  }

  async extractTopics(transcript: TranscriptEntry[], numTopics = 5, language = "ko"): Promise<string[] | null> {
    return this.client ? this.client.extractKeyTopics(transcript, numTopics, language) : null;
  }

  async extractTopicsFromText(text: string, numTopics = 5, language = "ko"): Promise<string[] | null> {
    return this.client ? this.client.extractTopicsFromText(text, numTopics, language) : null;
  }

  async enhanceTranscript(transcript: TranscriptEntry[], opts: EnhanceOptions = {}): Promise<EnhanceResult> {
    const started = Date.now();
    const language = opts.language ?? "ko";

    const summary = opts.enableSummary
      ? await this.generateSummary(transcript, opts.summaryMaxPoints ?? 5, language)
      : null;
    const translation =
      opts.enableTranslation && opts.targetLanguage
        ? await this.translateTranscript(transcript, opts.targetLanguage)
        : null;
    const topics = opts.enableTopics ? await this.extractTopics(transcript, opts.numTopics ?? 5, language) : null;

    const processingTime = (Date.now() - started) / 1000;
    this.logger?.info(
      { summary: summary !== null, translation: translation !== null, topics: topics !== null, processingTime },
      "transcript enhanced",
    );
    return { summary, translation, topics, processingTime };
  }
}
