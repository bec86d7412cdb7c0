import { errorMessage } from "../errors.js";
import type { AIService } from "../services/aiService.js";
import type { TranscriptEntry } from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { TextOrTranscript, ToolSchema } from "./schema.js";

export interface TopicExtractorArgs extends TextOrTranscript<TranscriptEntry> {
  numTopics?: number;
  language?: string;
}

export class TopicExtractorTool {
  static readonly schema: ToolSchema = {
    type: "function",
    function: {
      name: "topic_extractor",
      description: "Extracts the key topics of a text or transcript as short keywords or phrases.",
      parameters: {
        type: "object",
        properties: {
          text: { type: "string", description: "Text to analyze" },
          num_topics: {
            type: "integer",
            description: "Number of topics to extract (1-20)",
            default: 5,
            minimum: 1,
            maximum: 20,
          },
          language: { type: "string", description: "Output language code", default: "ko" },
        },
        required: ["text"],
      },
    },
  };

  constructor(
    private readonly ai: AIService,
    private readonly logger?: Logger,
  ) {}

  isAvailable(): boolean {
    return this.ai.isAvailable();
  }

  async run(args: TopicExtractorArgs): Promise<string[] | null> {
    if (!this.ai.isAvailable()) {
      this.logger?.warn("AI service not available");
      return null;
    }
    if (args.text === undefined && args.transcript === undefined) {
      throw new Error("Either 'text' or 'transcript' must be provided");
    }
    const numTopics = args.numTopics ?? 5;
    const language = args.language ?? "ko";
    try {
      if (args.text) return await this.ai.extractTopicsFromText(args.text, numTopics, language);
      if (args.transcript?.length) return await this.ai.extractTopics(args.transcript, numTopics, language);
      return null;
    } catch (err) {
      this.logger?.error({ err: errorMessage(err) }, "topic extraction failed");
      return null;
    }
  }
}
