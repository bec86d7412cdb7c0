import { errorMessage } from "../errors.js";
import type { AIService } from "../services/aiService.js";
import type { TranscriptEntry } from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { TextOrTranscript, ToolSchema } from "./schema.js";

export interface SummarizerArgs extends TextOrTranscript<TranscriptEntry> {
  maxPoints?: number;
  language?: string;
}

export class SummarizerTool {
  static readonly schema: ToolSchema = {
    type: "function",
    function: {
      name: "summarizer",
      description: "Summarizes text or a transcript into its main points.",
      parameters: {
        type: "object",
        properties: {
          text: { type: "string", description: "Text to summarize" },
          max_points: {
            type: "integer",
            description: "Maximum number of summary points (1-10)",
            default: 5,
            minimum: 1,
            maximum: 10,
          },
          language: { type: "string", description: "Summary language code (ko, en, ja, zh, ...)", default: "ko" },
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

  async run(args: SummarizerArgs): Promise<string | null> {
    if (!this.ai.isAvailable()) {
      this.logger?.warn("AI service not available");
      return null;
    }
    if (args.text === undefined && args.transcript === undefined) {
      throw new Error("Either 'text' or 'transcript' must be provided");
    }
    const maxPoints = args.maxPoints ?? 5;
    const language = args.language ?? "ko";
    try {
      if (args.text) return await this.ai.generateSummaryFromText(args.text, maxPoints, language);
      if (args.transcript?.length) return await this.ai.generateSummary(args.transcript, maxPoints, language);
      return null;
    } catch (err) {
      this.logger?.error({ err: errorMessage(err) }, "summarizer failed");
      return null;
    }
  }
}
