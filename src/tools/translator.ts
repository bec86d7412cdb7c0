import { errorMessage } from "../errors.js";
import type { AIService } from "../services/aiService.js";
import type { TranscriptEntry } from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { TextOrTranscript, ToolSchema } from "./schema.js";

export interface TranslatorArgs extends TextOrTranscript<TranscriptEntry> {
  targetLanguage?: string;
  sourceLanguage?: string;
}

export class TranslatorTool {
  static readonly schema: ToolSchema = {
    type: "function",
    function: {
      name: "translator",
      description: "Translates text or a transcript into another language.",
      parameters: {
        type: "object",
        properties: {
          text: { type: "string", description: "Text to translate" },
          target_language: { type: "string", description: "Target language code (en, ko, ja, ...)", default: "en" },
          source_language: { type: "string", description: "Source language code; detected when omitted" },
        },
        required: ["text", "target_language"],
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

  async run(args: TranslatorArgs): Promise<string | null> {
    if (!this.ai.isAvailable()) {
      this.logger?.warn("AI service not available");
      return null;
    }
    if (args.text === undefined && args.transcript === undefined) {
      throw new Error("Either 'text' or 'transcript' must be provided");
    }
    const target = args.targetLanguage ?? "en";
    try {
      if (args.text) return await this.ai.translateText(args.text, target, args.sourceLanguage);
      if (args.transcript?.length) {
        return await this.ai.translateTranscript(args.transcript, target, args.sourceLanguage);
      }
      return null;
    } catch (err) {
      this.logger?.error({ err: errorMessage(err) }, "translator failed");
      return null;
    }
  }
}
