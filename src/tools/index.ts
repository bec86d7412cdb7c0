import type { ToolSchema } from "./schema.js";
import { SummarizerTool } from "./summarizer.js";
import { TopicExtractorTool } from "./topicExtractor.js";
import { TranslatorTool } from "./translator.js";
import { VideoScraperTool } from "./videoScraper.js";

export type { ToolSchema } from "./schema.js";
export { SummarizerTool, TopicExtractorTool, TranslatorTool, VideoScraperTool };

export function toolSchemas(): ToolSchema[] {
  return [VideoScraperTool.schema, SummarizerTool.schema, TranslatorTool.schema, TopicExtractorTool.schema];
}
