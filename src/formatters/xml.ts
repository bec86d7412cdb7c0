import xml2js from "xml2js";
import { formatTimestamp } from "../utils/time.js";
import { generatedAt, uploadDateOf, type FormatInput, type Formatter } from "./formatter.js";

export class XmlFormatter implements Formatter {
  readonly name = "xml";
  readonly label = "XML";
  readonly extension = "xml";

  private readonly builder = new xml2js.Builder({
    xmldec: { version: "1.0", encoding: "UTF-8" },
    renderOpts: { pretty: true, indent: "  ", newline: "\n" },
  });

  format(input: FormatInput): string {
    const { metadata, transcript } = input;
    const root: Record<string, unknown> = {
      video_info: {
        video_id: metadata.videoId,
        title: metadata.title,
        channel: metadata.channel,
        upload_date: uploadDateOf(metadata),
        duration: metadata.duration,
        duration_formatted: formatTimestamp(metadata.duration),
        view_count: metadata.viewCount,
      },
      description: metadata.description,
    };
    if (input.summary) root.ai_summary = input.summary;
    if (input.keyTopics?.length) root.key_topics = { topic: input.keyTopics };
    if (input.translation) root.translation = input.translation;

    root.transcript = transcript.length
      ? {
          entry: transcript.map((e) => ({
            timestamp: formatTimestamp(e.start),
            start_seconds: e.start,
            duration: e.duration,
            text: e.text.trim(),
          })),
        }
      : "";
    root.metadata = { total_entries: transcript.length, generated_at: generatedAt(input) };

    return this.builder.buildObject({ youtube_transcript: root });
  }
}
