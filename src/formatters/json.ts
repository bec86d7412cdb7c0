import { formatTimestamp } from "../utils/time.js";
import { generatedAt, uploadDateOf, type FormatInput, type Formatter } from "./formatter.js";

export interface TranscriptDocument {
  videoInfo: {
    videoId: string;
    title: string;
    channel: string;
    uploadDate: string;
    duration: number;
    durationFormatted: string;
    viewCount: number;
  };
  description: string;
  transcript: Array<{ timestamp: string; startSeconds: number; duration: number; text: string }>;
  metadata: { totalEntries: number; generatedAt: string };
  aiSummary?: string;
  keyTopics?: string[];
  translation?: string;
}

export function toTranscriptDocument(input: FormatInput): TranscriptDocument {
  const { metadata, transcript } = input;
  const doc: TranscriptDocument = {
    videoInfo: {
      videoId: metadata.videoId,
      title: metadata.title,
      channel: metadata.channel,
      uploadDate: uploadDateOf(metadata),
      duration: metadata.duration,
      durationFormatted: formatTimestamp(metadata.duration),
      viewCount: metadata.viewCount,
    },
    description: metadata.description,
    transcript: transcript.map((e) => ({
      timestamp: formatTimestamp(e.start),
      startSeconds: e.start,
      duration: e.duration,
      text: e.text.trim(),
    })),
    metadata: { totalEntries: transcript.length, generatedAt: generatedAt(input) },
  };
  if (input.summary) doc.aiSummary = input.summary;
  if (input.keyTopics?.length) doc.keyTopics = input.keyTopics;
  if (input.translation) doc.translation = input.translation;
  return doc;
}

export class JsonFormatter implements Formatter {
  readonly name = "json";
  readonly label = "JSON";
  readonly extension = "json";

  format(input: FormatInput): string {
    return JSON.stringify(toTranscriptDocument(input), null, 2);
  }
}
