import type { TranscriptEntry, VideoMetadata } from "../types.js";
import { formatDateTime } from "../utils/time.js";

export interface FormatInput {
  metadata: VideoMetadata;
  transcript: TranscriptEntry[];
  summary?: string | null;
  translation?: string | null;
  keyTopics?: string[] | null;
  /** Defaults to the current time. */
  generatedAt?: Date;
}

export interface Formatter {
  /** Registry key, e.g. `markdown`. */
  readonly name: string;
  /** Human readable name for menus. */
  readonly label: string;
  readonly extension: string;
  format(input: FormatInput): string;
}

export function generatedAt(input: FormatInput): string {
  return formatDateTime(input.generatedAt ?? new Date());
}

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

export function uploadDateOf(metadata: VideoMetadata): string {
  return metadata.uploadDate ?? "Unknown Date";
}
