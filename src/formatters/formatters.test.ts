import { describe, expect, it } from "vitest";
import { UnsupportedFormatError } from "../errors.js";
import type { VideoMetadata } from "../types.js";
import type { FormatInput } from "./formatter.js";
import { availableFormats, resolveFormatter } from "./index.js";
import { toTranscriptDocument } from "./json.js";
import { toSrt, toVtt } from "./subtitles.js";

const HEAVY = "=".repeat(80);
const LIGHT = "-".repeat(80);

const metadata: VideoMetadata = {
  videoId: "dQw4w9WgXcQ",
  title: "Sample Talk",
  channel: "Sample Channel",
  channelId: null,
  uploadDate: "20240115",
  duration: 3725,
  viewCount: 1234567,
  likeCount: null,
  commentCount: null,
  description: "About the talk",
  thumbnailUrl: null,
  tags: [],
  categories: [],
};

const input: FormatInput = {
  metadata,
  transcript: [
    { start: 0, duration: 2.5, text: "Hello | world", timestamp: "00:00" },
    { start: 65.5, duration: 3, text: " Second line ", timestamp: "01:05" },
  ],
  summary: "1. Point",
  keyTopics: ["AI", "Music"],
  translation: "Translated",
  generatedAt: new Date(2024, 0, 15, 9, 30, 5),
};

const bare: FormatInput = { metadata: { ...metadata, uploadDate: null }, transcript: [], generatedAt: input.generatedAt };

describe("resolveFormatter", () => {
  it("accepts numbers, names and extensions", () => {
    expect(resolveFormatter("2").name).toBe("json");
    expect(resolveFormatter("MD").name).toBe("markdown");
    expect(resolveFormatter(" txt ").name).toBe("txt");
    expect(resolveFormatter("vtt").name).toBe("vtt");
  });

  it("lists the choices when the format is unknown", () => {
    expect(() => resolveFormatter("7")).toThrow(
      "Unsupported output format: 7. Choose one of: 1/txt, 2/json, 3/xml, 4/markdown, 5/srt, 6/vtt",
    );
    expect(() => resolveFormatter("0")).toThrow(UnsupportedFormatError);
  });

  it("numbers the menu from one", () => {
    expect(availableFormats()[3]).toEqual({ choice: "4", name: "markdown", label: "Markdown", extension: "md" });
  });
});

describe("TxtFormatter", () => {
  it("renders every section", () => {
    expect(resolveFormatter("txt").format(input).split("\n")).toEqual([
      HEAVY,
      "YouTube Video Transcript",
      HEAVY,
      "",
      "📹 Video Information",
      LIGHT,
      "Title: Sample Talk",
      "Channel: Sample Channel",
      "Upload Date: 20240115",
      "Duration: 01:02:05",
      "Views: 1,234,567",
      "",
      "📝 Description",
      LIGHT,
      "About the talk",
      "",
      "🤖 AI Summary",
      LIGHT,
      "1. Point",
      "",
      "🔑 Key Topics",
      LIGHT,
      "• AI",
      "• Music",
      "",
      "🌐 Translation",
      LIGHT,
      "Translated",
      "",
      "📜 Transcript with Timestamps",
      HEAVY,
      "",
      "[00:00] Hello | world",
      "[01:05] Second line",
      "",
      HEAVY,
      "Total transcript entries: 2",
      "",
      "Generated on: 2024-01-15 09:30:05",
      "",
    ]);
  });

  it("notes a missing transcript and upload date", () => {
    const lines = resolveFormatter("txt").format(bare).split("\n");
    expect(lines).toContain("Upload Date: Unknown Date");
    expect(lines).toContain("No transcript available for this video.");
    expect(lines).not.toContain("🤖 AI Summary");
  });
});

describe("JsonFormatter", () => {
  it("builds a camelCase document", () => {
    expect(toTranscriptDocument(input)).toEqual({
      videoInfo: {
        videoId: "dQw4w9WgXcQ",
        title: "Sample Talk",
        channel: "Sample Channel",
        uploadDate: "20240115",
        duration: 3725,
        durationFormatted: "01:02:05",
        viewCount: 1234567,
      },
      description: "About the talk",
      transcript: [
        { timestamp: "00:00", startSeconds: 0, duration: 2.5, text: "Hello | world" },
        { timestamp: "01:05", startSeconds: 65.5, duration: 3, text: "Second line" },
      ],
      metadata: { totalEntries: 2, generatedAt: "2024-01-15 09:30:05" },
      aiSummary: "1. Point",
      keyTopics: ["AI", "Music"],
      translation: "Translated",
    });
  });

  it("omits absent AI fields", () => {
    const doc: unknown = JSON.parse(resolveFormatter("json").format(bare));
    expect(doc).not.toHaveProperty("aiSummary");
    expect(doc).not.toHaveProperty("keyTopics");
    expect(doc).toHaveProperty("metadata.totalEntries", 0);
  });
});

describe("XmlFormatter", () => {
  it("writes a snake_case document", () => {
    const xml = resolveFormatter("xml").format({ ...input, summary: "Tom & Jerry" });
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<youtube_transcript>')).toBe(true);
    expect(xml).toContain("<video_id>dQw4w9WgXcQ</video_id>");
    expect(xml).toContain("<duration_formatted>01:02:05</duration_formatted>");
    expect(xml).toContain("<ai_summary>Tom &amp; Jerry</ai_summary>");
    expect(xml).toContain("<topic>AI</topic>");
    expect(xml).toContain("<start_seconds>65.5</start_seconds>");
    expect(xml).toContain("<total_entries>2</total_entries>");
  });
});

describe("MarkdownFormatter", () => {
  it("renders the transcript as a table", () => {
    const lines = resolveFormatter("markdown").format(input).split("\n");
    expect(lines[0]).toBe("# Sample Talk");
    expect(lines).toContain("- **Views**: 1,234,567");
    expect(lines).toContain("| `00:00` | Hello \\| world |");
    expect(lines).toContain("| `01:05` | Second line |");
    expect(lines).toContain("**Total transcript entries**: 2");
    expect(lines).toContain("*Generated on: 2024-01-15 09:30:05*");
  });
});

describe("subtitles", () => {
  it("renders SRT cues", () => {
    expect(toSrt(input.transcript)).toBe(
      "1\n00:00:00,000 --> 00:00:02,500\nHello | world\n\n2\n00:01:05,500 --> 00:01:08,500\nSecond line\n",
    );
  });

  it("renders WebVTT cues", () => {
    expect(toVtt(input.transcript)).toBe(
      "WEBVTT\n\n00:00:00.000 --> 00:00:02.500\nHello | world\n\n00:01:05.500 --> 00:01:08.500\nSecond line\n",
    );
  });
});
