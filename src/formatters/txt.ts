import { formatTimestamp } from "../utils/time.js";
import { formatCount, generatedAt, uploadDateOf, type FormatInput, type Formatter } from "./formatter.js";

const HEAVY = "=".repeat(80);
const LIGHT = "-".repeat(80);

export class TxtFormatter implements Formatter {
  readonly name = "txt";
  readonly label = "Text";
  readonly extension = "txt";

  format(input: FormatInput): string {
    const { metadata, transcript, summary, translation, keyTopics } = input;
    const out: string[] = [HEAVY, "YouTube Video Transcript", HEAVY, ""];

    out.push(
      "📹 Video Information",
      LIGHT,
      `Title: ${metadata.title}`,
      `Channel: ${metadata.channel}`,
      `Upload Date: ${uploadDateOf(metadata)}`,
      `Duration: ${formatTimestamp(metadata.duration)}`,
      `Views: ${formatCount(metadata.viewCount)}`,
      "",
    );
    out.push("📝 Description", LIGHT, metadata.description, "");

    if (summary) out.push("🤖 AI Summary", LIGHT, summary, "");
    if (keyTopics?.length) out.push("🔑 Key Topics", LIGHT, ...keyTopics.map((t) => `• ${t}`), "");
    if (translation) out.push("🌐 Translation", LIGHT, translation, "");

    if (transcript.length) {
      out.push("📜 Transcript with Timestamps", HEAVY, "");
      for (const entry of transcript) {
        out.push(`[${formatTimestamp(entry.start)}] ${entry.text.trim()}`);
      }
      out.push("", HEAVY, `Total transcript entries: ${transcript.length}`);
    } else {
      out.push("📜 Transcript", HEAVY, "No transcript available for this video.");
    }

    out.push("", `Generated on: ${generatedAt(input)}`, "");
    return out.join("\n");
  }
}
