import { formatTimestamp } from "../utils/time.js";
import { formatCount, generatedAt, uploadDateOf, type FormatInput, type Formatter } from "./formatter.js";

function escapeCell(text: string): string {
  return text.trim().replace(/\n/g, " ").replace(/\|/g, "\\|");
}

export class MarkdownFormatter implements Formatter {
  readonly name = "markdown";
  readonly label = "Markdown";
  readonly extension = "md";

  format(input: FormatInput): string {
    const { metadata, transcript, summary, translation, keyTopics } = input;
    const out: string[] = [`# ${metadata.title}`, ""];

    out.push(
      "## 📹 Video Information",
      "",
      `- **Title**: ${metadata.title}`,
      `- **Channel**: ${metadata.channel}`,
      `- **Upload Date**: ${uploadDateOf(metadata)}`,
      `- **Duration**: ${formatTimestamp(metadata.duration)}`,
      `- **Views**: ${formatCount(metadata.viewCount)}`,
      "",
    );
    out.push("## 📝 Description", "", metadata.description, "");

    if (summary) out.push("## 🤖 AI Summary", "", summary, "");
    if (keyTopics?.length) out.push("## 🔑 Key Topics", "", ...keyTopics.map((t) => `- ${t}`), "");
    if (translation) out.push("## 🌐 Translation", "", translation, "");

    out.push("## 📜 Transcript", "");
    if (transcript.length) {
      out.push("| Timestamp | Text |", "|-----------|------|");
      for (const entry of transcript) {
        out.push(`| \`${formatTimestamp(entry.start)}\` | ${escapeCell(entry.text)} |`);
      }
      out.push("", `**Total transcript entries**: ${transcript.length}`, "");
    } else {
      out.push("No transcript available for this video.", "");
    }

    out.push("---", "", `*Generated on: ${generatedAt(input)}*`, "");
    return out.join("\n");
  }
}
