import type { TranscriptEntry } from "../types.js";
import { fmtSrtTime, fmtVttTime } from "../utils/time.js";
import type { FormatInput, Formatter } from "./formatter.js";

function spanMs(entry: TranscriptEntry): { startMs: number; endMs: number } {
  const startMs = Math.round(entry.start * 1000);
  return { startMs, endMs: startMs + Math.round(entry.duration * 1000) };
}

export function toSrt(entries: TranscriptEntry[]): string {
  return entries
    .map((e, i) => {
      const { startMs, endMs } = spanMs(e);
      return `${i + 1}\n${fmtSrtTime(startMs)} --> ${fmtSrtTime(endMs)}\n${e.text.trim()}\n`;
    })
    .join("\n");
}

export function toVtt(entries: TranscriptEntry[]): string {
  return `WEBVTT\n\n${entries
    .map((e) => {
      const { startMs, endMs } = spanMs(e);
      return `${fmtVttTime(startMs)} --> ${fmtVttTime(endMs)}\n${e.text.trim()}\n`;
    })
    .join("\n")}`;
}

/** Captions only; metadata and AI fields are not part of the format. */
export class SrtFormatter implements Formatter {
  readonly name = "srt";
  readonly label = "SubRip";
  readonly extension = "srt";

  format(input: FormatInput): string {
    return toSrt(input.transcript);
  }
}

export class VttFormatter implements Formatter {
  readonly name = "vtt";
  readonly label = "WebVTT";
  readonly extension = "vtt";

  format(input: FormatInput): string {
    return toVtt(input.transcript);
  }
}
