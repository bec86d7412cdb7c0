import type { TranscriptEntry } from "../types.js";

const SENTENCE_DELIMITERS = [". ", "。", "! ", "? ", "\n\n", ".\n", "。\n"];

export function combineTranscriptText(transcript: TranscriptEntry[]): string {
  return transcript.map((e) => e.text).join(" ");
}

/** Hard cut at `maxChars`, marked with a trailing `...`. */
export function truncateForPrompt(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Cuts at a sentence boundary past 80% of `maxChars`, else at a word
 * boundary past that point, else hard at `maxChars`.
 */
export function truncateSmartly(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const head = text.slice(0, maxChars);
  const minLength = Math.floor(maxChars * 0.8);
  for (const delimiter of SENTENCE_DELIMITERS) {
    const idx = head.lastIndexOf(delimiter);
    if (idx > minLength) return text.slice(0, idx + delimiter.length);
  }

  const lastSpace = head.lastIndexOf(" ");
  if (lastSpace > minLength) return text.slice(0, lastSpace);
  return head;
}

/** Turns a bulleted or numbered model answer into at most `limit` topics. */
export function parseTopicLines(raw: string, limit: number): string[] {
  const topics: string[] = [];
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const topic = /^[-•*]/.test(trimmed) ? trimmed.slice(1).trim() : trimmed.replace(/^\d+\.\s*/, "");
    if (topic) topics.push(topic);
  }
  return topics.slice(0, limit);
}
