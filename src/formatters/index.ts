import { UnsupportedFormatError } from "../errors.js";
import type { Formatter } from "./formatter.js";
import { JsonFormatter } from "./json.js";
import { MarkdownFormatter } from "./markdown.js";
import { SrtFormatter, VttFormatter } from "./subtitles.js";
import { TxtFormatter } from "./txt.js";
import { XmlFormatter } from "./xml.js";

export type { FormatInput, Formatter } from "./formatter.js";
export { JsonFormatter, MarkdownFormatter, SrtFormatter, TxtFormatter, VttFormatter, XmlFormatter };

export interface FormatChoice {
  choice: string;
  name: string;
  label: string;
  extension: string;
}

// Order defines the numeric menu choices 1..n
const FORMATTERS: readonly Formatter[] = [
  new TxtFormatter(),
  new JsonFormatter(),
  new XmlFormatter(),
  new MarkdownFormatter(),
  new SrtFormatter(),
  new VttFormatter(),
];

export function availableFormats(): FormatChoice[] {
  return FORMATTERS.map((f, i) => ({ choice: String(i + 1), name: f.name, label: f.label, extension: f.extension }));
}

/** Accepts a menu number, a format name or a file extension, case-insensitively. */
export function resolveFormatter(choice: string): Formatter {
  const key = choice.trim().toLowerCase();
  const byIndex = /^\d+$/.test(key) ? FORMATTERS[parseInt(key, 10) - 1] : undefined;
  const found = byIndex ?? FORMATTERS.find((f) => f.name === key || f.extension === key);
  if (!found) {
    throw new UnsupportedFormatError(choice, availableFormats().map((f) => `${f.choice}/${f.name}`));
  }
  return found;
}
