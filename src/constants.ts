/**
 * Centralized defaults for the generation API and caption lookup.
 */

// Default model used when GEMINI_MODEL is not set
export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export const AVAILABLE_GEMINI_MODELS = [
  "gemini-2.0-flash-exp",
  "gemini-2.5-flash",
  "gemini-1.5-flash",
  "gemini-1.5-pro",
] as const;

export type GeminiModel = (typeof AVAILABLE_GEMINI_MODELS)[number];

export function isKnownModel(model: string): model is GeminiModel {
  return AVAILABLE_GEMINI_MODELS.some((m) => m === model);
}

// Subtitle language priority when a request does not name one
export const DEFAULT_LANGUAGES = ["ko", "en"] as const;

// Longest transcript text forwarded to the generation API in one prompt
export const MAX_PROMPT_CHARS = 30_000;

export const SUMMARY_TEMPERATURE = 0.3;
export const TRANSLATION_TEMPERATURE = 0.3;
export const TOPICS_TEMPERATURE = 0.5;

export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  ko: "Korean",
  en: "English",
  ja: "Japanese",
  zh: "Chinese",
  es: "Spanish",
  fr: "French",
  de: "German",
  it: "Italian",
  pt: "Portuguese",
  ru: "Russian",
  ar: "Arabic",
  vi: "Vietnamese",
  th: "Thai",
  id: "Indonesian",
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}
