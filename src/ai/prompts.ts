import { languageName } from "../constants.js";

export function summaryPrompt(text: string, maxPoints: number, language: string): string {
  return `Summarize the following YouTube video script into ${maxPoints} key points.
Write each point as one or two concise sentences and respond in ${languageName(language)}.

Script:
${text}

Output format:
1. [first key point]
2. [second key point]
...
`;
}

export function translationPrompt(text: string, targetLanguage: string, sourceLanguage?: string): string {
  const from = sourceLanguage ? `${languageName(sourceLanguage)} ` : "";
  return `Translate the following ${from}text into ${languageName(targetLanguage)}. Output only the translation:

${text}`;
}

export function topicsPrompt(text: string, numTopics: number, language: string): string {
  return `Extract ${numTopics} key topics from the following YouTube video script.
Express each topic as a short keyword or phrase in ${languageName(language)}.

Script:
${text}

Output format (one topic per line):
- [Topic 1]
- [Topic 2]
...
`;
}
