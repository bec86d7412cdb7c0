import "dotenv/config";
import path from "node:path";
import { DEFAULT_GEMINI_MODEL, DEFAULT_LANGUAGES } from "./constants.js";

export interface ServiceConfig {
  serviceName: string;
  description: string;
  version: string;
  host: string;
  port: number;
  apiKey?: string; // when set, requests must carry a matching x-api-key header
  logLevel: string;
  corsOrigins: string[];
  ytdlpCmd: string;
  ytdlpTimeoutMs: number;
  // Gemini configuration
  geminiApiKey?: string;
  geminiModel: string;
  geminiRetryCount: number;
  geminiRetryDelayMs: number;
  geminiTimeoutMs: number;
  defaultLanguages: string[];
  defaultMaxSummaryPoints: number;
  defaultNumTopics: number;
  outputDir: string;
}

export const rootDir = path.resolve(process.cwd());

function parseList(raw: string | undefined, fallback: readonly string[]): string[] {
  const items = (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : [...fallback];
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? "", 10);
  return Number.isFinite(n) ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const logLevel = env.LOG_LEVEL || "info";
  const port = parseIntOr(env.PORT, 8000);

  // GEMINI_API_KEY wins over GOOGLE_API_KEY
  const geminiApiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY || undefined;

  return {
    serviceName: "YouTube Script Scraper API",
    description: "Scrapes YouTube videos and playlists, with optional Gemini summaries, translations and topics",
    version: "3.0.0",
    host: env.HOST || "0.0.0.0",
    port,
    apiKey: env.API_KEY || undefined,
    logLevel,
    corsOrigins: parseList(env.CORS_ORIGINS, ["*"]),
    ytdlpCmd: env.YTDLP_CMD || "yt-dlp",
    ytdlpTimeoutMs: Math.max(5000, parseIntOr(env.YTDLP_TIMEOUT_MS, 60000)),
    geminiApiKey,
    geminiModel: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    geminiRetryCount: Math.max(1, parseIntOr(env.GEMINI_RETRY_COUNT, 3)),
    geminiRetryDelayMs: Math.max(0, parseIntOr(env.GEMINI_RETRY_DELAY_MS, 1000)),
    geminiTimeoutMs: Math.max(1000, parseIntOr(env.GEMINI_TIMEOUT_MS, 30000)),
    defaultLanguages: parseList(env.DEFAULT_LANGUAGES, DEFAULT_LANGUAGES),
    defaultMaxSummaryPoints: 5,
    defaultNumTopics: 5,
    outputDir: env.OUTPUT_DIR || path.join(rootDir, "output"),
  };
}
