import { afterEach, describe, expect, it } from "vitest";
import { buildApp, type App } from "./app.js";
import type { ServiceOverrides } from "./container.js";
import { PLAYLIST_URL, VIDEO_URL, fakeGenerator, fakeYtDlp, testConfig, testServices } from "./testing/fakes.js";
import { silentLogger } from "./utils/logger.js";

let app: App | undefined;

async function build(env: NodeJS.ProcessEnv = {}, overrides: ServiceOverrides = {}): Promise<App> {
  const config = testConfig(env);
  app = await buildApp({ config, services: testServices(config, overrides), logger: silentLogger() });
  return app;
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("meta routes", () => {
  it("reports health", async () => {
    const res = await (await build()).inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "healthy", version: "3.0.0", service: "YouTube Script Scraper API" });
  });

  it("lists tool schemas", async () => {
    const res = await (await build()).inject({ method: "GET", url: "/tools/schemas" });
    expect(res.json()).toHaveProperty("format", "openai_function_calling");
    expect(res.json()).toHaveProperty("tools.length", 4);
  });
});

describe("API key", () => {
  it("guards every route except the public ones", async () => {
    const server = await build({ API_KEY: "test-secret" });

    const denied = await server.inject({ method: "GET", url: "/tools/schemas" });
    expect(denied.statusCode).toBe(401);
    expect(denied.json()).toEqual({ error: "Unauthorized: Invalid or missing API key" });

    const allowed = await server.inject({
      method: "GET",
      url: "/tools/schemas",
      headers: { "x-api-key": "test-secret" },
    });
    expect(allowed.statusCode).toBe(200);

    expect((await server.inject({ method: "GET", url: "/health" })).statusCode).toBe(200);
  });
});

describe("video routes", () => {
  it("returns metadata and transcript", async () => {
    const res = await (await build()).inject({
      method: "POST",
      url: "/video/info",
      payload: { videoUrl: VIDEO_URL, languages: ["en"] },
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toHaveProperty("metadata.title", "Test Video: Part 1!");
    expect(body).toHaveProperty("transcriptLanguage", "en");
    expect(body).toHaveProperty("transcript.length", 2);
  });

  it("validates the body", async () => {
    const res = await (await build()).inject({ method: "POST", url: "/video/info", payload: {} });
    expect(res.statusCode).toBe(400);
  });

  it("rejects unknown URLs", async () => {
    const res = await (await build()).inject({
      method: "POST",
      url: "/video/info",
      payload: { videoUrl: "https://vimeo.com/1" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Invalid YouTube URL: https://vimeo.com/1" });
  });

  it("wraps unexpected failures", async () => {
    const server = await build({}, { run: fakeYtDlp({ failFor: ["dQw4w9WgXcQ"] }) });
    const res = await server.inject({ method: "POST", url: "/video/info", payload: { videoUrl: VIDEO_URL } });
    expect(res.statusCode).toBe(500);
    const body: { error: string } = res.json();
    expect(body.error.startsWith("Failed to get video info: Command failed")).toBe(true);
  });

  it("rejects an unknown output format", async () => {
    const server = await build({}, { generator: fakeGenerator().generator });
    const res = await server.inject({
      method: "POST",
      url: "/video/scrape",
      payload: { videoUrl: VIDEO_URL, enableSummary: true, outputFormat: "pdf" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "Unsupported output format: pdf. Choose one of: 1/txt, 2/json, 3/xml, 4/markdown, 5/srt, 6/vtt",
    });
  });

  it("serves API v3 metadata", async () => {
    const res = await (await build()).inject({
      method: "GET",
      url: "/video/metadata",
      query: { videoUrl: VIDEO_URL, apiV3: "true" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toHaveProperty("kind", "youtube#video");
    expect(res.json()).toHaveProperty("contentDetails.duration", "PT3M32S");
  });

  it("serves the transcript alone", async () => {
    const res = await (await build()).inject({
      method: "GET",
      url: "/video/transcript",
      query: { videoUrl: VIDEO_URL, languages: "en" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { start: 0, duration: 2, text: "Hello world", timestamp: "00:00" },
      { start: 2, duration: 1.5, text: "Second line", timestamp: "00:02" },
    ]);
  });
});

describe("playlist routes", () => {
  it("refuses video URLs", async () => {
    const res = await (await build()).inject({
      method: "POST",
      url: "/playlist/info",
      payload: { playlistUrl: VIDEO_URL },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Provided URL is not a playlist URL" });
  });

  it("returns a limited video list", async () => {
    const res = await (await build()).inject({
      method: "POST",
      url: "/playlist/info",
      payload: { playlistUrl: PLAYLIST_URL, maxVideos: 1 },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      videos: [
        {
          videoId: "aaaaaaaaaaa",
          url: "https://www.youtube.com/watch?v=aaaaaaaaaaa",
          title: "First",
          index: 1,
          position: 0,
        },
      ],
      totalVideos: 2,
      returnedVideos: 1,
    });
  });

  it("classifies URLs", async () => {
    const res = await (await build()).inject({ method: "GET", url: "/playlist/check", query: { url: VIDEO_URL } });
    expect(res.json()).toEqual({ url: VIDEO_URL, isPlaylist: false, type: "video" });
  });

  it("lists videos as API v3 items", async () => {
    const res = await (await build()).inject({
      method: "GET",
      url: "/playlist/videos",
      query: { playlistUrl: PLAYLIST_URL, apiV3: "true" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toHaveProperty("count", 2);
    expect(res.json()).toHaveProperty("playlist.kind", "youtube#playlist");
  });
});

describe("ai routes", () => {
  it("answer 503 without a configured key", async () => {
    const res = await (await build()).inject({ method: "POST", url: "/ai/summary", payload: { text: "Hello" } });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: "AI service is not available. Please check API key configuration." });
  });

  it("report AI health", async () => {
    const res = await (await build()).inject({ method: "GET", url: "/ai/health" });
    expect(res.json()).toEqual({ available: false, model: "gemini-2.5-flash", apiKeyConfigured: false });
  });

  it("summarize text", async () => {
    const server = await build({}, { generator: fakeGenerator().generator });
    const res = await server.inject({
      method: "POST",
      url: "/ai/summary",
      payload: { text: "Hello there", maxPoints: 2, language: "en" },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      summary: "1. First point\n2. Second point",
      originalLength: 11,
      summaryLength: 30,
      language: "en",
    });
  });

  it("extract topics with defaults", async () => {
    const server = await build({}, { generator: fakeGenerator().generator });
    const res = await server.inject({ method: "POST", url: "/ai/topics", payload: { text: "Hello there" } });
    expect(res.json()).toEqual({ topics: ["AI", "Music"], numTopics: 2, language: "ko" });
  });

  it("fail when the model returns nothing", async () => {
    const server = await build({}, { generator: fakeGenerator({ summary: "" }).generator });
    const res = await server.inject({ method: "POST", url: "/ai/summary", payload: { text: "Hello there" } });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Failed to generate summary: no summary returned" });
  });

  it("enhance text with summary and topics by default", async () => {
    const server = await build({}, { generator: fakeGenerator().generator });
    const res = await server.inject({ method: "POST", url: "/ai/enhance", payload: { text: "Hello there" } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      summary: "1. First point\n2. Second point",
      translation: null,
      topics: ["AI", "Music"],
    });
  });

  it("reject empty text", async () => {
    const server = await build({}, { generator: fakeGenerator().generator });
    const res = await server.inject({ method: "POST", url: "/ai/translate", payload: { text: "", targetLanguage: "en" } });
    expect(res.statusCode).toBe(400);
  });
});
