import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UnsupportedFormatError } from "../errors.js";
import {
  VIDEO_ID,
  VIDEO_URL,
  fakeFetch,
  fakeGenerator,
  fakeYtDlp,
  testConfig,
  testServices,
} from "../testing/fakes.js";

describe("ScrapeService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "scrape-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("adds AI extras and writes the result", async () => {
    const { generator, generate } = fakeGenerator();
    const { scrape } = testServices(testConfig(), { generator });

    const result = await scrape.scrape(VIDEO_URL, {
      languages: ["en"],
      enableSummary: true,
      enableTranslation: true,
      targetLanguage: "ko",
      enableTopics: true,
      outputFormat: "json",
      outputDir: dir,
    });

    expect(result.videoId).toBe(VIDEO_ID);
    expect(result.summary).toBe("1. First point\n2. Second point");
    expect(result.translation).toBe("Translated text");
    expect(result.keyTopics).toEqual(["AI", "Music"]);
    expect(result.outputFile).toBe(path.join(dir, "Test_Video_Part_1_dQw4w9WgXcQ.json"));

    const translatePrompt = generate.mock.calls.map(([prompt]) => prompt).find((p) => p.startsWith("Translate"));
    expect(translatePrompt).toBe(
      "Translate the following English text into Korean. Output only the translation:\n\nHello world Second line",
    );

    const saved: unknown = JSON.parse(await fs.readFile(path.join(dir, "Test_Video_Part_1_dQw4w9WgXcQ.json"), "utf-8"));
    expect(saved).toHaveProperty("aiSummary", "1. First point\n2. Second point");
    expect(saved).toHaveProperty("keyTopics", ["AI", "Music"]);
  });

  it("skips AI and writing when nothing asks for them", async () => {
    const { generator, generate } = fakeGenerator();
    const { scrape } = testServices(testConfig(), { generator });

    const result = await scrape.scrape(VIDEO_URL, { languages: ["en"] });

    expect(result.outputFile).toBeNull();
    expect(result.summary).toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });

  it("rejects an unknown format before fetching or generating", async () => {
    const { generator, generate } = fakeGenerator();
    const run = fakeYtDlp();
    const { scrape } = testServices(testConfig(), { generator, run });

    await expect(
      scrape.scrape(VIDEO_URL, { languages: ["en"], enableSummary: true, enableTopics: true, outputFormat: "pdf" }),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(run).not.toHaveBeenCalled();
    expect(generate).not.toHaveBeenCalled();
  });

  it("does not call the model for an empty transcript", async () => {
    const { generator, generate } = fakeGenerator();
    const { scrape } = testServices(testConfig(), { generator, fetchFn: fakeFetch("gone", 404) });

    const result = await scrape.scrape(VIDEO_URL, { languages: ["en"], enableSummary: true, enableTopics: true });

    expect(result.transcript).toEqual([]);
    expect(result.summary).toBeNull();
    expect(result.keyTopics).toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });
});
