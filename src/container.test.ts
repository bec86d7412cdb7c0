import pino from "pino";
import { describe, expect, it } from "vitest";
import { createServices } from "./container.js";
import { fakeGenerator, testConfig } from "./testing/fakes.js";

function capture() {
  const lines: Array<{ msg: string; model?: string }> = [];
  const logger = pino({ level: "warn" }, { write: (line: string) => lines.push(JSON.parse(line)) });
  return { logger, lines };
}

describe("createServices", () => {
  it("warns about a model outside the known list", () => {
    const { logger, lines } = capture();
    createServices(testConfig({ GEMINI_MODEL: "gemini-9-ultra" }), logger, { generator: fakeGenerator().generator });
    expect(lines.map((l) => [l.msg, l.model])).toEqual([
      ["unknown Gemini model, passing it to the API as given", "gemini-9-ultra"],
    ]);
  });

  it("stays quiet for a known model", () => {
    const { logger, lines } = capture();
    createServices(testConfig({ GEMINI_MODEL: "gemini-1.5-pro" }), logger, { generator: fakeGenerator().generator });
    expect(lines).toEqual([]);
  });

  it("warns once when AI is not configured", () => {
    const { logger, lines } = capture();
    const services = createServices(testConfig({ GEMINI_MODEL: "gemini-9-ultra" }), logger);
    expect(services.ai.isAvailable()).toBe(false);
    expect(lines.map((l) => l.msg)).toEqual(["GEMINI_API_KEY is not set; AI features are disabled"]);
  });
});
