import { describe, expect, it } from "vitest";
import { createCliLogger, createLogger } from "./logger.js";

function sink() {
  const lines: Array<Record<string, unknown>> = [];
  return { lines, stream: { write: (line: string) => lines.push(JSON.parse(line)) } };
}

describe("createLogger", () => {
  it("writes to the given destination with the service binding", () => {
    const { lines, stream } = sink();
    createLogger({ destination: stream, base: { component: "test" } }).info("ready");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ msg: "ready", service: "yt-script-scraper", component: "test", level: 30 });
  });
});

describe("createCliLogger", () => {
  it("keeps only warnings unless verbose", () => {
    const { lines, stream } = sink();
    const logger = createCliLogger(false, stream);
    logger.info("hidden");
    logger.warn("shown");
    expect(lines.map((l) => l.msg)).toEqual(["shown"]);
  });

  it("logs debug lines when verbose", () => {
    const { lines, stream } = sink();
    createCliLogger(true, stream).debug("details");
    expect(lines.map((l) => [l.msg, l.level])).toEqual([["details", 20]]);
  });
});
