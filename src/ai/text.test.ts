import { describe, expect, it } from "vitest";
import { combineTranscriptText, parseTopicLines, truncateForPrompt, truncateSmartly } from "./text.js";

describe("truncateForPrompt", () => {
  it("cuts long text and marks the cut", () => {
    expect(truncateForPrompt("abcdef", 4)).toBe("abcd...");
    expect(truncateForPrompt("abc", 4)).toBe("abc");
  });
});

describe("truncateSmartly", () => {
  it("returns short text unchanged", () => {
    expect(truncateSmartly("short text", 20)).toBe("short text");
  });

  it("cuts after a sentence boundary past 80% of the limit", () => {
    const text = `${"a".repeat(17)}. ${"b".repeat(10)}`;
    expect(truncateSmartly(text, 20)).toBe(`${"a".repeat(17)}. `);
  });

  it("falls back to the last word boundary when sentences end too early", () => {
    const text = `aaaaa. ${"b".repeat(12)} ${"c".repeat(10)}`;
    expect(truncateSmartly(text, 20)).toBe(`aaaaa. ${"b".repeat(12)}`);
  });

  it("cuts hard when there is no boundary at all", () => {
    expect(truncateSmartly("x".repeat(30), 20)).toBe("x".repeat(20));
  });
});

describe("parseTopicLines", () => {
  it("strips bullets and numbering and caps the count", () => {
    const raw = "- Alpha\n• Beta\n* Gamma\n1. Delta\n\n2.Epsilon\nZeta";
    expect(parseTopicLines(raw, 5)).toEqual(["Alpha", "Beta", "Gamma", "Delta", "Epsilon"]);
  });

  it("skips bullets without text", () => {
    expect(parseTopicLines("-\n•", 5)).toEqual([]);
  });
});

describe("combineTranscriptText", () => {
  it("joins entry texts with spaces", () => {
    const entries = [
      { start: 0, duration: 1, text: "one", timestamp: "00:00" },
      { start: 1, duration: 1, text: "two", timestamp: "00:01" },
    ];
    expect(combineTranscriptText(entries)).toBe("one two");
  });
});
