import { describe, it, expect } from "vitest";
import { wrapText } from "./wrap";

describe("wrapText", () => {
  it("should leave short text alone", () => {
    expect(wrapText("Short line.", 20)).toBe("Short line.");
  });

  it("should break at the last space that fits", () => {
    expect(wrapText("This sentence is long enough to wrap twice.", 20)).toBe(
      "This sentence is\nlong enough to wrap\ntwice."
    );
  });

  it("should give an overlong word its own line", () => {
    expect(wrapText("a supercalifragilistic word", 10)).toBe(
      "a\nsupercalifragilistic\nword"
    );
  });

  it("should not wrap text without spaces", () => {
    expect(wrapText("今天天气很好今天天气很好", 5)).toBe("今天天气很好今天天气很好");
  });
});
