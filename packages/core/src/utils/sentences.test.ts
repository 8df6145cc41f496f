import { describe, it, expect } from "vitest";
import { getAbbreviations } from "../config";
import { isAbbreviation, segmentSentences } from "./sentences";

describe("segmentSentences", () => {
  it("should return an empty array for empty or whitespace-only text", () => {
    expect(segmentSentences("")).toEqual([]);
    expect(segmentSentences("  \n\t ")).toEqual([]);
  });

  it("should return the trimmed input when there is no terminal punctuation", () => {
    expect(segmentSentences("  just some words here  ")).toEqual([
      "just some words here",
    ]);
  });

  it("should split on periods, exclamation and question marks", () => {
    expect(
      segmentSentences(
        "Hello world. This is the first sentence. How are you doing today?"
      )
    ).toEqual([
      "Hello world.",
      "This is the first sentence.",
      "How are you doing today?",
    ]);
  });

  it("should not split after a known abbreviation", () => {
    expect(segmentSentences("Dr. Smith arrived.")).toEqual([
      "Dr. Smith arrived.",
    ]);
    expect(
      segmentSentences(
        "Mrs. Brown met Prof. Green at St. Paul's church. They talked."
      )
    ).toEqual([
      "Mrs. Brown met Prof. Green at St. Paul's church.",
      "They talked.",
    ]);
  });

  it("should not split after initials", () => {
    expect(
      segmentSentences("J. R. R. Tolkien wrote books. He was British.")
    ).toEqual(["J. R. R. Tolkien wrote books.", "He was British."]);
    expect(segmentSentences("The U.S. Army arrived. It was late.")).toEqual([
      "The U.S. Army arrived.",
      "It was late.",
    ]);
  });

  it("should keep decimal numbers inside a sentence", () => {
    expect(
      segmentSentences("Pi is about 3.14 in most cases. Engineers round it.")
    ).toEqual(["Pi is about 3.14 in most cases.", "Engineers round it."]);
  });

  it("should not split an ellipsis followed by lowercase text", () => {
    expect(segmentSentences("Wait... what happened? Nobody knows!")).toEqual([
      "Wait... what happened?",
      "Nobody knows!",
    ]);
  });

  it("should treat consecutive punctuation as one boundary", () => {
    expect(segmentSentences("Really?! I had no idea.")).toEqual([
      "Really?!",
      "I had no idea.",
    ]);
  });

  it("should require an uppercase letter after the punctuation", () => {
    expect(segmentSentences("Is it? maybe not.")).toEqual([
      "Is it? maybe not.",
    ]);
  });

  it("should keep closing quotes with their sentence", () => {
    expect(segmentSentences('She said "Hello." Then she left.')).toEqual([
      'She said "Hello."',
      "Then she left.",
    ]);
  });

  it("should split across newlines", () => {
    expect(segmentSentences("Line one.\nLine two.")).toEqual([
      "Line one.",
      "Line two.",
    ]);
  });

  it("should end a sentence at a blank line", () => {
    expect(segmentSentences("Introduction\n\nHello world. Bye now.")).toEqual([
      "Introduction",
      "Hello world.",
      "Bye now.",
    ]);
    expect(segmentSentences("first part\n  \nsecond part")).toEqual([
      "first part",
      "second part",
    ]);
  });

  it("should give a straight quote right after a sentence to the next one", () => {
    expect(segmentSentences('He left."Wait," she said.')).toEqual([
      "He left.",
      '"Wait," she said.',
    ]);
  });

  it("should split on full-width terminators without spaces", () => {
    expect(segmentSentences("你好。今天天气很好！我们走吧？")).toEqual([
      "你好。",
      "今天天气很好！",
      "我们走吧？",
    ]);
  });

  it("should use the abbreviation set of the configured language", () => {
    const text = "Chào Ông. Nam đến rồi. Tạm biệt.";
    expect(segmentSentences(text, { language: "vi" })).toEqual([
      "Chào Ông. Nam đến rồi.",
      "Tạm biệt.",
    ]);
    expect(segmentSentences(text)).toEqual([
      "Chào Ông.",
      "Nam đến rồi.",
      "Tạm biệt.",
    ]);
  });

  it("should accept a custom abbreviation set", () => {
    const text = "See Fig. Three for details.";
    expect(
      segmentSentences(text, { abbreviations: new Set(["fig"]) })
    ).toEqual(["See Fig. Three for details."]);
    expect(segmentSentences(text)).toEqual(["See Fig.", "Three for details."]);
  });

  it("should not drop characters when sentences are joined back", () => {
    const text = "First one. Second one! Third one? Tail";
    const sentences = segmentSentences(text);
    expect(sentences).toHaveLength(4);
    expect(sentences.join(" ")).toBe(text);
  });
});

describe("isAbbreviation", () => {
  const english = getAbbreviations("en");

  it("should match case-insensitively", () => {
    expect(isAbbreviation("DR", english)).toBe(true);
    expect(isAbbreviation("etc", english)).toBe(true);
    expect(isAbbreviation("e.g", english)).toBe(true);
  });

  it("should treat single letters as initials", () => {
    expect(isAbbreviation("J", english)).toBe(true);
  });

  it("should reject ordinary words and empty tokens", () => {
    expect(isAbbreviation("world", english)).toBe(false);
    expect(isAbbreviation("", english)).toBe(false);
  });
});
