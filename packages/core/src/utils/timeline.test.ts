import { describe, it, expect } from "vitest";
import { createSyncConfig } from "../config";
import { InvalidInputError, InvalidSegmentError } from "../errors";
import type { Cue, SpeechSegment } from "../types/subtitle";
import { compose, composePodcast, timelineToSrt } from "./timeline";

const expectNoOverlap = (cues: Cue[]) => {
  for (let i = 0; i < cues.length - 1; i++) {
    expect(cues[i].end).toBeLessThanOrEqual(cues[i + 1].start);
  }
  cues.forEach((cue, i) => expect(cue.index).toBe(i + 1));
};

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("compose", () => {
  const text =
    "Hello world. This is the first sentence. How are you doing today?";

  it("should time each sentence and pin the last cue to the duration", () => {
    const timeline = compose({ text, totalDurationSeconds: 5.2 });

    expect(timeline.cues.map((cue) => cue.text)).toEqual([
      "Hello world.",
      "This is the first sentence.",
      "How are you doing today?",
    ]);
    expect(timeline.cues[0].start).toBe(0);
    expect(timeline.cues[2].end).toBe(5.2);
    expect(timeline.duration).toBe(5.2);
    expectNoOverlap(timeline.cues);
  });

  it("should render the documented SRT blocks", () => {
    const timeline = compose({ text, totalDurationSeconds: 5.2 });

    expect(timelineToSrt(timeline)).toBe(
      "1\n00:00:00,000 --> 00:00:00,990\nHello world.\n\n" +
        "2\n00:00:00,990 --> 00:00:03,219\nThis is the first sentence.\n\n" +
        "3\n00:00:03,219 --> 00:00:05,200\nHow are you doing today?\n\n"
    );
  });

  it("should not prefix a speaker label", () => {
    const timeline = compose({
      text: "Just me.",
      totalDurationSeconds: 1,
      speakerLabel: "Alice",
    });
    expect(timeline.cues).toEqual([
      { index: 1, start: 0, end: 1, text: "Just me." },
    ]);
  });

  it("should separate cues by the configured sentence gap", () => {
    const timeline = compose(
      { text, totalDurationSeconds: 5.2 },
      createSyncConfig({ sentenceGap: 0.1 })
    );

    expect(timeline.cues[0].end).toBeLessThan(timeline.cues[1].start);
    expect(timeline.cues[1].end).toBeLessThan(timeline.cues[2].start);
    expect(timeline.cues[2].end).toBe(5.2);
  });

  it("should wrap long cue text when a line length is set", () => {
    const timeline = compose(
      {
        text: "This sentence is long enough to wrap twice.",
        totalDurationSeconds: 2,
      },
      createSyncConfig({ maxLineLength: 20 })
    );

    expect(timeline.cues[0].text).toBe(
      "This sentence is\nlong enough to wrap\ntwice."
    );
  });

  it("should split paragraphs into separate cues", () => {
    const timeline = compose({ text: "Intro\n\nHello world.", totalDurationSeconds: 2 });

    expect(timelineToSrt(timeline)).toBe(
      "1\n00:00:00,000 --> 00:00:00,588\nIntro\n\n" +
        "2\n00:00:00,588 --> 00:00:02,000\nHello world.\n\n"
    );
  });

  it("should render a cue for a sentence far shorter than its neighbour", () => {
    const timeline = compose({
      text: `Go. ${"B".repeat(3000)}.`,
      totalDurationSeconds: 0.5,
    });

    expect(timelineToSrt(timeline)).toBe(
      "1\n00:00:00,000 --> 00:00:00,001\nGo.\n\n" +
        `2\n00:00:00,001 --> 00:00:00,500\n${"B".repeat(3000)}.\n\n`
    );
  });

  it("should throw InvalidInputError for a zero duration", () => {
    expect(() => compose({ text, totalDurationSeconds: 0 })).toThrow(
      InvalidInputError
    );
  });

  it("should throw InvalidInputError when the text has no sentences", () => {
    expect(() => compose({ text: "   ", totalDurationSeconds: 2 })).toThrow(
      "Segment text contains no sentences"
    );
  });

  it("should throw InvalidInputError for a volume outside 0..1", () => {
    expect(() =>
      compose({ text, totalDurationSeconds: 2, volume: 1.5 })
    ).toThrow(InvalidInputError);
  });
});

describe("composePodcast", () => {
  it("should start the second turn at the first turn's duration", () => {
    const firstTurns = ["Hi there. How are you?", "Hi there."];

    for (const firstText of firstTurns) {
      const timeline = composePodcast([
        { text: firstText, totalDurationSeconds: 2.5, speakerLabel: "Alice" },
        { text: "Great, thanks.", totalDurationSeconds: 2.6, speakerLabel: "Bob" },
      ]);

      const secondTurnCue = timeline.cues[timeline.cues.length - 1];
      expect(secondTurnCue.start).toBe(2.5);
      expect(secondTurnCue.end).toBeCloseTo(5.1, 10);
      expect(secondTurnCue.text).toBe("[Bob]: Great, thanks.");
      expect(timeline.duration).toBeCloseTo(5.1, 10);
      expectNoOverlap(timeline.cues);
    }
  });

  it("should number cues contiguously across turns", () => {
    const timeline = composePodcast([
      { text: "One. Two.", totalDurationSeconds: 2, speakerLabel: "A" },
      { text: "Three. Four.", totalDurationSeconds: 2, speakerLabel: "B" },
    ]);

    expect(timeline.cues.map((cue) => cue.index)).toEqual([1, 2, 3, 4]);
    expect(timeline.cues.map((cue) => cue.text)).toEqual([
      "[A]: One.",
      "[A]: Two.",
      "[B]: Three.",
      "[B]: Four.",
    ]);
    expect(timeline.cues[2].start).toBe(2);
  });

  it("should insert the turn gap between turns only", () => {
    const timeline = composePodcast(
      [
        { text: "Hi there.", totalDurationSeconds: 2.5 },
        { text: "Great, thanks.", totalDurationSeconds: 2.6 },
      ],
      createSyncConfig({ turnGap: 0.5 })
    );

    expect(timeline.cues[1].start).toBe(3);
    expect(timeline.duration).toBeCloseTo(5.6, 10);
  });

  it("should leave unlabelled turns without a prefix", () => {
    const timeline = composePodcast([
      { text: "Narration.", totalDurationSeconds: 1 },
    ]);
    expect(timeline.cues[0].text).toBe("Narration.");
  });

  it("should use a custom speaker label format", () => {
    const timeline = composePodcast(
      [{ text: "Welcome.", totalDurationSeconds: 1, speakerLabel: "Host" }],
      createSyncConfig({ speakerLabelFormat: (label) => `${label}: ` })
    );
    expect(timeline.cues[0].text).toBe("Host: Welcome.");
  });

  it("should let a turn without text take time but add no cues", () => {
    const timeline = composePodcast([
      { text: "   ", totalDurationSeconds: 1 },
      { text: "Hello.", totalDurationSeconds: 2, speakerLabel: "A" },
    ]);

    expect(timeline.cues).toEqual([
      { index: 1, start: 1, end: 3, text: "[A]: Hello." },
    ]);
    expect(timeline.duration).toBe(3);
  });

  it("should reject a turn with a non-positive duration by index", () => {
    const turns: SpeechSegment[] = [
      { text: "Fine.", totalDurationSeconds: 1 },
      { text: "Broken.", totalDurationSeconds: 0 },
    ];

    const error = captureError(() => composePodcast(turns));

    expect(error).toBeInstanceOf(InvalidSegmentError);
    expect(error).toMatchObject({
      turnIndex: 1,
      message: "Turn 1: duration must be a positive number of seconds, got 0",
    });
  });

  it("should throw InvalidInputError for no turns", () => {
    expect(() => composePodcast([])).toThrow(InvalidInputError);
  });
});
