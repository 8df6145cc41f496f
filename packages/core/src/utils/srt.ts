import { parseSync, parseTimestamp } from "subtitle";
import { FormatError, ParseError } from "../errors";
import type { Cue } from "../types/subtitle";

export type LineEnding = "\n" | "\r\n";

export interface FormatSrtOptions {
  lineEnding?: LineEnding;
}

const pad = (value: number, length = 2) =>
  value.toString().padStart(length, "0");

/**
 * Whole milliseconds in `seconds`, truncated. Rounding to the microsecond
 * first keeps values such as 1.005 (stored as 1.00499999...) at 1005.
 */
export const toMilliseconds = (seconds: number): number =>
  Math.floor(Math.round(seconds * 1e6) / 1e3);

/**
 * Formats seconds as `HH:MM:SS,mmm`. Hours are not wrapped at 24.
 */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = toMilliseconds(seconds);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const milliseconds = totalMs % 1000;

  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(milliseconds, 3)}`;
}

export function parseSrtTimestamp(timestamp: string): number {
  let milliseconds: number;
  try {
    milliseconds = parseTimestamp(timestamp.trim());
  } catch (error) {
    throw new ParseError(
      `Invalid SRT timestamp "${timestamp}": ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }
  if (!Number.isFinite(milliseconds)) {
    throw new ParseError(`Invalid SRT timestamp "${timestamp}"`);
  }
  return milliseconds / 1000;
}

const validateCue = (cue: Cue, position: number) => {
  if (cue.index !== position + 1) {
    throw new FormatError(
      cue.index,
      `expected index ${position + 1}; indices must run 1..N without gaps`
    );
  }
  if (!Number.isFinite(cue.start) || cue.start < 0) {
    throw new FormatError(cue.index, `start must be >= 0, got ${cue.start}`);
  }
  if (!Number.isFinite(cue.end) || cue.end <= cue.start) {
    throw new FormatError(
      cue.index,
      `end (${cue.end}) must be after start (${cue.start})`
    );
  }
  if (toMilliseconds(cue.end) <= toMilliseconds(cue.start)) {
    throw new FormatError(
      cue.index,
      "cue is shorter than one millisecond"
    );
  }
  if (!cue.text.trim()) {
    throw new FormatError(cue.index, "text is empty");
  }
  // A blank line terminates the cue block in SRT
  if (cue.text.split(/\r?\n/).some((line) => !line.trim())) {
    throw new FormatError(cue.index, "text contains a blank line");
  }
};

/**
 * Renders cues as SRT: index line, timing line, text lines and a blank line
 * per cue. Every cue is validated before anything is rendered.
 */
export function formatSrt(
  cues: readonly Cue[],
  options: FormatSrtOptions = {}
): string {
  const eol = options.lineEnding ?? "\n";
  cues.forEach(validateCue);

  return cues
    .map((cue) => {
      const timing = `${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}`;
      const lines = cue.text.split(/\r?\n/);
      return `${[String(cue.index), timing, ...lines].join(eol)}${eol}${eol}`;
    })
    .join("");
}

/**
 * Reads SRT text back into cues. Indices are renumbered by position.
 */
export function parseSrt(content: string): Cue[] {
  let nodes: ReturnType<typeof parseSync>;
  try {
    nodes = parseSync(content.replace(/\r\n/g, "\n"));
  } catch (error) {
    throw new ParseError(
      `Failed to parse SRT content: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }

  return nodes
    .flatMap((node) => (node.type === "cue" ? [node.data] : []))
    .map((data, position) => ({
      index: position + 1,
      start: data.start / 1000,
      end: data.end / 1000,
      text: data.text,
    }));
}
