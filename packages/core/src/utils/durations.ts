import { InvalidInputError } from "../errors";
import type { SentenceTiming } from "../types/subtitle";
import { toMilliseconds } from "./srt";

export interface EstimateOptions {
  /** Silence between consecutive sentences, in seconds. */
  sentenceGap?: number;
}

/**
 * Spreads `totalDuration` across sentences in proportion to their trimmed
 * character length. The last sentence always ends exactly at
 * `totalDuration`.
 *
 * Boundaries between sentences sit on whole milliseconds, the resolution of
 * an SRT timestamp, and every sentence keeps at least one millisecond.
 *
 * `rate` is validated but does not change the split: the synthesized
 * duration already reflects it.
 *
 * With a positive `sentenceGap`, each gap is carved out of the two sentences
 * around it in proportion to their durations. A gap that would leave either
 * sentence without time is skipped.
 */
export function estimateTimings(
  sentences: readonly string[],
  totalDuration: number,
  rate = 1,
  options: EstimateOptions = {}
): SentenceTiming[] {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw new InvalidInputError(
      `Total duration must be a positive number of seconds, got ${totalDuration}`
    );
  }
  if (sentences.length === 0) {
    throw new InvalidInputError("Cannot time an empty list of sentences");
  }
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new InvalidInputError(`Rate must be a positive number, got ${rate}`);
  }

  const count = sentences.length;
  const totalMs = toMilliseconds(totalDuration);
  if (totalMs < count) {
    throw new InvalidInputError(
      `${totalDuration}s is too short to give each of ${count} sentences a millisecond`
    );
  }

  const lengths = sentences.map((sentence) => sentence.trim().length);
  const totalLength = lengths.reduce((sum, length) => sum + length, 0);

  // No characters at all means an even split
  const durations = lengths.map((length) =>
    totalLength === 0
      ? totalDuration / count
      : totalDuration * (length / totalLength)
  );

  const boundaries = [0];
  let cursor = 0;
  for (let i = 0; i < count - 1; i++) {
    cursor += durations[i];
    boundaries.push(Math.round(cursor * 1000));
  }
  boundaries.push(totalMs);

  for (let i = 1; i < count; i++) {
    boundaries[i] = Math.max(boundaries[i], boundaries[i - 1] + 1);
  }
  for (let i = count - 1; i >= 1; i--) {
    boundaries[i] = Math.min(boundaries[i], boundaries[i + 1] - 1);
  }

  const starts = boundaries.slice(0, count);
  const ends = boundaries.slice(1);

  const gapMs = Math.round((options.sentenceGap ?? 0) * 1000);
  if (gapMs > 0) {
    for (let i = 0; i < count - 1; i++) {
      const left = ends[i] - starts[i];
      const right = ends[i + 1] - starts[i + 1];
      const cutLeft = Math.round(gapMs * (left / (left + right)));
      const cutRight = gapMs - cutLeft;

      if (ends[i] - cutLeft > starts[i] && ends[i + 1] > starts[i + 1] + cutRight) {
        ends[i] -= cutLeft;
        starts[i + 1] += cutRight;
      }
    }
  }

  return starts.map((start, i) => ({
    start: start / 1000,
    end: i === count - 1 ? totalDuration : ends[i] / 1000,
  }));
}
