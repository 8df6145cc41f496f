import { createSyncConfig } from "../config";
import type { SyncConfig } from "../config";
import { InvalidInputError, InvalidSegmentError } from "../errors";
import type { Cue, SentenceTiming, SpeechSegment, Timeline } from "../types/subtitle";
import { estimateTimings } from "./durations";
import { segmentSentences } from "./sentences";
import { formatSrt } from "./srt";
import type { FormatSrtOptions } from "./srt";
import { wrapText } from "./wrap";

const checkSegmentParameters = (
  segment: SpeechSegment
): string | undefined => {
  const duration = segment.totalDurationSeconds;
  if (!Number.isFinite(duration) || duration <= 0) {
    return `duration must be a positive number of seconds, got ${duration}`;
  }
  const rate = segment.rate ?? 1;
  if (!Number.isFinite(rate) || rate <= 0) {
    return `rate must be a positive number, got ${rate}`;
  }
  const volume = segment.volume ?? 1;
  if (!Number.isFinite(volume) || volume < 0 || volume > 1) {
    return `volume must be between 0 and 1, got ${volume}`;
  }
  return undefined;
};

const buildCues = (
  sentences: string[],
  timings: SentenceTiming[],
  config: SyncConfig,
  offset: number,
  firstIndex: number,
  prefix = ""
): Cue[] =>
  timings.map((timing, i) => {
    const text = `${prefix}${sentences[i]}`;
    return {
      index: firstIndex + i,
      start: offset + timing.start,
      end: offset + timing.end,
      text: config.maxLineLength ? wrapText(text, config.maxLineLength) : text,
    };
  });

/**
 * Times every sentence of one synthesized segment. Cues are numbered from 1
 * and carry no speaker label.
 */
export function compose(
  segment: SpeechSegment,
  config: SyncConfig = createSyncConfig()
): Timeline {
  const problem = checkSegmentParameters(segment);
  if (problem) {
    throw new InvalidInputError(problem);
  }

  const sentences = segmentSentences(segment.text, config);
  if (!sentences.length) {
    throw new InvalidInputError("Segment text contains no sentences");
  }

  const timings = estimateTimings(
    sentences,
    segment.totalDurationSeconds,
    segment.rate,
    config
  );

  return {
    cues: buildCues(sentences, timings, config, 0, 1),
    duration: segment.totalDurationSeconds,
  };
}

/**
 * Lays podcast turns end to end. Each turn is timed against its own duration,
 * then shifted by the durations of the turns before it plus `turnGap` per
 * turn boundary. Indices run contiguously across turns and labelled turns get
 * their speaker prefix.
 *
 * A turn whose text has no sentences adds no cues but still takes up its
 * duration. Any invalid turn rejects the whole podcast.
 */
export function composePodcast(
  turns: readonly SpeechSegment[],
  config: SyncConfig = createSyncConfig()
): Timeline {
  if (!turns.length) {
    throw new InvalidInputError("A podcast needs at least one turn");
  }

  turns.forEach((turn, turnIndex) => {
    const problem = checkSegmentParameters(turn);
    if (problem) {
      throw new InvalidSegmentError(turnIndex, problem);
    }
  });

  const cues: Cue[] = [];
  let offset = 0;

  for (const [turnIndex, turn] of turns.entries()) {
    if (turnIndex > 0) {
      offset += config.turnGap;
    }

    const sentences = segmentSentences(turn.text, config);
    if (sentences.length) {
      const timings = estimateTimings(
        sentences,
        turn.totalDurationSeconds,
        turn.rate,
        config
      );
      const prefix = turn.speakerLabel
        ? config.speakerLabelFormat(turn.speakerLabel)
        : "";
      cues.push(
        ...buildCues(sentences, timings, config, offset, cues.length + 1, prefix)
      );
    }

    offset += turn.totalDurationSeconds;
  }

  return { cues, duration: offset };
}

export const timelineToSrt = (
  timeline: Timeline,
  options?: FormatSrtOptions
): string => formatSrt(timeline.cues, options);
