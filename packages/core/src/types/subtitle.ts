/**
 * A single sentence produced by segmentation. Never empty after trimming.
 */
export type Sentence = string;

export interface SpeechSegment {
  text: string;
  /** Spoken length of the synthesized audio, in seconds. */
  totalDurationSeconds: number;
  speakerLabel?: string;
  /** Speech-rate multiplier the audio was synthesized with. */
  rate?: number;
  /** Output volume, 0..1. */
  volume?: number;
}

export interface SentenceTiming {
  start: number;
  end: number;
}

export interface Cue {
  index: number;
  start: number; // seconds
  end: number; // seconds
  text: string;
}

export interface Timeline {
  cues: Cue[];
  /** Seconds covered by the timeline; the offset the next segment starts at. */
  duration: number;
}
