import { createSyncConfig } from "../config";
import type { SyncConfig } from "../config";
import { InvalidInputError } from "../errors";
import type { SynthesisResult, TtsEngine } from "../types/engine";
import type { SpeechSegment, Timeline } from "../types/subtitle";
import { resolveDuration } from "../utils/audio-duration";
import type { SpeechEstimateOptions } from "../utils/audio-duration";
import type { FormatSrtOptions } from "../utils/srt";
import { compose, composePodcast, timelineToSrt } from "../utils/timeline";

export interface SynthesisRequest {
  text: string;
  voiceId: string;
  speakerLabel?: string;
  rate?: number;
  volume?: number;
}

export interface SynthesizeOptions extends FormatSrtOptions {
  /** Used when the engine reports neither a duration nor measurable audio. */
  fallbackEstimate?: Pick<SpeechEstimateOptions, "charsPerSecond">;
}

export interface SubtitledSpeech {
  audio?: Uint8Array;
  segment: SpeechSegment;
  timeline: Timeline;
  srt: string;
}

export interface SubtitledPodcast {
  /** One entry per turn, in script order. */
  audio: Array<Uint8Array | undefined>;
  segments: SpeechSegment[];
  timeline: Timeline;
  srt: string;
}

const ensureAvailable = async (engine: TtsEngine) => {
  if (!(await engine.isAvailable())) {
    throw new InvalidInputError(`TTS engine "${engine.name}" is not available`);
  }
};

const toSegment = async (
  request: SynthesisRequest,
  result: SynthesisResult,
  options: SynthesizeOptions
): Promise<SpeechSegment> => ({
  text: request.text,
  totalDurationSeconds: await resolveDuration(result, request.text, {
    ...options.fallbackEstimate,
    rate: request.rate,
  }),
  speakerLabel: request.speakerLabel,
  rate: request.rate,
  volume: request.volume,
});

const synthesizeRequest = (
  engine: TtsEngine,
  request: SynthesisRequest,
  config: SyncConfig
) =>
  engine.synthesize(request.text, request.voiceId, {
    rate: request.rate,
    volume: request.volume,
    language: config.language,
  });

/**
 * Synthesizes one segment and times its subtitles against the resulting
 * audio length.
 */
export async function synthesizeWithSubtitles(
  engine: TtsEngine,
  request: SynthesisRequest,
  config: SyncConfig = createSyncConfig(),
  options: SynthesizeOptions = {}
): Promise<SubtitledSpeech> {
  await ensureAvailable(engine);
  const result = await synthesizeRequest(engine, request, config);
  const segment = await toSegment(request, result, options);
  const timeline = compose(segment, config);

  return {
    audio: result.audio,
    segment,
    timeline,
    srt: timelineToSrt(timeline, options),
  };
}

/**
 * Synthesizes every turn concurrently, then composes one merged timeline.
 * Turn order follows `turns`, whatever order synthesis finishes in.
 */
export async function synthesizePodcast(
  engine: TtsEngine,
  turns: readonly SynthesisRequest[],
  config: SyncConfig = createSyncConfig(),
  options: SynthesizeOptions = {}
): Promise<SubtitledPodcast> {
  await ensureAvailable(engine);
  const results = await Promise.all(
    turns.map((turn) => synthesizeRequest(engine, turn, config))
  );

  const segments = await Promise.all(
    turns.map((turn, i) => toSegment(turn, results[i], options))
  );
  const timeline = composePodcast(segments, config);

  return {
    audio: results.map((result) => result.audio),
    segments,
    timeline,
    srt: timelineToSrt(timeline, options),
  };
}
