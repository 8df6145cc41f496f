import path from "path";
import { estimateSpeechDuration, readAudioDuration } from "@speechsync/core";
import type { CliSettings } from "../config";
import { readBytes } from "../utils/file";

export interface DurationSource {
  /** Seconds, as measured by whatever produced the audio. */
  duration?: number;
  /** WAV or MP3 file whose length gives the duration. */
  audioFile?: string;
}

/**
 * An explicit duration wins and is passed through unchecked so the composer
 * can reject it. Otherwise the audio file is measured, and without audio the
 * length of the text is used.
 */
export const resolveTurnDuration = async (
  text: string,
  source: DurationSource,
  settings: CliSettings,
  rate?: number
): Promise<number> => {
  if (source.duration !== undefined) {
    return source.duration;
  }

  if (source.audioFile) {
    const format =
      path.extname(source.audioFile).toLowerCase() === ".mp3" ? "mp3" : "wav";
    const measured = await readAudioDuration(
      await readBytes(source.audioFile),
      format
    );
    if (measured === undefined) {
      throw new Error(`${source.audioFile} has no readable audio duration`);
    }
    return measured;
  }

  const estimate = estimateSpeechDuration(text, {
    charsPerSecond: settings.charsPerSecond,
    rate,
  });
  console.warn(
    `No duration or audio given; estimated ${estimate.toFixed(2)}s from text length`
  );
  return estimate;
};
