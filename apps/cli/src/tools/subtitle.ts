import { compose, timelineToSrt } from "@speechsync/core";
import type { Timeline } from "@speechsync/core";
import type { CliSettings } from "../config";
import { readText, withExtension, writeText } from "../utils/file";
import { resolveTurnDuration } from "./durations";
import type { DurationSource } from "./durations";

export interface TextSubtitleOptions extends DurationSource {
  inputFile: string;
  outputFile?: string;
  rate?: number;
}

export interface SubtitleOutput {
  outputFile: string;
  timeline: Timeline;
}

export const createTextSubtitles = async (
  options: TextSubtitleOptions,
  settings: CliSettings
): Promise<SubtitleOutput> => {
  const text = await readText(options.inputFile);
  const totalDurationSeconds = await resolveTurnDuration(
    text,
    options,
    settings,
    options.rate
  );

  const timeline = compose(
    { text, totalDurationSeconds, rate: options.rate },
    settings.sync
  );
  const srt = timelineToSrt(timeline, { lineEnding: settings.lineEnding });

  const outputFile =
    options.outputFile ?? withExtension(options.inputFile, ".srt");
  await writeText(outputFile, srt);

  return { outputFile, timeline };
};
