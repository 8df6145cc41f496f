import path from "path";
import { composePodcast, parsePodcastScript, timelineToSrt } from "@speechsync/core";
import type { SpeechSegment } from "@speechsync/core";
import { z } from "zod";
import type { CliSettings } from "../config";
import { readJSON, readText, withExtension, writeText } from "../utils/file";
import { resolveTurnDuration } from "./durations";
import type { DurationSource } from "./durations";
import type { SubtitleOutput } from "./subtitle";

const manifestSchema = z.array(
  z.union([
    z.number().describe("Turn duration in seconds"),
    z.object({
      duration: z.number().optional(),
      audio: z.string().min(1).optional().describe("WAV or MP3 file of the turn"),
    }),
  ])
);

export type PodcastManifest = z.infer<typeof manifestSchema>;

export interface PodcastSubtitleOptions {
  scriptFile: string;
  /** JSON list with one duration or `{ duration, audio }` entry per turn. */
  manifestFile?: string;
  outputFile?: string;
}

export const readManifest = async (file: string): Promise<PodcastManifest> => {
  const raw = await readJSON(file);
  if (raw === null) {
    throw new Error(`Manifest not found: ${file}`);
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid manifest ${file}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
    );
  }
  return parsed.data;
};

const toDurationSource = (
  entry: PodcastManifest[number] | undefined,
  manifestFile: string
): DurationSource => {
  if (entry === undefined) return {};
  if (typeof entry === "number") return { duration: entry };

  const audioFile =
    entry.audio && !path.isAbsolute(entry.audio)
      ? path.join(path.dirname(manifestFile), entry.audio)
      : entry.audio;
  return { duration: entry.duration, audioFile };
};

export const createPodcastSubtitles = async (
  options: PodcastSubtitleOptions,
  settings: CliSettings
): Promise<SubtitleOutput> => {
  const turns = parsePodcastScript(await readText(options.scriptFile));
  const manifest = options.manifestFile
    ? await readManifest(options.manifestFile)
    : [];

  if (options.manifestFile && manifest.length !== turns.length) {
    throw new Error(
      `Manifest lists ${manifest.length} entries for ${turns.length} turns`
    );
  }

  const segments: SpeechSegment[] = await Promise.all(
    turns.map(async (turn, i) => ({
      text: turn.text,
      speakerLabel: turn.speakerLabel,
      totalDurationSeconds: await resolveTurnDuration(
        turn.text,
        toDurationSource(manifest[i], options.manifestFile ?? ""),
        settings
      ),
    }))
  );

  const timeline = composePodcast(segments, settings.sync);
  const srt = timelineToSrt(timeline, { lineEnding: settings.lineEnding });

  const outputFile =
    options.outputFile ?? withExtension(options.scriptFile, ".srt");
  await writeText(outputFile, srt);

  return { outputFile, timeline };
};
