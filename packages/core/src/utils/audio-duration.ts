import type { AudioFormat, SynthesisResult } from "../types/engine";
import { readMp3Duration } from "./mp3-duration";

const readTag = (view: DataView, offset: number) =>
  String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3)
  );

/**
 * Reads the spoken length of a RIFF/WAVE file from its `fmt ` and `data`
 * chunk headers. Returns undefined when the bytes are not a readable WAV.
 */
export function readWavDuration(bytes: Uint8Array): number | undefined {
  if (bytes.byteLength < 12) return undefined;

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (readTag(view, 0) !== "RIFF" || readTag(view, 8) !== "WAVE") {
    return undefined;
  }

  let byteRate: number | undefined;
  let offset = 12;

  while (offset + 8 <= bytes.byteLength) {
    const chunkId = readTag(view, offset);
    const chunkSize = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (chunkId === "fmt " && body + 16 <= bytes.byteLength) {
      byteRate = view.getUint32(body + 8, true);
    } else if (chunkId === "data") {
      if (!byteRate) return undefined;
      // Streamed files may leave the size as 0 or 0xFFFFFFFF
      const available = bytes.byteLength - body;
      const dataSize =
        chunkSize === 0 || chunkSize > available ? available : chunkSize;
      return dataSize / byteRate;
    }

    // chunks are word-aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  return undefined;
}

export interface SpeechEstimateOptions {
  charsPerSecond?: number;
  rate?: number;
}

/**
 * Rough spoken length from text alone, never below one second.
 */
export function estimateSpeechDuration(
  text: string,
  { charsPerSecond = 15, rate = 1 }: SpeechEstimateOptions = {}
): number {
  return Math.max(1, text.trim().length / (charsPerSecond * rate));
}

/**
 * Reads the length of WAV or MP3 audio from its own headers and frames.
 */
export async function readAudioDuration(
  bytes: Uint8Array,
  format: AudioFormat = "wav"
): Promise<number | undefined> {
  return format === "mp3" ? readMp3Duration(bytes) : readWavDuration(bytes);
}

/**
 * Picks the best known duration for a synthesis result: the engine's own
 * report, then the audio itself, then a text-length estimate.
 */
export async function resolveDuration(
  result: SynthesisResult,
  text: string,
  options: SpeechEstimateOptions = {}
): Promise<number> {
  if (
    result.durationSeconds !== undefined &&
    Number.isFinite(result.durationSeconds) &&
    result.durationSeconds > 0
  ) {
    return result.durationSeconds;
  }

  if (result.audio) {
    const measured = await readAudioDuration(result.audio, result.format);
    if (measured !== undefined && measured > 0) {
      return measured;
    }
  }

  return estimateSpeechDuration(text, options);
}
