export interface VoiceInfo {
  id: string;
  name: string;
  language: string;
  gender?: string;
}

export interface LanguageInfo {
  code: string;
  name: string;
}

export interface SynthesisOptions {
  rate?: number;
  volume?: number;
  language?: string;
}

export type AudioFormat = "wav" | "mp3";

export interface SynthesisResult {
  audio?: Uint8Array;
  format?: AudioFormat;
  /** Set when the engine reports the spoken length itself. */
  durationSeconds?: number;
}

/**
 * A pluggable text-to-speech backend. The synchronization engine never calls
 * one directly; it only consumes the durations a backend reports.
 */
export interface TtsEngine {
  readonly name: string;
  synthesize(
    text: string,
    voiceId: string,
    options?: SynthesisOptions
  ): Promise<SynthesisResult>;
  listVoices(): Promise<VoiceInfo[]>;
  listLanguages(): Promise<LanguageInfo[]>;
  isAvailable(): Promise<boolean>;
}
