const englishAbbreviations = [
  "mr",
  "mrs",
  "ms",
  "dr",
  "prof",
  "st",
  "jr",
  "sr",
  "etc",
  "vs",
  "e.g",
  "i.e",
];

const vietnameseAbbreviations = ["ông", "bà", "cô", "chị", "anh", "em"];

const abbreviationsByLanguage: Record<string, readonly string[]> = {
  en: englishAbbreviations,
  vi: vietnameseAbbreviations,
};

/**
 * Returns the abbreviation set for a language code such as "en" or "vi-VN".
 * Unknown languages fall back to English.
 */
export const getAbbreviations = (language: string): ReadonlySet<string> => {
  const key = language.slice(0, 2).toLowerCase();
  const list = abbreviationsByLanguage[key] ?? englishAbbreviations;
  return new Set(list);
};

export type SpeakerLabelFormat = (label: string) => string;

export interface SyncConfig {
  language: string;
  /** Lower-cased tokens, without their trailing period. */
  abbreviations: ReadonlySet<string>;
  /** Silence inserted between sentence cues, in seconds. */
  sentenceGap: number;
  /** Silence between podcast turns, in seconds. */
  turnGap: number;
  speakerLabelFormat: SpeakerLabelFormat;
  /** Wrap cue text at word boundaries when set. */
  maxLineLength?: number;
}

export const defaultSpeakerLabelFormat: SpeakerLabelFormat = (label) =>
  `[${label}]: `;

export const createSyncConfig = (
  overrides: Partial<SyncConfig> = {}
): SyncConfig => {
  const language = overrides.language ?? "en";
  return {
    language,
    abbreviations: overrides.abbreviations ?? getAbbreviations(language),
    sentenceGap: overrides.sentenceGap ?? 0,
    turnGap: overrides.turnGap ?? 0,
    speakerLabelFormat:
      overrides.speakerLabelFormat ?? defaultSpeakerLabelFormat,
    maxLineLength: overrides.maxLineLength,
  };
};
