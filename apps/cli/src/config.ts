import { createSyncConfig } from "@speechsync/core";
import type { LineEnding, SyncConfig } from "@speechsync/core";
import { z } from "zod";

const envSchema = z.object({
  SPEECHSYNC_LANGUAGE: z.string().min(2).default("en"),
  SPEECHSYNC_SENTENCE_GAP: z.coerce.number().min(0).default(0),
  SPEECHSYNC_TURN_GAP: z.coerce.number().min(0).default(0),
  SPEECHSYNC_LINE_ENDING: z.enum(["lf", "crlf"]).default("lf"),
  SPEECHSYNC_MAX_LINE_LENGTH: z.coerce.number().int().positive().optional(),
  SPEECHSYNC_CHARS_PER_SECOND: z.coerce.number().positive().default(15),
});

export type SettingsEnv = z.input<typeof envSchema>;

export interface CliSettings {
  sync: SyncConfig;
  lineEnding: LineEnding;
  /** Speaking speed assumed when no duration or audio is given. */
  charsPerSecond: number;
}

export const loadSettings = (
  env: Record<string, string | undefined>
): CliSettings => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const settings = parsed.data;
  return {
    sync: createSyncConfig({
      language: settings.SPEECHSYNC_LANGUAGE,
      sentenceGap: settings.SPEECHSYNC_SENTENCE_GAP,
      turnGap: settings.SPEECHSYNC_TURN_GAP,
      maxLineLength: settings.SPEECHSYNC_MAX_LINE_LENGTH,
    }),
    lineEnding: settings.SPEECHSYNC_LINE_ENDING === "crlf" ? "\r\n" : "\n",
    charsPerSecond: settings.SPEECHSYNC_CHARS_PER_SECOND,
  };
};
