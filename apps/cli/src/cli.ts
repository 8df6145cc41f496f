import dotenv from "dotenv";
import { parseArgs } from "node:util";
import { loadSettings } from "./config";
import { createPodcastSubtitles } from "./tools/podcast";
import { createTextSubtitles } from "./tools/subtitle";

dotenv.config();

const usage = `Usage:
  speechsync text <input.txt> [--duration <seconds> | --audio <file.wav|file.mp3>] [--rate <n>]
  speechsync podcast <script.txt> [--manifest <durations.json>]

Options:
  --out <file.srt>        Output path (default: input name with .srt)
  --language <code>       Sentence rules, e.g. en, vi, zh
  --sentence-gap <s>      Silence between sentence cues
  --turn-gap <s>          Silence between podcast turns
  --max-line-length <n>   Wrap cue text
  --crlf                  Write CRLF line endings
`;

const parseNumber = (name: string, value: string | undefined) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} expects a number, got "${value}"`);
  }
  return parsed;
};

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string" },
      duration: { type: "string" },
      audio: { type: "string" },
      rate: { type: "string" },
      manifest: { type: "string" },
      language: { type: "string" },
      "sentence-gap": { type: "string" },
      "turn-gap": { type: "string" },
      "max-line-length": { type: "string" },
      crlf: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  const [command, input] = positionals;
  if (values.help || !command || !input) {
    console.log(usage);
    process.exit(values.help ? 0 : 1);
  }

  // Flags take precedence over the environment
  const settings = loadSettings({
    ...process.env,
    ...(values.language ? { SPEECHSYNC_LANGUAGE: values.language } : {}),
    ...(values["sentence-gap"]
      ? { SPEECHSYNC_SENTENCE_GAP: values["sentence-gap"] }
      : {}),
    ...(values["turn-gap"] ? { SPEECHSYNC_TURN_GAP: values["turn-gap"] } : {}),
    ...(values["max-line-length"]
      ? { SPEECHSYNC_MAX_LINE_LENGTH: values["max-line-length"] }
      : {}),
    ...(values.crlf ? { SPEECHSYNC_LINE_ENDING: "crlf" } : {}),
  });

  switch (command) {
    case "text": {
      console.log(`Timing subtitles for ${input}...`);
      const { outputFile, timeline } = await createTextSubtitles(
        {
          inputFile: input,
          outputFile: values.out,
          duration: parseNumber("duration", values.duration),
          audioFile: values.audio,
          rate: parseNumber("rate", values.rate),
        },
        settings
      );
      console.log(
        `Wrote ${timeline.cues.length} cues (${timeline.duration.toFixed(3)}s) to ${outputFile}`
      );
      break;
    }
    case "podcast": {
      console.log(`Composing podcast subtitles for ${input}...`);
      const { outputFile, timeline } = await createPodcastSubtitles(
        {
          scriptFile: input,
          manifestFile: values.manifest,
          outputFile: values.out,
        },
        settings
      );
      console.log(
        `Wrote ${timeline.cues.length} cues (${timeline.duration.toFixed(3)}s) to ${outputFile}`
      );
      break;
    }
    default:
      throw new Error(`Unknown command "${command}"\n\n${usage}`);
  }
}

main().catch((error) => {
  console.error(
    "Error in CLI:",
    error instanceof Error ? error.message : error
  );
  process.exit(1);
});
