import { getAbbreviations } from "../config";
import type { Sentence } from "../types/subtitle";

export interface SegmentOptions {
  language?: string;
  abbreviations?: ReadonlySet<string>;
}

// Full-width terminators end a sentence on their own; CJK text has no
// spaces or capitals to check after them.
const cjkTerminators = new Set(["。", "！", "？"]);
const terminators = new Set([".", "!", "?", "…", ...cjkTerminators]);
const closers = new Set(['"', "'", "”", "’", ")", "]", "」", "』"]);
const openers = new Set(['"', "'", "“", "‘", "(", "[", "{", "«", "「", "『"]);

// J. / J.R.R / U.S style initials
const initialsPattern = /^(\p{L}\.)*\p{L}$/u;

const isWhitespace = (char: string) => /\s/u.test(char);
const isUpperCase = (char: string) => /\p{Lu}/u.test(char);

/**
 * Token directly before `index`, without leading quotes or brackets.
 */
const precedingToken = (text: string, index: number): string => {
  let start = index;
  while (start > 0 && !isWhitespace(text[start - 1])) {
    start--;
  }
  return text.slice(start, index).replace(/^[^\p{L}\p{N}]+/u, "");
};

export const isAbbreviation = (
  token: string,
  abbreviations: ReadonlySet<string>
): boolean => {
  if (!token) return false;
  if (initialsPattern.test(token)) return true;
  return abbreviations.has(token.toLowerCase());
};

const nextVisibleChar = (text: string, from: number): string | undefined => {
  for (let i = from; i < text.length; i++) {
    if (!isWhitespace(text[i])) {
      return text[i];
    }
  }
  return undefined;
};

const isBoundary = (
  text: string,
  runStart: number,
  run: string,
  after: number,
  abbreviations: ReadonlySet<string>
): boolean => {
  if ([...run].some((char) => cjkTerminators.has(char))) {
    return true;
  }

  if (run === "." && isAbbreviation(precedingToken(text, runStart), abbreviations)) {
    return false;
  }

  const next = nextVisibleChar(text, after);
  return next === undefined || isUpperCase(next) || openers.has(next);
};

// A blank line ends a sentence whatever precedes it
const paragraphBreak = /\n\s*\n/;

// Straight quotes both open and close
const ambiguousQuotes = new Set(['"', "'"]);

/**
 * Index just past the closing quotes and brackets that start at `from`.
 * A straight quote only closes when whitespace, the end of the text or
 * another closer follows it.
 */
const skipClosers = (text: string, from: number): number => {
  let after = from;
  while (after < text.length && closers.has(text[after])) {
    const next = text[after + 1];
    if (
      ambiguousQuotes.has(text[after]) &&
      next !== undefined &&
      !isWhitespace(next) &&
      !closers.has(next)
    ) {
      break;
    }
    after++;
  }
  return after;
};

const segmentParagraph = (
  text: string,
  abbreviations: ReadonlySet<string>,
  pushSentence: (raw: string) => void
) => {
  let sentenceStart = 0;
  let index = 0;

  while (index < text.length) {
    if (!terminators.has(text[index])) {
      index++;
      continue;
    }

    let runEnd = index;
    while (runEnd < text.length && terminators.has(text[runEnd])) {
      runEnd++;
    }

    const after = skipClosers(text, runEnd);
    const run = text.slice(index, runEnd);
    if (isBoundary(text, index, run, after, abbreviations)) {
      pushSentence(text.slice(sentenceStart, after));
      sentenceStart = after;
    }
    index = after;
  }

  pushSentence(text.slice(sentenceStart));
};

/**
 * Splits text into trimmed, non-empty sentences in reading order.
 *
 * A run of terminal punctuation (`.`, `!`, `?`, `…`, and the full-width
 * `。！？`) ends a sentence when the next visible character is the end of the
 * text, an uppercase letter, or an opening quote/bracket. A lone period after
 * a known abbreviation or an initial never ends one. Closing quotes and
 * brackets right after the punctuation stay with the sentence. A blank line
 * always ends a sentence, so no sentence spans a paragraph break.
 */
export function segmentSentences(
  text: string,
  options: SegmentOptions = {}
): Sentence[] {
  const abbreviations =
    options.abbreviations ?? getAbbreviations(options.language ?? "en");
  const sentences: Sentence[] = [];

  const pushSentence = (raw: string) => {
    const sentence = raw.trim();
    if (sentence) {
      sentences.push(sentence);
    }
  };

  for (const paragraph of text.split(paragraphBreak)) {
    segmentParagraph(paragraph, abbreviations, pushSentence);
  }
  return sentences;
}
