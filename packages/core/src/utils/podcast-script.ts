import { ParseError } from "../errors";

export interface ScriptTurn {
  speakerLabel: string;
  text: string;
}

// A half-width colon only separates a speaker when whitespace or the end of
// the line follows it, so "at 10:30" stays text.
const speakerLinePattern = /^([^:：\s][^:：]{0,63}?)\s*(?::(?:\s+|$)|：)\s*(.*)$/u;

/**
 * Parses `Speaker: utterance` lines into turns, in script order.
 *
 * Blank lines are skipped. A line without a speaker prefix continues the
 * previous turn.
 */
export function parsePodcastScript(script: string): ScriptTurn[] {
  const turns: ScriptTurn[] = [];

  script.split(/\r?\n/).forEach((rawLine, i) => {
    const line = rawLine.trim();
    if (!line) return;

    const match = speakerLinePattern.exec(line);
    if (match) {
      turns.push({ speakerLabel: match[1].trim(), text: match[2].trim() });
      return;
    }

    const previous = turns[turns.length - 1];
    if (!previous) {
      throw new ParseError(
        'Expected a "Speaker: text" line before any continuation text',
        i + 1
      );
    }
    previous.text = previous.text ? `${previous.text} ${line}` : line;
  });

  const empty = turns.findIndex((turn) => !turn.text);
  if (empty !== -1) {
    throw new ParseError(
      `Turn ${empty + 1} (${turns[empty].speakerLabel}) has no text`
    );
  }

  return turns;
}
