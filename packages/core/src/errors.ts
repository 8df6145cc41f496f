export type SpeechSyncErrorCode =
  | "INVALID_INPUT"
  | "INVALID_SEGMENT"
  | "FORMAT"
  | "PARSE";

export class SpeechSyncError extends Error {
  readonly code: SpeechSyncErrorCode;

  constructor(code: SpeechSyncErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when the estimator or composer receives input it cannot time:
 * a non-positive duration or text without any sentence.
 */
export class InvalidInputError extends SpeechSyncError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class InvalidSegmentError extends SpeechSyncError {
  readonly turnIndex: number;

  constructor(turnIndex: number, message: string) {
    super("INVALID_SEGMENT", `Turn ${turnIndex}: ${message}`);
    this.turnIndex = turnIndex;
  }
}

export class FormatError extends SpeechSyncError {
  readonly cueIndex: number;

  constructor(cueIndex: number, message: string) {
    super("FORMAT", `Cue ${cueIndex}: ${message}`);
    this.cueIndex = cueIndex;
  }
}

export class ParseError extends SpeechSyncError {
  /** 1-based line number in the parsed text, when known. */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super("PARSE", line === undefined ? message : `Line ${line}: ${message}`);
    this.line = line;
  }
}
