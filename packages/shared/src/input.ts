// Input splitting shared by the daily parsers. No trimming of line content unless stated.

const LINE_BREAK = /\r?\n/;
const BLANK_LINE = /\r?\n[ \t]*\r?\n/;

/**
 * Lines of `input` that contain something other than whitespace, in order and untrimmed.
 */
export function parseLines(input: string): string[] {
  return input.split(LINE_BREAK).filter((line) => line.trim().length > 0);
}

/**
 * Blank-line separated sections of `input`, each trimmed. Empty sections (runs of blank lines, or
 * leading and trailing padding) are dropped.
 */
export function splitSections(input: string): string[] {
  return input
    .split(BLANK_LINE)
    .map((section) => section.trim())
    .filter((section) => section.length > 0);
}

/**
 * Whitespace-separated tokens of one line.
 */
export function splitWhitespace(line: string): string[] {
  const trimmed = line.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}
