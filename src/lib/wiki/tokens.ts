const FIELD_DELIMITERS = /\|\||\{\{|\}\}/;
const TAG_DELIMITERS = /\||\{\{|\}\}/;

export interface ScanWarning {
  source: string;
  line: number;
  message: string;
}

export interface ScanContext {
  source: string;
}

function split(line: string, pattern: RegExp): string[] {
  return line.split(pattern).filter((token) => token.length > 0);
}

/** Splits a table row on `||`, `{{` and `}}`, dropping empty tokens. */
export function splitFields(line: string): string[] {
  return split(line, FIELD_DELIMITERS);
}

/** Splits a template call on `|`, `{{` and `}}`, dropping empty tokens. */
export function splitTagTokens(line: string): string[] {
  return split(line, TAG_DELIMITERS);
}

export function splitPipes(line: string): string[] {
  return line.split("|").filter((token) => token.length > 0);
}

/** First digit run in the text, with `,` group separators allowed. */
export function parseFirstInteger(text: string): number | undefined {
  const match = /\d[\d,]*/.exec(text);
  if (!match) {
    return undefined;
  }
  const parsed = Number.parseInt(match[0].replace(/,/g, ""), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Star and slot icons are counted, not parsed. */
export function countGlyphs(text: string): number {
  return [...text].length;
}

export function isIntegerToken(token: string): boolean {
  return /^\s*[+-]?\d+\s*$/.test(token);
}

/**
 * Removes a `rowspan` prefix cell: a leading `|`, then everything through the
 * next `|`. Returns undefined when the prefix cannot be located.
 */
export function stripRowspan(line: string): string | undefined {
  if (!line.includes("rowspan")) {
    return line;
  }
  const trimmed = line.startsWith("|") ? line.slice(1) : line;
  const pipeIndex = trimmed.indexOf("|");
  if (pipeIndex <= 0) {
    return undefined;
  }
  return trimmed.slice(pipeIndex + 1);
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}
