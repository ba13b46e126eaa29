import { stripComment } from './statement-buffer.js';

/** Inclusive, 1-based range of script lines. */
export interface LineRange {
  start: number;
  end: number;
}

function parseLineNumber(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`Invalid line number: ${text}`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Parses `start-end` or `start:end`.
 * @throws Error describing what is wrong with the range
 */
export function parseLineRange(value: string): LineRange {
  let delimiter = value.indexOf('-');
  if (delimiter < 0) {
    delimiter = value.indexOf(':');
  }
  if (delimiter < 0) {
    throw new Error("Line range must use '-' or ':' delimiter");
  }

  const startText = value.slice(0, delimiter).trim();
  const endText = value.slice(delimiter + 1).trim();
  if (startText === '' || endText === '') {
    throw new Error('Line range requires start and end values');
  }

  const start = parseLineNumber(startText);
  const end = parseLineNumber(endText);
  if (start === 0 || end === 0) {
    throw new Error('Line numbers start at 1');
  }
  if (end < start) {
    throw new Error('Line range end must be >= start');
  }
  return { start, end };
}

/**
 * Cuts the range out of a script. An end past the last line is clamped.
 * @throws Error when the range starts after the last line or holds only blank and comment lines
 */
export function selectLines(text: string, range: LineRange): string {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (lines.length < range.start) {
    throw new Error('Line range starts beyond end of file');
  }

  const selected = lines.slice(range.start - 1, range.end);
  if (selected.every(line => stripComment(line).trim() === '')) {
    throw new Error('No statements found in requested line range');
  }
  return selected.map(line => line + '\n').join('');
}
