import { type TextWindow, wholeText } from './fieldExtractors';

/**
 * Split a body into one window per flight leg. Every match of the header
 * starts a window that runs up to the next header; anything before the first
 * header is preamble. Without a header (or without any match) the whole body
 * is a single window.
 */
export function partitionWindows(text: string, header?: RegExp): TextWindow[] {
  if (!header) {
    return [wholeText(text)];
  }

  const flags = header.flags.includes('g') ? header.flags : `${header.flags}g`;
  const starts = Array.from(text.matchAll(new RegExp(header.source, flags)), match => match.index ?? 0);

  if (starts.length === 0) {
    return [wholeText(text)];
  }

  return starts.map((start, i) => ({
    start,
    end: i + 1 < starts.length ? starts[i + 1] : text.length
  }));
}
