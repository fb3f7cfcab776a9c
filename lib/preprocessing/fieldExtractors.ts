/**
 * Field extractors isolate raw substrings (flight codes, airport codes,
 * date/time text, durations) inside a window of a cleaned email body.
 * They never interpret what they find: dates stay strings, codes keep their case.
 */

export interface TextWindow {
  start: number;
  end: number;
}

export interface FieldMatch {
  value: string;
  start: number; // absolute offsets into the body
  end: number;
}

export type RawSegmentField =
  | 'flightNumber'
  | 'origin'
  | 'destination'
  | 'departureRaw'
  | 'arrivalRaw'
  | 'airlineRaw'
  | 'durationRaw';

/**
 * One row of a provider's extraction table. Anchors are tried in order and the
 * first one matching inside the window wins.
 */
export interface ExtractionRule<F extends string = RawSegmentField> {
  field: F;
  anchors: RegExp[];
  group?: number;
}

// Two-character designator with at least one letter ("VJ", "G3", "3K"), then the number
export const FLIGHT_CODE = '(?:[A-Z]{2}|[A-Z]\\d|\\d[A-Z])\\s?\\d{1,4}[A-Z]?';

export function wholeText(text: string): TextWindow {
  return { start: 0, end: text.length };
}

export function extractAll(
  text: string,
  pattern: RegExp,
  window: TextWindow = wholeText(text),
  group: number = 1
): FieldMatch[] {
  const flags = new Set(pattern.flags);
  flags.add('g');
  flags.add('d');
  const regex = new RegExp(pattern.source, Array.from(flags).join(''));
  const slice = text.slice(window.start, window.end);
  const matches: FieldMatch[] = [];

  for (const match of slice.matchAll(regex)) {
    const captured = match[group];
    const span = match.indices?.[group];
    if (captured === undefined || !span) continue;

    const value = captured.trim();
    if (!value) continue;

    const start = window.start + span[0] + (captured.length - captured.trimStart().length);
    matches.push({ value, start, end: start + value.length });
  }

  return matches;
}

export function extractFirst(
  text: string,
  pattern: RegExp,
  window?: TextWindow,
  group?: number
): FieldMatch | undefined {
  const [first] = extractAll(text, pattern, window, group);
  return first;
}

export function extractFields<F extends string>(
  text: string,
  rules: readonly ExtractionRule<F>[],
  window?: TextWindow
): Partial<Record<F, FieldMatch>> {
  const fields: Partial<Record<F, FieldMatch>> = {};

  for (const rule of rules) {
    if (fields[rule.field]) continue;

    for (const anchor of rule.anchors) {
      const match = extractFirst(text, anchor, window, rule.group ?? 1);
      if (match) {
        fields[rule.field] = match;
        break;
      }
    }
  }

  return fields;
}
