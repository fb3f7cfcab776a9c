import { addDays, addYears, format, isValid, parse } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { UTCDate } from '@date-fns/utc';

// Tried when a provider passes no formats of its own
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'yyyy-MM-dd H:mm',
  'd MMM yyyy, H:mm',
  'd MMM yyyy H:mm',
  'd MMMM yyyy, H:mm',
  'd MMM, H:mm',
  'MMM d, yyyy H:mm',
  'MMM d, yyyy h:mm a',
  'd/M/yyyy H:mm',
  'yyyy-MM-dd',
  'd MMM yyyy',
  'd MMMM yyyy'
];

// Arrival lines often carry only a clock time
export const TIME_ONLY_FORMATS: readonly string[] = ['H:mm', 'h:mm a', 'h:mma'];

const WALL_CLOCK = "yyyy-MM-dd'T'HH:mm:ss";
const OFFSET_DATE_TIME = "yyyy-MM-dd'T'HH:mm:ssxxx";

// Pinning an explicit zero offset keeps date-fns from handing the parsed
// fields to the host time zone, whose DST gaps would otherwise move them.
const PINNED_OFFSET_TEXT = ' +00:00';
const PINNED_OFFSET_TOKEN = ' xxx';

export interface CleanedDateText {
  text: string;
  dayOffset: number; // from "+1", "(+1)", "+1 day"
}

export interface ParsedLocalDateTime {
  local: UTCDate;    // wall-clock time held in UTC fields, independent of the host zone
  format: string;
  hasYear: boolean;
  hasDate: boolean;
  dayOffset: number;
}

export interface ResolvedDateTime {
  iso: string;       // "2024-06-15T08:30:00+07:00"
  instant: Date;
  local: UTCDate;
  timeZone: string;
}

export function cleanDateText(raw: string): CleanedDateText {
  let text = raw.replace(/\s+/g, ' ').trim();
  let dayOffset = 0;

  const nextDay = text.match(/\s*\(?\+(\d)\s*(?:days?)?\)?$/i);
  if (nextDay && nextDay.index !== undefined) {
    dayOffset = parseInt(nextDay[1], 10);
    text = text.slice(0, nextDay.index).trim();
  }

  text = text.replace(/^(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i, '');

  return { text, dayOffset };
}

/**
 * Try each candidate format in order; the first valid parse wins. Units the
 * format does not carry (the year, usually) come from the calendar day of the
 * reference date.
 */
export function parseLocalDateTime(
  raw: string,
  formats: readonly string[],
  referenceDate: Date
): ParsedLocalDateTime | null {
  const { text, dayOffset } = cleanDateText(raw);
  if (!text) return null;

  const reference = new UTCDate(
    referenceDate.getFullYear(),
    referenceDate.getMonth(),
    referenceDate.getDate()
  );

  for (const candidate of formats) {
    const parsed = parse(text + PINNED_OFFSET_TEXT, candidate + PINNED_OFFSET_TOKEN, reference);
    if (isValid(parsed)) {
      return {
        local: parsed,
        format: candidate,
        hasYear: candidate.includes('y'),
        hasDate: candidate.includes('d'),
        dayOffset
      };
    }
  }

  return null;
}

export function toZonedDateTime(local: UTCDate, timeZone: string): ResolvedDateTime {
  const instant = fromZonedTime(format(local, WALL_CLOCK), timeZone);
  return {
    iso: formatInTimeZone(instant, timeZone, OFFSET_DATE_TIME),
    instant,
    local,
    timeZone
  };
}

export function resolveDeparture(
  raw: string,
  formats: readonly string[],
  hintYear: number,
  timeZone: string
): ResolvedDateTime | null {
  const parsed = parseLocalDateTime(raw, formats, new UTCDate(hintYear, 0, 1));
  if (!parsed) return null;

  return toZonedDateTime(addDays(parsed.local, parsed.dayOffset), timeZone);
}

/**
 * Arrival may be a full date-time or just a clock time. A bare time takes the
 * departure's calendar day; when the result does not come after departure the
 * missing part is inferred (next day for a bare time, next year for a date
 * without one).
 */
export function resolveArrival(
  raw: string,
  formats: readonly string[],
  departure: ResolvedDateTime,
  hintYear: number,
  timeZone: string
): ResolvedDateTime | null {
  const parsed =
    parseLocalDateTime(raw, formats, new UTCDate(hintYear, 0, 1)) ??
    parseLocalDateTime(raw, TIME_ONLY_FORMATS, departure.local);
  if (!parsed) return null;

  const local = addDays(parsed.local, parsed.dayOffset);
  const resolved = toZonedDateTime(local, timeZone);
  if (resolved.instant.getTime() > departure.instant.getTime()) {
    return resolved;
  }

  if (!parsed.hasDate) {
    console.log(`Inferred next-day arrival for "${raw}"`);
    return toZonedDateTime(addDays(local, 1), timeZone);
  }
  if (!parsed.hasYear) {
    console.log(`Inferred next-year arrival for "${raw}"`);
    return toZonedDateTime(addYears(local, 1), timeZone);
  }

  return resolved;
}
