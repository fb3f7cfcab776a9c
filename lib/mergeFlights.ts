import { isValid, parseISO, startOfMinute } from 'date-fns';
import { UNKNOWN_AIRLINE, type FlightRecord, type TravelHistory } from './types';

function departureInstant(record: FlightRecord): Date | null {
  const instant = parseISO(record.departure);
  return isValid(instant) ? instant : null;
}

/**
 * Identity of a flight: number, route and departure instant to the minute
 * (in UTC, so "08:30+07:00" and "01:30Z" collide).
 */
export function dedupKey(record: FlightRecord): string {
  const instant = departureInstant(record);
  const departure = instant ? startOfMinute(instant).toISOString() : record.departure;
  return [record.flightNumber, record.origin, record.destination, departure].join('|');
}

function completeness(record: FlightRecord): number {
  return [
    record.arrival !== undefined,
    record.durationMinutes !== undefined,
    record.confirmationCode !== undefined,
    record.airline !== UNKNOWN_AIRLINE
  ].filter(Boolean).length;
}

// Best record first
function compareRank(a: FlightRecord, b: FlightRecord): number {
  return (
    completeness(b) - completeness(a) ||
    b.lastSeenAt.localeCompare(a.lastSeenAt) ||
    a.sourceEmailIds.join(',').localeCompare(b.sourceEmailIds.join(',')) ||
    JSON.stringify(a).localeCompare(JSON.stringify(b))
  );
}

function firstPresent<K extends keyof FlightRecord>(
  ranked: FlightRecord[],
  key: K
): FlightRecord[K] | undefined {
  return ranked.find(record => record[key] !== undefined)?.[key];
}

function mergeGroup(group: FlightRecord[]): FlightRecord {
  const ranked = [...group].sort(compareRank);
  const [best] = ranked;

  const arrival = firstPresent(ranked, 'arrival');
  const durationMinutes = firstPresent(ranked, 'durationMinutes');
  const confirmationCode = firstPresent(ranked, 'confirmationCode');
  const airline = ranked.find(record => record.airline !== UNKNOWN_AIRLINE)?.airline ?? UNKNOWN_AIRLINE;

  const sourceEmailIds = Array.from(new Set(ranked.flatMap(record => record.sourceEmailIds))).sort();
  const lastSeenAt = ranked.map(record => record.lastSeenAt).sort().reverse()[0];

  return {
    flightNumber: best.flightNumber,
    origin: best.origin,
    destination: best.destination,
    departure: best.departure,
    ...(arrival !== undefined ? { arrival } : {}),
    airline,
    ...(durationMinutes !== undefined ? { durationMinutes } : {}),
    ...(confirmationCode !== undefined ? { confirmationCode } : {}),
    sourceEmailIds,
    lastSeenAt
  };
}

function compareChronologically(a: FlightRecord, b: FlightRecord): number {
  const aInstant = departureInstant(a);
  const bInstant = departureInstant(b);

  if (aInstant && !bInstant) return -1;
  if (!aInstant && bInstant) return 1;

  return (
    (aInstant && bInstant ? aInstant.getTime() - bInstant.getTime() : 0) ||
    a.flightNumber.localeCompare(b.flightNumber) ||
    a.origin.localeCompare(b.origin) ||
    a.destination.localeCompare(b.destination) ||
    a.departure.localeCompare(b.departure)
  );
}

/**
 * Collapse records describing the same flight and sort the result by
 * departure. Merging is idempotent: feeding the output back in, or the same
 * records twice, gives the same history.
 */
export function mergeFlights(records: readonly FlightRecord[]): TravelHistory {
  const groups = new Map<string, FlightRecord[]>();

  for (const record of records) {
    const key = dedupKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  const history = Array.from(groups.values(), mergeGroup).sort(compareChronologically);

  if (records.length !== history.length) {
    console.log(`Merged ${records.length} records into ${history.length} flights`);
  }

  return history;
}
