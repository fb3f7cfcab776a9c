import { isValid } from 'date-fns';
import {
  UNKNOWN_AIRLINE,
  type FlightRecord,
  type NormalizationFailure,
  type NormalizationResult,
  type RawSegment,
  type SegmentField
} from './types';
import { flightNumberSchema, iataCodeSchema } from './validations';
import { getAirlineName, getTimezoneForAirport } from './utils/lookups';
import { DEFAULT_DATE_FORMATS, resolveArrival, resolveDeparture } from './utils/dateInference';
import { parseDurationMinutes } from './utils/timeFormatting';

export interface NormalizationOptions {
  hintYear: number;
  defaultTimeZone?: string;
  dateFormats?: readonly string[];   // the detected provider's formats
}

/**
 * Turn one RawSegment into a canonical FlightRecord, or explain why not.
 * Mandatory fields are checked first, then their shapes, then the departure
 * date. Optional fields that do not parse are dropped with a warning.
 */
export function normalizeSegment(
  segment: RawSegment,
  options: NormalizationOptions
): NormalizationResult {
  const fail = (
    reason: NormalizationFailure['reason'],
    field: SegmentField,
    rawValue?: string
  ): NormalizationResult => ({
    ok: false,
    failure: {
      reason,
      field,
      ...(rawValue !== undefined ? { rawValue } : {}),
      sourceEmailId: segment.sourceEmailId,
      provider: segment.provider
    }
  });

  const { flightNumber: rawFlight, origin: rawOrigin, destination: rawDestination, departureRaw } = segment;
  if (!rawFlight?.trim()) return fail('MissingField', 'flightNumber');
  if (!rawOrigin?.trim()) return fail('MissingField', 'origin');
  if (!rawDestination?.trim()) return fail('MissingField', 'destination');
  if (!departureRaw?.trim()) return fail('MissingField', 'departure');

  const flightNumber = flightNumberSchema.safeParse(rawFlight);
  if (!flightNumber.success) return fail('InvalidFormat', 'flightNumber', rawFlight);

  const origin = iataCodeSchema.safeParse(rawOrigin);
  if (!origin.success) return fail('InvalidFormat', 'origin', rawOrigin);

  const destination = iataCodeSchema.safeParse(rawDestination);
  if (!destination.success) return fail('InvalidFormat', 'destination', rawDestination);

  if (origin.data === destination.data) {
    return fail('InvalidFormat', 'destination', rawDestination);
  }

  const formats = options.dateFormats && options.dateFormats.length > 0
    ? options.dateFormats
    : DEFAULT_DATE_FORMATS;
  const fallbackZone = options.defaultTimeZone ?? 'UTC';
  const originZone = getTimezoneForAirport(origin.data) ?? fallbackZone;
  const destinationZone = getTimezoneForAirport(destination.data) ?? fallbackZone;

  const departure = resolveDeparture(departureRaw, formats, options.hintYear, originZone);
  if (!departure) return fail('InvalidFormat', 'departure', departureRaw);

  let arrival: string | undefined;
  if (segment.arrivalRaw?.trim()) {
    const resolved = resolveArrival(
      segment.arrivalRaw,
      formats,
      departure,
      options.hintYear,
      destinationZone
    );
    if (!resolved) {
      console.warn(`Dropping unparseable arrival "${segment.arrivalRaw}" from email ${segment.sourceEmailId}`);
    } else if (resolved.instant.getTime() <= departure.instant.getTime()) {
      return fail('InvalidFormat', 'arrival', segment.arrivalRaw);
    } else {
      arrival = resolved.iso;
    }
  }

  let durationMinutes: number | undefined;
  if (segment.durationRaw?.trim()) {
    durationMinutes = parseDurationMinutes(segment.durationRaw);
    if (durationMinutes === undefined) {
      console.warn(`Dropping unparseable duration "${segment.durationRaw}" from email ${segment.sourceEmailId}`);
    }
  }

  const airline =
    segment.airlineRaw?.trim() || getAirlineName(flightNumber.data) || UNKNOWN_AIRLINE;
  const confirmationCode = segment.confirmationRaw?.trim().toUpperCase() || undefined;

  const record: FlightRecord = {
    flightNumber: flightNumber.data,
    origin: origin.data,
    destination: destination.data,
    departure: departure.iso,
    ...(arrival !== undefined ? { arrival } : {}),
    airline,
    ...(durationMinutes !== undefined ? { durationMinutes } : {}),
    ...(confirmationCode !== undefined ? { confirmationCode } : {}),
    sourceEmailIds: [segment.sourceEmailId],
    lastSeenAt: isValid(segment.receivedAt)
      ? segment.receivedAt.toISOString()
      : new Date(0).toISOString()
  };

  return { ok: true, record };
}
