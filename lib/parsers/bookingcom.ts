import type { RawEmail } from '../types';
import { FLIGHT_CODE } from '../preprocessing/fieldExtractors';
import { type ProviderDefinition, createProviderParser, matchesSignature } from './provider';

// Itinerary row: "SFO San Francisco – JFK New York"
const ROUTE_ROW = /^([A-Z]{3})\b[^\n]*?\s[–—-]\s([A-Z]{3})\b/m;

export const BOOKINGCOM_DEFINITION: ProviderDefinition = {
  format: 'BookingCom',
  signature: {
    senderDomains: ['booking.com'],
    subjectKeywords: ['booking.com'],
    bodyMarkers: ['booking.com']
  },
  windowHeader: /^(?:Outbound flight|Return flight|Flight \d+ of \d+)\b/gim,
  emailRules: [
    { field: 'confirmationRaw', anchors: [/Booking reference\s*:?\s*([A-Z0-9][A-Z0-9-]{4,24})/i] }
  ],
  segmentRules: [
    {
      field: 'flightNumber',
      anchors: [
        new RegExp(`Flight number\\s*:?\\s*(${FLIGHT_CODE})\\b`, 'i'),
        new RegExp(`·\\s*(${FLIGHT_CODE})$`, 'm')
      ]
    },
    { field: 'airlineRaw', anchors: [new RegExp(`^([^\\n·]+?)\\s*·\\s*${FLIGHT_CODE}$`, 'm')] },
    { field: 'origin', anchors: [ROUTE_ROW], group: 1 },
    { field: 'destination', anchors: [ROUTE_ROW], group: 2 },
    { field: 'departureRaw', anchors: [/\bDeparts?\s*:\s*([^\n]+)/i] },
    { field: 'arrivalRaw', anchors: [/\bArrives?\s*:\s*([^\n]+)/i] },
    { field: 'durationRaw', anchors: [/\b(?:Flight time|Duration)\s*:\s*([^\n]+)/i] }
  ],
  // Weekday names are stripped before these are tried
  dateFormats: [
    'd MMM yyyy · H:mm',
    'd MMM yyyy, H:mm',
    'd MMM yyyy H:mm',
    'd MMMM yyyy · H:mm',
    'd MMM · H:mm',
    'yyyy-MM-dd H:mm'
  ]
};

export const bookingComParser = createProviderParser(BOOKINGCOM_DEFINITION);

export function looksLikeBookingCom(email: RawEmail): boolean {
  return matchesSignature(email, BOOKINGCOM_DEFINITION.signature);
}
