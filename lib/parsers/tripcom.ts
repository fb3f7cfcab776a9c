import type { RawEmail } from '../types';
import { FLIGHT_CODE } from '../preprocessing/fieldExtractors';
import { type ProviderDefinition, createProviderParser, matchesSignature } from './provider';

// "Hanoi (HAN) → Ho Chi Minh City (SGN)"
const ROUTE = /\(([A-Z]{3})\)\s*(?:→|->|–|-|to)\s*[^\n(]*\(([A-Z]{3})\)/;

export const TRIPCOM_DEFINITION: ProviderDefinition = {
  format: 'TripCom',
  signature: {
    senderDomains: ['trip.com'],
    subjectKeywords: ['trip.com'],
    bodyMarkers: ['trip.com']
  },
  windowHeader: /^Flight\s+\d+\b/gm,
  emailRules: [
    { field: 'confirmationRaw', anchors: [/Booking\s+No\.?\s*:?\s*(\d{6,20})/i] }
  ],
  segmentRules: [
    {
      field: 'flightNumber',
      anchors: [
        new RegExp(`^(${FLIGHT_CODE})\\s*[·•|–-]\\s*\\S`, 'm'),
        new RegExp(`\\bFlight\\s+No\\.?\\s*:?\\s*(${FLIGHT_CODE})\\b`, 'i')
      ]
    },
    { field: 'airlineRaw', anchors: [new RegExp(`^${FLIGHT_CODE}\\s*[·•|–-]\\s*([^\\n]+)$`, 'm')] },
    { field: 'origin', anchors: [ROUTE], group: 1 },
    { field: 'destination', anchors: [ROUTE], group: 2 },
    { field: 'departureRaw', anchors: [/\bDepart(?:ure|s)?\s*:\s*([^\n]+)/i] },
    { field: 'arrivalRaw', anchors: [/\bArriv(?:al|e|es)\s*:\s*([^\n]+)/i] },
    { field: 'durationRaw', anchors: [/\bDuration\s*:\s*([^\n]+)/i] }
  ],
  dateFormats: [
    'yyyy-MM-dd H:mm',
    'yyyy/MM/dd H:mm',
    'MMM d, yyyy H:mm',
    'MMM d, yyyy h:mm a',
    'MMM d H:mm',
    'yyyy-MM-dd'
  ]
};

export const tripComParser = createProviderParser(TRIPCOM_DEFINITION);

export function looksLikeTripCom(email: RawEmail): boolean {
  return matchesSignature(email, TRIPCOM_DEFINITION.signature);
}
