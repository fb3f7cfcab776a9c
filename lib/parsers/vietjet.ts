import type { RawEmail } from '../types';
import { FLIGHT_CODE } from '../preprocessing/fieldExtractors';
import { type ProviderDefinition, createProviderParser, matchesSignature } from './provider';

// One fixed template per email, so the whole body is a single leg.
export const VIETJET_DEFINITION: ProviderDefinition = {
  format: 'VietJetAir',
  signature: {
    senderDomains: ['vietjetair.com'],
    subjectKeywords: ['vietjet'],
    bodyMarkers: ['vietjetair.com', 'vietjet air']
  },
  emailRules: [
    {
      field: 'confirmationRaw',
      anchors: [
        /Reservation\s*(?:(?:#|No\.|number)\s*:?|:)\s*([A-Z0-9]{5,10})\b/i,
        /Booking\s*(?:(?:#|No\.|number)\s*:?|:)\s*([A-Z0-9]{5,10})\b/i
      ]
    }
  ],
  segmentRules: [
    {
      field: 'flightNumber',
      anchors: [
        new RegExp(`Flight\\s*(?:No\\.?|Number)\\s*:?\\s*(${FLIGHT_CODE})\\b`, 'i'),
        /\b(VJ\s?\d{2,4})\b/
      ]
    },
    // "From: SGN" or "From: Ho Chi Minh City (SGN)"; the code itself must be
    // upper case so "From: Bob <bob@x.com>" is skipped
    { field: 'origin', anchors: [/\b(?:From|FROM)\s*:\s*(?:[^\n(]*\()?([A-Z]{3})\b/] },
    { field: 'destination', anchors: [/\b(?:To|TO)\s*:\s*(?:[^\n(]*\()?([A-Z]{3})\b/] },
    {
      field: 'departureRaw',
      anchors: [/\bDeparture(?:\s+time)?\s*:\s*([^\n]+)/i, /\bDate\s*:\s*([^\n]+)/i]
    },
    { field: 'arrivalRaw', anchors: [/\bArrival(?:\s+time)?\s*:\s*([^\n]+)/i] },
    { field: 'durationRaw', anchors: [/\bDuration\s*:\s*([^\n]+)/i] }
  ],
  dateFormats: [
    'd MMM yyyy, H:mm',
    'd MMMM yyyy, H:mm',
    'd MMM, H:mm',
    'd MMMM, H:mm',
    'd MMM yyyy H:mm',
    'd/M/yyyy H:mm',
    'd MMM yyyy',
    'd MMMM yyyy',
    'd/M/yyyy'
  ],
  defaultAirline: 'VietJet Air'
};

export const vietJetParser = createProviderParser(VIETJET_DEFINITION);

export function looksLikeVietJet(email: RawEmail): boolean {
  return matchesSignature(email, VIETJET_DEFINITION.signature);
}
