import {
  PROVIDER_FORMATS,
  type KnownProviderFormat,
  type ProviderFormat,
  type RawEmail,
  type RawSegment
} from '../types';
import { SIGNATURE_TIERS, matchesSignatureTier, type ProviderParser } from './provider';
import { vietJetParser } from './vietjet';
import { tripComParser } from './tripcom';
import { bookingComParser } from './bookingcom';

export interface ParsedEmail {
  format: ProviderFormat;
  dateFormats: readonly string[];
  segments: Generator<RawSegment, void, undefined>;
}

// Emails nobody recognizes go through here and contribute nothing
const unrecognizedParser: ProviderParser = {
  format: 'Unrecognized',
  signature: { senderDomains: [], subjectKeywords: [], bodyMarkers: [] },
  dateFormats: [],
  *parse() {
    // no segments
  }
};

export function getParser(format: ProviderFormat): ProviderParser {
  switch (format) {
    case 'VietJetAir':
      return vietJetParser;
    case 'TripCom':
      return tripComParser;
    case 'BookingCom':
      return bookingComParser;
    case 'Unrecognized':
      return unrecognizedParser;
  }
}

// Agencies resell airline seats and name the airline in their mail, so inside
// every tier they are tried before the airlines.
export const DETECTION_ORDER: readonly KnownProviderFormat[] = ['TripCom', 'BookingCom', 'VietJetAir'];

/**
 * Classify an email into exactly one provider format. Sender domains are
 * checked for every provider before any subject keyword, and subject keywords
 * before body markers. Within a tier agencies win over airlines.
 */
export function detectFormat(
  email: RawEmail,
  knownProviders: readonly KnownProviderFormat[] = PROVIDER_FORMATS
): ProviderFormat {
  for (const tier of SIGNATURE_TIERS) {
    for (const format of DETECTION_ORDER) {
      if (!knownProviders.includes(format)) continue;

      if (matchesSignatureTier(email, getParser(format).signature, tier)) {
        return format;
      }
    }
  }

  return 'Unrecognized';
}

export function parseEmail(
  email: RawEmail,
  knownProviders: readonly KnownProviderFormat[] = PROVIDER_FORMATS
): ParsedEmail {
  const format = detectFormat(email, knownProviders);
  const parser = getParser(format);

  console.log(`Detected format ${format} for email ${email.id}`);

  return {
    format,
    dateFormats: parser.dateFormats,
    segments: parser.parse(email)
  };
}
