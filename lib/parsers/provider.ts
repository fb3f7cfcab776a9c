import type { KnownProviderFormat, ProviderFormat, RawEmail, RawSegment } from '../types';
import { cleanEmailBody } from '../preprocessing/textCleaner';
import { type ExtractionRule, extractFields } from '../preprocessing/fieldExtractors';
import { partitionWindows } from '../preprocessing/segmentWindows';

export interface ProviderSignature {
  senderDomains: string[];
  subjectKeywords: string[];
  bodyMarkers: string[];
}

export type SignatureTier = 'sender' | 'subject' | 'body';

// Detection walks the tiers in this order before moving to the next one
export const SIGNATURE_TIERS: readonly SignatureTier[] = ['sender', 'subject', 'body'];

export interface ProviderDefinition {
  format: KnownProviderFormat;
  signature: ProviderSignature;
  windowHeader?: RegExp;                        // starts a new flight leg
  emailRules: ExtractionRule<'confirmationRaw'>[];
  segmentRules: ExtractionRule[];
  dateFormats: string[];                        // date-fns patterns, most specific first
  defaultAirline?: string;
}

export interface ProviderParser {
  format: ProviderFormat;
  signature: ProviderSignature;
  dateFormats: readonly string[];
  parse(email: RawEmail): Generator<RawSegment, void, undefined>;
}

export function senderDomain(sender: string): string | undefined {
  const address = sender.match(/<([^>]+)>/)?.[1] ?? sender;
  const at = address.lastIndexOf('@');
  if (at === -1) return undefined;

  const domain = address.slice(at + 1).trim().toLowerCase();
  return domain || undefined;
}

export function matchesSignatureTier(
  email: RawEmail,
  signature: ProviderSignature,
  tier: SignatureTier
): boolean {
  switch (tier) {
    case 'sender': {
      const domain = senderDomain(email.sender);
      return !!domain && signature.senderDomains.some(d => domain === d || domain.endsWith(`.${d}`));
    }
    case 'subject': {
      const subject = email.subject.toLowerCase();
      return signature.subjectKeywords.some(keyword => subject.includes(keyword));
    }
    case 'body': {
      const body = email.body.toLowerCase();
      return signature.bodyMarkers.some(marker => body.includes(marker));
    }
  }
}

export function matchesSignature(email: RawEmail, signature: ProviderSignature): boolean {
  return SIGNATURE_TIERS.some(tier => matchesSignatureTier(email, signature, tier));
}

/**
 * Build a parser from a provider's declarative table. The returned `parse`
 * is lazy: one RawSegment per window, produced as the caller iterates.
 */
export function createProviderParser(definition: ProviderDefinition): ProviderParser {
  return {
    format: definition.format,
    signature: definition.signature,
    dateFormats: definition.dateFormats,
    parse: email => parseWithDefinition(definition, email)
  };
}

function* parseWithDefinition(
  definition: ProviderDefinition,
  email: RawEmail
): Generator<RawSegment, void, undefined> {
  const text = cleanEmailBody(email.body);

  // Booking codes usually sit in the preamble or the subject, not in a leg
  const confirmation =
    extractFields(text, definition.emailRules).confirmationRaw ??
    extractFields(email.subject, definition.emailRules).confirmationRaw;

  const windows = partitionWindows(text, definition.windowHeader);
  console.log(`${definition.format}: ${windows.length} window(s) in email ${email.id}`);

  for (const window of windows) {
    const fields = extractFields(text, definition.segmentRules, window);

    if (!fields.flightNumber && !fields.origin && !fields.destination && !fields.departureRaw) {
      continue;
    }

    yield {
      provider: definition.format,
      flightNumber: fields.flightNumber?.value,
      origin: fields.origin?.value,
      destination: fields.destination?.value,
      departureRaw: fields.departureRaw?.value,
      arrivalRaw: fields.arrivalRaw?.value,
      airlineRaw: fields.airlineRaw?.value ?? definition.defaultAirline,
      durationRaw: fields.durationRaw?.value,
      confirmationRaw: confirmation?.value,
      sourceEmailId: email.id,
      receivedAt: email.receivedAt
    };
  }
}
