import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildTravelHistory } from '../lib/travelHistory';
import { ConfigurationError } from '../lib/errors';
import type { RawEmail } from '../lib/types';
import {
  FORWARDED_HEADERS,
  VIETJET_BODY,
  bookingComEmail,
  forwardedTripComEmail,
  makeEmail,
  newsletterEmail,
  tripComEmail,
  vietJetEmail
} from './fixtures/emails';

const inbox = [vietJetEmail, tripComEmail, bookingComEmail, newsletterEmail];

describe('Confirmation email to travel history flow', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should build a merged, sorted history from a mixed inbox', () => {
    const result = buildTravelHistory(inbox, { targetYear: 2024 });

    expect(result.history).toEqual([
      {
        flightNumber: 'AA100',
        origin: 'SFO',
        destination: 'JFK',
        departure: '2024-05-10T08:00:00-07:00',
        arrival: '2024-05-10T16:35:00-04:00',
        airline: 'American Airlines',
        durationMinutes: 335,
        confirmationCode: '1234567890',
        sourceEmailIds: ['booking-1', 'trip-1'],
        lastSeenAt: '2024-04-02T09:00:00.000Z'
      },
      {
        flightNumber: 'VJ123',
        origin: 'SGN',
        destination: 'HAN',
        departure: '2024-06-15T08:30:00+07:00',
        arrival: '2024-06-15T10:40:00+07:00',
        airline: 'VietJet Air',
        durationMinutes: 130,
        confirmationCode: 'ABC123',
        sourceEmailIds: ['vj-1'],
        lastSeenAt: '2024-06-01T08:00:00.000Z'
      }
    ]);
    expect(result.failures).toEqual([]);
    expect(result.summary).toEqual({
      emailsProcessed: 4,
      emailsUnrecognized: 1,
      segmentsExtracted: 3,
      recordsNormalized: 3,
      recordsOutOfRange: 0,
      failures: 0
    });
  });

  it('should keep the flights of a forwarded agency email that names an airline', () => {
    const result = buildTravelHistory([forwardedTripComEmail], { targetYear: 2024 });

    expect(result.history.map(flight => flight.flightNumber)).toEqual(['AA100', 'AA101']);
    expect(result.history[1].departure).toBe('2024-05-17T18:00:00-04:00');
    expect(result.failures).toEqual([]);
  });

  it('should read a forwarded airline confirmation', () => {
    const email = makeEmail({
      id: 'fwd-vj-1',
      sender: 'me@gmail.com',
      subject: 'Fwd: Your VietJet itinerary',
      body: FORWARDED_HEADERS + VIETJET_BODY
    });

    const result = buildTravelHistory([email], { targetYear: 2024 });

    expect(result.history).toHaveLength(1);
    expect(result.history[0]).toMatchObject({
      flightNumber: 'VJ123',
      origin: 'SGN',
      destination: 'HAN',
      departure: '2024-06-15T08:30:00+07:00'
    });
    expect(result.failures).toEqual([]);
  });

  it('should report statistics for the merged history', () => {
    const { statistics } = buildTravelHistory(inbox, { targetYear: 2024 });

    expect(statistics).toEqual({
      totalFlights: 2,
      uniqueAirlines: 2,
      flightsByMonth: { '2024-05': 1, '2024-06': 1 },
      mostFrequentRoute: { route: 'SFO-JFK', count: 1 },
      totalDurationMinutes: 465
    });
  });

  it('should contribute nothing for an unrecognized email', () => {
    const result = buildTravelHistory([newsletterEmail], { targetYear: 2024 });

    expect(result.history).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(result.summary.emailsUnrecognized).toBe(1);
  });

  it('should collect failures and keep going', () => {
    const incomplete = makeEmail({
      id: 'vj-2',
      sender: 'noreply@vietjetair.com',
      body: 'Flight No. VJ 456\nFrom: SGN\nTo: DAD'
    });

    const result = buildTravelHistory([incomplete, vietJetEmail], { targetYear: 2024 });

    expect(result.failures).toEqual([
      { reason: 'MissingField', field: 'departure', sourceEmailId: 'vj-2', provider: 'VietJetAir' }
    ]);
    expect(result.history.map(f => f.flightNumber)).toEqual(['VJ123']);
    expect(result.summary.failures).toBe(1);
  });

  it('should drop flights outside the configured date range', () => {
    const result = buildTravelHistory(inbox, { targetYear: 2024, dateRange: { from: '2024-06-01' } });

    expect(result.history.map(f => f.flightNumber)).toEqual(['VJ123']);
    expect(result.summary.recordsOutOfRange).toBe(2);
  });

  it('should only use enabled providers', () => {
    const result = buildTravelHistory(inbox, { targetYear: 2024, knownProviders: ['VietJetAir'] });

    expect(result.history.map(f => f.flightNumber)).toEqual(['VJ123']);
    expect(result.summary.emailsUnrecognized).toBe(3);
  });

  it('should give the same history regardless of email order', () => {
    const forward = buildTravelHistory(inbox, { targetYear: 2024 });
    const reversed = buildTravelHistory([...inbox].reverse(), { targetYear: 2024 });

    expect(reversed.history).toEqual(forward.history);
  });

  it('should reject bad configuration before reading any email', () => {
    function* untouchable(): Generator<RawEmail> {
      throw new Error('emails were read');
    }

    expect(() => buildTravelHistory(untouchable(), { targetYear: 'soon' })).toThrow(ConfigurationError);
  });
});
