import { describe, it, expect } from 'vitest';
import { vietJetParser } from '../lib/parsers/vietjet';
import { FORWARDED_HEADERS, VIETJET_BODY, makeEmail, vietJetEmail } from './fixtures/emails';

describe('VietJet parser', () => {
  it('should extract a single leg from a confirmation', () => {
    const segments = Array.from(vietJetParser.parse(vietJetEmail));

    expect(segments).toEqual([
      {
        provider: 'VietJetAir',
        flightNumber: 'VJ 123',
        origin: 'SGN',
        destination: 'HAN',
        departureRaw: '15 Jun, 08:30',
        arrivalRaw: '15 Jun, 10:40',
        airlineRaw: 'VietJet Air',
        durationRaw: '2h 10m',
        confirmationRaw: 'ABC123',
        sourceEmailId: 'vj-1',
        receivedAt: new Date('2024-06-01T08:00:00Z')
      }
    ]);
  });

  it('should read bare airport codes and the Departure label', () => {
    const email = makeEmail({
      body: 'Flight Number: VJ456\nFrom: HAN\nTo: DAD\nDeparture time: 12 March 2026'
    });

    const [segment] = Array.from(vietJetParser.parse(email));

    expect(segment.flightNumber).toBe('VJ456');
    expect(segment.origin).toBe('HAN');
    expect(segment.destination).toBe('DAD');
    expect(segment.departureRaw).toBe('12 March 2026');
    expect(segment.arrivalRaw).toBeUndefined();
  });

  it('should skip forwarded mail headers when reading airport codes', () => {
    const email = makeEmail({ body: FORWARDED_HEADERS + VIETJET_BODY });

    const [segment] = Array.from(vietJetParser.parse(email));

    expect(segment.origin).toBe('SGN');
    expect(segment.destination).toBe('HAN');
  });

  it('should not take the date of a forwarded message as the departure', () => {
    const body = [
      '---------- Forwarded message ---------',
      'From: VietJet Air <noreply@vietjetair.com>',
      'Date: Mon, 3 Jun 2024 at 10:00',
      'Subject: Your VietJet itinerary',
      'To: Amy <amy@y.com>',
      VIETJET_BODY
    ].join('\n');

    const [segment] = Array.from(vietJetParser.parse(makeEmail({ body })));

    expect(segment.origin).toBe('SGN');
    expect(segment.destination).toBe('HAN');
    expect(segment.departureRaw).toBe('15 Jun, 08:30');
  });

  it('should leave missing fields absent instead of guessing', () => {
    const email = makeEmail({ body: 'Flight No. VJ 789\nFrom: SGN' });

    const [segment] = Array.from(vietJetParser.parse(email));

    expect(segment.flightNumber).toBe('VJ 789');
    expect(segment.origin).toBe('SGN');
    expect(segment.destination).toBeUndefined();
    expect(segment.departureRaw).toBeUndefined();
    expect(segment.confirmationRaw).toBeUndefined();
  });

  it('should produce nothing when no flight fields are present', () => {
    const email = makeEmail({ body: 'VietJet Air\nThank you for flying with us.' });

    expect(Array.from(vietJetParser.parse(email))).toEqual([]);
  });

  it('should produce segments lazily', () => {
    const iterator = vietJetParser.parse(vietJetEmail);

    expect(iterator.next()).toEqual({
      done: false,
      value: expect.objectContaining({ flightNumber: 'VJ 123' })
    });
    expect(iterator.next().done).toBe(true);
  });
});
