export const PROVIDER_FORMATS = ['VietJetAir', 'TripCom', 'BookingCom'] as const;

export type KnownProviderFormat = typeof PROVIDER_FORMATS[number];
export type ProviderFormat = KnownProviderFormat | 'Unrecognized';

export type RawEmail = {
  readonly id: string;
  readonly sender: string;               // "VietJet Air <noreply@vietjetair.com>"
  readonly subject: string;
  readonly body: string;                 // plain text or HTML
  readonly receivedAt: Date;
}

export type RawSegment = {
  provider: KnownProviderFormat;
  flightNumber?: string;                 // "VJ 123"
  origin?: string;                       // "SGN"
  destination?: string;                  // "HAN"
  departureRaw?: string;                 // "15 Jun, 08:30"
  arrivalRaw?: string;                   // "15 Jun, 10:40" | "10:40 (+1)"
  airlineRaw?: string;                   // "Vietnam Airlines"
  durationRaw?: string;                  // "2h 10m"
  confirmationRaw?: string;              // "ABC123"
  sourceEmailId: string;
  receivedAt: Date;
}

export type FlightRecord = {
  flightNumber: string;                  // "VJ123"
  origin: string;                        // IATA
  destination: string;                   // IATA
  departure: string;                     // "2024-06-15T08:30:00+07:00"
  arrival?: string;
  airline: string;
  durationMinutes?: number;
  confirmationCode?: string;
  sourceEmailIds: string[];              // sorted, unique
  lastSeenAt: string;                    // ISO timestamp of the newest source email
}

export type TravelHistory = FlightRecord[];

export type SegmentField =
  | 'flightNumber'
  | 'origin'
  | 'destination'
  | 'departure'
  | 'arrival'
  | 'airline'
  | 'duration';

export type NormalizationFailure = {
  reason: 'MissingField' | 'InvalidFormat';
  field: SegmentField;
  rawValue?: string;
  sourceEmailId: string;
  provider: KnownProviderFormat;
}

export type NormalizationResult =
  | { ok: true; record: FlightRecord }
  | { ok: false; failure: NormalizationFailure };

export const UNKNOWN_AIRLINE = 'Unknown Airline';
