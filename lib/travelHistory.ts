import type { FlightRecord, NormalizationFailure, RawEmail, TravelHistory } from './types';
import { loadPipelineConfig, type PipelineConfig } from './env';
import { parseEmail } from './parsers';
import { normalizeSegment } from './normalizeSegment';
import { mergeFlights } from './mergeFlights';
import { generateStatistics, type TravelStatistics } from './statistics';

export interface PipelineSummary {
  emailsProcessed: number;
  emailsUnrecognized: number;
  segmentsExtracted: number;
  recordsNormalized: number;
  recordsOutOfRange: number;
  failures: number;
}

export interface TravelHistoryResult {
  history: TravelHistory;
  failures: NormalizationFailure[];
  summary: PipelineSummary;
  statistics: TravelStatistics;
}

function inDateRange(record: FlightRecord, range: PipelineConfig['dateRange']): boolean {
  if (!range) return true;

  const localDate = record.departure.slice(0, 10);
  if (range.from && localDate < range.from) return false;
  if (range.to && localDate > range.to) return false;
  return true;
}

/**
 * Run a batch of emails through detection, parsing, normalization and
 * merging. The configuration is validated before any email is read; after
 * that a bad email or segment only ever adds to `failures`.
 */
export function buildTravelHistory(
  emails: Iterable<RawEmail>,
  configInput: unknown
): TravelHistoryResult {
  const config = loadPipelineConfig(configInput);

  const records: FlightRecord[] = [];
  const failures: NormalizationFailure[] = [];
  const summary: PipelineSummary = {
    emailsProcessed: 0,
    emailsUnrecognized: 0,
    segmentsExtracted: 0,
    recordsNormalized: 0,
    recordsOutOfRange: 0,
    failures: 0
  };

  for (const email of emails) {
    summary.emailsProcessed++;

    const parsed = parseEmail(email, config.knownProviders);
    if (parsed.format === 'Unrecognized') {
      summary.emailsUnrecognized++;
      continue;
    }

    for (const segment of parsed.segments) {
      summary.segmentsExtracted++;

      const result = normalizeSegment(segment, {
        hintYear: config.targetYear,
        defaultTimeZone: config.defaultTimeZone,
        dateFormats: parsed.dateFormats
      });

      if (!result.ok) {
        console.warn(
          `Skipping segment from email ${email.id}: ${result.failure.reason} on ${result.failure.field}`,
          result.failure.rawValue ?? ''
        );
        failures.push(result.failure);
        continue;
      }

      summary.recordsNormalized++;
      if (!inDateRange(result.record, config.dateRange)) {
        summary.recordsOutOfRange++;
        continue;
      }
      records.push(result.record);
    }
  }

  summary.failures = failures.length;
  const history = mergeFlights(records);

  console.log(
    `Processed ${summary.emailsProcessed} emails: ${history.length} flights, ${summary.failures} failures`
  );

  return {
    history,
    failures,
    summary,
    statistics: generateStatistics(history)
  };
}
