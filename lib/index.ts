export * from './types';
export { ConfigurationError } from './errors';
export {
  loadPipelineConfig,
  pipelineConfigFromEnv,
  pipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput
} from './env';
export { cleanEmailBody } from './preprocessing/textCleaner';
export { extractAll, extractFirst, extractFields } from './preprocessing/fieldExtractors';
export { partitionWindows } from './preprocessing/segmentWindows';
export { detectFormat, getParser, parseEmail, type ParsedEmail } from './parsers';
export { normalizeSegment, type NormalizationOptions } from './normalizeSegment';
export { dedupKey, mergeFlights } from './mergeFlights';
export { generateStatistics, type TravelStatistics } from './statistics';
export {
  buildTravelHistory,
  type PipelineSummary,
  type TravelHistoryResult
} from './travelHistory';
