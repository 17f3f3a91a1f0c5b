/**
 * Library entry point
 */

export * from './types';
export * from './errors';
export {
  MetadataKeys,
  integer,
  text,
  timestamp,
  other,
  toChunkMetadata,
  getInteger,
  getString,
  getTimestamp,
  getIndex
} from './metadata';
export { criterion, evaluateCriterion } from './criteria';
export { ProbeOutcome, probeRelevance } from './relevanceProbe';
export { mergeFactors, assessChunk } from './assessment';
export {
  FactorNames,
  Suggestions,
  calculateFinalScore,
  calculateConfidence,
  calculateQualityScore,
  calculateCombinedScore
} from './scoring';
export {
  ChunkFilteringService,
  DEFAULT_FILTERING_OPTIONS,
  resolveFilteringOptions
} from './chunkFiltering';
export { analyzeChunkQuality, ChunkQualityResult, EnrichmentRecommendation } from './qualityAnalyzer';
export { GroqCompletionService } from './groqCompletion';
export { HttpCompletionService } from './httpCompletion';
export { AppConfig, loadConfig, createCompletionService } from './config';
export { Logger, LogLevel, logger } from './logger';
