/**
 * Chunk filtering service
 * Runs the three-stage assessment over batches of chunks and applies the
 * pass/fail threshold, result capping and order preservation
 */

import {
  Chunk,
  ChunkAssessment,
  ChunkFilteringOptions,
  FilteredChunk,
  ResolvedFilteringOptions,
  TextCompletionService
} from './types';
import { AssessmentContext, assessChunk } from './assessment';
import { calculateCombinedScore, calculateQualityScore, generateReason } from './scoring';
import { getIndex } from './metadata';
import { CancelledError, PreconditionError } from './errors';
import { logger } from './logger';

export const DEFAULT_FILTERING_OPTIONS: ResolvedFilteringOptions = {
  minRelevanceScore: 0.6,
  preserveOrder: false,
  qualityWeight: 0.3,
  useSelfReflection: true,
  useCriticValidation: true,
  batchSize: 5,
  criteria: []
};

// Chunks without an index sort after every indexed chunk
const MISSING_INDEX = Number.MAX_SAFE_INTEGER;

/**
 * Merge caller options over the defaults and check the caller contract
 */
export function resolveFilteringOptions(options: ChunkFilteringOptions = {}): ResolvedFilteringOptions {
  const resolved: ResolvedFilteringOptions = {
    minRelevanceScore: options.minRelevanceScore ?? DEFAULT_FILTERING_OPTIONS.minRelevanceScore,
    preserveOrder: options.preserveOrder ?? DEFAULT_FILTERING_OPTIONS.preserveOrder,
    qualityWeight: options.qualityWeight ?? DEFAULT_FILTERING_OPTIONS.qualityWeight,
    useSelfReflection: options.useSelfReflection ?? DEFAULT_FILTERING_OPTIONS.useSelfReflection,
    useCriticValidation: options.useCriticValidation ?? DEFAULT_FILTERING_OPTIONS.useCriticValidation,
    batchSize: options.batchSize ?? DEFAULT_FILTERING_OPTIONS.batchSize,
    criteria: options.criteria ?? DEFAULT_FILTERING_OPTIONS.criteria,
    ...(options.maxChunks !== undefined ? { maxChunks: options.maxChunks } : {})
  };

  if (!Number.isInteger(resolved.batchSize) || resolved.batchSize < 1) {
    throw new PreconditionError('batchSize must be an integer of at least 1', { batchSize: resolved.batchSize });
  }

  if (!Number.isFinite(resolved.qualityWeight) || resolved.qualityWeight < 0 || resolved.qualityWeight > 1) {
    throw new PreconditionError('qualityWeight must be between 0 and 1', { qualityWeight: resolved.qualityWeight });
  }

  if (Number.isNaN(resolved.minRelevanceScore)) {
    throw new PreconditionError('minRelevanceScore must be a number');
  }

  if (resolved.maxChunks !== undefined && (!Number.isInteger(resolved.maxChunks) || resolved.maxChunks < 0)) {
    throw new PreconditionError('maxChunks must be a non-negative integer', { maxChunks: resolved.maxChunks });
  }

  for (const criterion of resolved.criteria) {
    if (!Number.isFinite(criterion.weight)) {
      throw new PreconditionError(`Criterion ${criterion.type} has a non-finite weight`, { weight: criterion.weight });
    }
  }

  return resolved;
}

function assertChunk(chunk: Chunk): void {
  if (typeof chunk.id !== 'string' || typeof chunk.content !== 'string') {
    throw new PreconditionError('Chunk must have a string id and content', { id: chunk.id });
  }
}

export class ChunkFilteringService {
  private readonly completionService: TextCompletionService;
  private readonly clock: () => Date;

  constructor(completionService: TextCompletionService, clock: () => Date = () => new Date()) {
    if (!completionService) {
      throw new PreconditionError('A completion service is required');
    }
    this.completionService = completionService;
    this.clock = clock;
  }

  /**
   * Assess every chunk and return those that pass, scored and explained.
   * Completion failures degrade to heuristics; only precondition violations
   * and cancellation throw. The signal is checked before each batch and is
   * not passed to completion calls already dispatched.
   */
  async filter(
    chunks: readonly Chunk[],
    query: string | null,
    options?: ChunkFilteringOptions,
    signal?: AbortSignal
  ): Promise<FilteredChunk[]> {
    const resolved = resolveFilteringOptions(options);
    chunks.forEach(assertChunk);

    const results: FilteredChunk[] = [];

    logger.debug(`Filtering ${chunks.length} chunks in batches of ${resolved.batchSize}`);

    for (let i = 0; i < chunks.length; i += resolved.batchSize) {
      if (signal?.aborted) {
        throw new CancelledError('Chunk filtering was cancelled', { processed: results.length, total: chunks.length });
      }

      const batch = chunks.slice(i, i + resolved.batchSize);
      const batchResults = await Promise.all(
        batch.map(chunk => this.assessAndFilter(chunk, query, resolved))
      );
      results.push(...batchResults);
    }

    let filtered = results.filter(fc => fc.passed);

    if (resolved.maxChunks !== undefined) {
      filtered = [...filtered]
        .sort((a, b) => b.combinedScore - a.combinedScore)
        .slice(0, resolved.maxChunks);
    }

    if (resolved.preserveOrder) {
      filtered = [...filtered].sort(
        (a, b) => (getIndex(a.chunk.metadata) ?? MISSING_INDEX) - (getIndex(b.chunk.metadata) ?? MISSING_INDEX)
      );
    }

    logger.info(`Filtering complete: ${filtered.length}/${chunks.length} chunks passed`);

    return filtered;
  }

  /**
   * Run the three-stage assessment on a single chunk
   */
  async assess(
    chunk: Chunk,
    query: string | null,
    options?: ChunkFilteringOptions,
    signal?: AbortSignal
  ): Promise<ChunkAssessment> {
    const resolved = resolveFilteringOptions(options);
    assertChunk(chunk);

    if (signal?.aborted) {
      throw new CancelledError('Chunk assessment was cancelled', { id: chunk.id });
    }

    return assessChunk(chunk, query, this.context(resolved));
  }

  private context(options: ResolvedFilteringOptions): AssessmentContext {
    return {
      completionService: this.completionService,
      criteria: options.criteria,
      useSelfReflection: options.useSelfReflection,
      useCriticValidation: options.useCriticValidation,
      now: this.clock()
    };
  }

  private async assessAndFilter(
    chunk: Chunk,
    query: string | null,
    options: ResolvedFilteringOptions
  ): Promise<FilteredChunk> {
    const assessment = await assessChunk(chunk, query, this.context(options));

    const qualityScore = calculateQualityScore(assessment);
    const relevanceScore = assessment.finalScore;
    const combinedScore = calculateCombinedScore(relevanceScore, qualityScore, options.qualityWeight);
    const passed = combinedScore >= options.minRelevanceScore;

    logger.debug(
      `  [${passed ? 'ACCEPT' : 'REJECT'}] ${chunk.id} - combined ${combinedScore.toFixed(2)}`
    );

    return {
      chunk,
      relevanceScore,
      qualityScore,
      combinedScore,
      passed,
      assessment,
      reason: generateReason(assessment, passed, options.minRelevanceScore)
    };
  }
}
