/**
 * Type definitions for the chunk quality gate
 */

/**
 * A single metadata value attached to a chunk.
 * Tagged so read sites never have to probe runtime types.
 */
export type MetadataValue =
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'timestamp'; readonly value: Date }
  | { readonly kind: 'other'; readonly value: unknown };

export type ChunkMetadata = Readonly<Record<string, MetadataValue>>;

export interface Chunk {
  readonly id: string;
  readonly content: string;
  readonly metadata?: ChunkMetadata;
}

export enum CriterionType {
  KeywordPresence = 'KeywordPresence',
  TopicRelevance = 'TopicRelevance',
  InformationDensity = 'InformationDensity',
  FactualContent = 'FactualContent',
  Recency = 'Recency',
  SourceCredibility = 'SourceCredibility',
  Completeness = 'Completeness'
}

export interface FilterCriterion {
  readonly type: CriterionType;
  /** Keyword or keyword list for KeywordPresence; ignored by other types. */
  readonly value?: string | readonly string[];
  readonly weight: number;
}

export interface AssessmentFactor {
  readonly name: string;
  /** Signed; negative values are penalties. Not bounded to [0, 1]. */
  readonly contribution: number;
  readonly explanation: string;
}

export type AssessmentStage = 'initial' | 'reflection' | 'critic';

export interface ChunkAssessment {
  readonly initialScore: number;
  readonly reflectionScore?: number;
  readonly criticScore?: number;
  readonly finalScore: number;
  readonly confidence: number;
  readonly factors: readonly AssessmentFactor[];
  readonly suggestions: readonly string[];
  readonly reasoning: Readonly<Partial<Record<AssessmentStage, string>>>;
}

export interface FilteredChunk {
  readonly chunk: Chunk;
  readonly relevanceScore: number;
  readonly qualityScore: number;
  readonly combinedScore: number;
  readonly passed: boolean;
  readonly assessment: ChunkAssessment;
  readonly reason: string;
}

export interface ChunkFilteringOptions {
  minRelevanceScore?: number;
  maxChunks?: number;
  preserveOrder?: boolean;
  /** 0 = pure relevance, 1 = pure quality */
  qualityWeight?: number;
  useSelfReflection?: boolean;
  useCriticValidation?: boolean;
  batchSize?: number;
  criteria?: readonly FilterCriterion[];
}

export type ResolvedFilteringOptions = Readonly<
  Required<Omit<ChunkFilteringOptions, 'maxChunks'>> & { maxChunks?: number }
>;

export interface CompletionOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
}

/**
 * Language-model completion capability consumed by the engine.
 * Implementations are expected to throw on transport or API failure.
 */
export interface TextCompletionService {
  complete(prompt: string, options?: CompletionOptions, signal?: AbortSignal): Promise<string>;
  completeStream(prompt: string, options?: CompletionOptions, signal?: AbortSignal): AsyncIterable<string>;
}

export interface GroqConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}

export interface HttpCompletionConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
  temperature?: number;
}
