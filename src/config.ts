/**
 * Configuration loaded from environment variables
 */

import { ChunkFilteringOptions, GroqConfig, HttpCompletionConfig, TextCompletionService } from './types';
import { PreconditionError } from './errors';
import { GroqCompletionService } from './groqCompletion';
import { HttpCompletionService } from './httpCompletion';

export type ProviderKind = 'groq' | 'http';

export interface AppConfig {
  provider: ProviderKind;
  groq?: GroqConfig;
  http?: HttpCompletionConfig;
  filtering: ChunkFilteringOptions;
}

export const DEFAULT_GROQ_MODEL = 'llama-3.1-8b-instant';
export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new PreconditionError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readProvider(env: NodeJS.ProcessEnv): ProviderKind {
  const raw = (env.CHUNK_FILTER_PROVIDER || 'groq').toLowerCase();
  if (raw === 'groq' || raw === 'http') return raw;

  throw new PreconditionError(`CHUNK_FILTER_PROVIDER must be "groq" or "http", got "${raw}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = readProvider(env);

  const filtering: ChunkFilteringOptions = {};
  const minRelevanceScore = readNumber(env, 'MIN_RELEVANCE_SCORE');
  const qualityWeight = readNumber(env, 'QUALITY_WEIGHT');
  const batchSize = readNumber(env, 'BATCH_SIZE');
  const maxChunks = readNumber(env, 'MAX_CHUNKS');

  if (minRelevanceScore !== undefined) filtering.minRelevanceScore = minRelevanceScore;
  if (qualityWeight !== undefined) filtering.qualityWeight = qualityWeight;
  if (batchSize !== undefined) filtering.batchSize = batchSize;
  if (maxChunks !== undefined) filtering.maxChunks = maxChunks;

  if (provider === 'groq') {
    const apiKey = env.GROQ_API_KEY || '';
    if (!apiKey) {
      throw new PreconditionError('GROQ_API_KEY is required for the groq provider');
    }

    return {
      provider,
      groq: {
        apiKey,
        model: env.GROQ_MODEL || DEFAULT_GROQ_MODEL,
        temperature: readNumber(env, 'GROQ_TEMPERATURE') ?? 0.1,
        maxTokens: readNumber(env, 'GROQ_MAX_TOKENS')
      },
      filtering
    };
  }

  const baseUrl = env.LLM_BASE_URL || '';
  if (!baseUrl) {
    throw new PreconditionError('LLM_BASE_URL is required for the http provider');
  }

  return {
    provider,
    http: {
      baseUrl,
      model: env.LLM_MODEL || 'default',
      apiKey: env.LLM_API_KEY || undefined,
      timeoutMs: readNumber(env, 'LLM_TIMEOUT_MS') ?? DEFAULT_HTTP_TIMEOUT_MS
    },
    filtering
  };
}

export function createCompletionService(config: AppConfig): TextCompletionService {
  if (config.provider === 'groq' && config.groq) {
    return new GroqCompletionService(config.groq);
  }

  if (config.provider === 'http' && config.http) {
    return new HttpCompletionService(config.http);
  }

  throw new PreconditionError(`Missing settings for the ${config.provider} provider`);
}
