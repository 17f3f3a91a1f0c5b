/**
 * Language-model relevance probe
 * Asks the completion provider for a bare 0-1 relevance rating and falls back
 * to the heuristic content relevance when the call fails or the answer is not a number
 */

import { Chunk, TextCompletionService } from './types';
import { clamp, evaluateContentRelevance } from './heuristics';
import { errorMessage } from './errors';
import { logger } from './logger';

const PREVIEW_LENGTH = 500;

export type ProbeOutcome =
  | { readonly source: 'model'; readonly score: number }
  | { readonly source: 'fallback'; readonly score: number; readonly cause: 'error' | 'unparseable'; readonly detail: string };

export function buildRelevancePrompt(content: string, query: string): string {
  const contentPreview = content.length > PREVIEW_LENGTH
    ? content.slice(0, PREVIEW_LENGTH) + '...'
    : content;

  return `Rate the relevance of this text chunk to the query.
Query: ${query}
Chunk: ${contentPreview}

Provide a relevance score from 0.0 to 1.0 where:
- 0.0 = completely irrelevant
- 0.5 = somewhat relevant
- 1.0 = highly relevant

Output only the numeric score.`;
}

/**
 * Parse a bare real number; anything else (words, units, trailing text) is rejected
 */
export function parseScore(response: string): number | null {
  const trimmed = response.trim();
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) return null;

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export async function probeRelevance(
  completionService: TextCompletionService,
  chunk: Chunk,
  query: string
): Promise<ProbeOutcome> {
  const prompt = buildRelevancePrompt(chunk.content, query);
  let response: string;

  try {
    response = await completionService.complete(prompt, { temperature: 0, maxTokens: 10 });
  } catch (error) {
    const detail = errorMessage(error);
    logger.warn(`Relevance probe failed for chunk ${chunk.id}, using heuristic score: ${detail}`);
    return {
      source: 'fallback',
      score: evaluateContentRelevance(chunk.content, query),
      cause: 'error',
      detail
    };
  }

  const parsed = parseScore(response);
  if (parsed === null) {
    logger.warn(`Unparseable relevance response for chunk ${chunk.id}: "${response.slice(0, 50)}"`);
    return {
      source: 'fallback',
      score: evaluateContentRelevance(chunk.content, query),
      cause: 'unparseable',
      detail: response
    };
  }

  logger.debug(`Relevance probe for chunk ${chunk.id}: ${parsed}`);
  return { source: 'model', score: clamp(parsed) };
}
