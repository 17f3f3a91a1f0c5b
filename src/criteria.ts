/**
 * Criterion evaluator
 * Dispatches caller-supplied, weighted criteria to the heuristic scorers
 */

import { Chunk, CriterionType, FilterCriterion } from './types';
import {
  evaluateCompleteness,
  evaluateContentRelevance,
  evaluateFactualContent,
  evaluateInformationDensity,
  evaluateKeywordPresence,
  evaluateRecency,
  evaluateSourceCredibility
} from './heuristics';

/**
 * Build a criterion; weight defaults to 1
 */
export function criterion(
  type: CriterionType,
  options: { value?: string | readonly string[]; weight?: number } = {}
): FilterCriterion {
  return { type, value: options.value, weight: options.weight ?? 1 };
}

/**
 * Raw (unweighted) score for a criterion. TopicRelevance is boosted by 1.2
 * and may exceed 1.
 */
export function evaluateCriterion(
  chunk: Chunk,
  query: string | null | undefined,
  filterCriterion: FilterCriterion,
  now: Date = new Date()
): number {
  switch (filterCriterion.type) {
    case CriterionType.KeywordPresence:
      return evaluateKeywordPresence(chunk.content, filterCriterion.value);
    case CriterionType.TopicRelevance:
      return evaluateContentRelevance(chunk.content, query) * 1.2;
    case CriterionType.InformationDensity:
      return evaluateInformationDensity(chunk.content);
    case CriterionType.FactualContent:
      return evaluateFactualContent(chunk.content);
    case CriterionType.Recency:
      return evaluateRecency(chunk, now);
    case CriterionType.SourceCredibility:
      return evaluateSourceCredibility(chunk);
    case CriterionType.Completeness:
      return evaluateCompleteness(chunk.content);
  }
}
