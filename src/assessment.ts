/**
 * Three-stage chunk assessment
 * Stage 1: initial assessment from heuristics, criteria and the relevance probe
 * Stage 2: self-reflection to correct bias and incompleteness
 * Stage 3: critic validation for consistency, patterns and edge cases
 */

import {
  AssessmentFactor,
  AssessmentStage,
  Chunk,
  ChunkAssessment,
  FilterCriterion,
  TextCompletionService
} from './types';
import {
  checkEdgeCases,
  checkForBias,
  clamp,
  evaluateAlternativePerspective,
  evaluateCompleteness,
  evaluateConsistency,
  evaluateContentRelevance,
  evaluateInformationDensity,
  evaluateStructuralImportance,
  hasQuery,
  mean,
  validateAgainstPatterns
} from './heuristics';
import { evaluateCriterion } from './criteria';
import { probeRelevance } from './relevanceProbe';
import {
  FactorNames,
  calculateConfidence,
  calculateFinalScore,
  dominantFactor,
  generateSuggestions
} from './scoring';
import { logger } from './logger';

export interface StageResult {
  readonly score: number;
  readonly reasoning: string;
  readonly factors: readonly AssessmentFactor[];
}

export interface AssessmentContext {
  readonly completionService: TextCompletionService;
  readonly criteria: readonly FilterCriterion[];
  readonly useSelfReflection: boolean;
  readonly useCriticValidation: boolean;
  readonly now: Date;
}

function factor(name: string, contribution: number, explanation: string): AssessmentFactor {
  return { name, contribution, explanation };
}

/**
 * Fold source factors into target, keeping target order and its duplicates.
 * A source factor averages into the first target factor of the same name
 * (explanations joined with " | ") or is appended when there is none.
 */
export function mergeFactors(
  target: readonly AssessmentFactor[],
  source: readonly AssessmentFactor[]
): AssessmentFactor[] {
  const merged = [...target];

  for (const f of source) {
    const position = merged.findIndex(existing => existing.name === f.name);
    if (position === -1) {
      merged.push(f);
      continue;
    }

    const existing = merged[position];
    merged[position] = factor(
      f.name,
      (existing.contribution + f.contribution) / 2,
      `${existing.explanation} | ${f.explanation}`
    );
  }

  return merged;
}

export async function performInitialAssessment(
  chunk: Chunk,
  query: string | null,
  context: AssessmentContext
): Promise<StageResult> {
  const factors: AssessmentFactor[] = [];
  const scores: number[] = [];

  const contentScore = evaluateContentRelevance(chunk.content, query);
  factors.push(factor(
    FactorNames.ContentRelevance,
    contentScore,
    `Content alignment with query: ${contentScore.toFixed(2)}`
  ));
  scores.push(contentScore);

  const densityScore = evaluateInformationDensity(chunk.content);
  factors.push(factor(
    FactorNames.InformationDensity,
    densityScore * 0.5,
    `Information richness: ${densityScore.toFixed(2)}`
  ));
  scores.push(densityScore);

  const structuralScore = evaluateStructuralImportance(chunk);
  factors.push(factor(
    FactorNames.StructuralImportance,
    structuralScore * 0.3,
    `Document structure relevance: ${structuralScore.toFixed(2)}`
  ));
  scores.push(structuralScore);

  for (const criterion of context.criteria) {
    const criterionScore = evaluateCriterion(chunk, query, criterion, context.now);
    const weighted = criterionScore * criterion.weight;
    factors.push(factor(
      criterion.type,
      weighted,
      `Criterion ${criterion.type}: ${criterionScore.toFixed(2)}`
    ));
    scores.push(weighted);
  }

  if (hasQuery(query)) {
    const outcome = await probeRelevance(context.completionService, chunk, query);
    const explanation = outcome.source === 'model'
      ? `LLM relevance assessment: ${outcome.score.toFixed(2)}`
      : `Heuristic relevance (model ${outcome.cause}): ${outcome.score.toFixed(2)}`;
    factors.push(factor(FactorNames.LlmAssessment, outcome.score * 0.8, explanation));
    scores.push(outcome.score);
  }

  const score = scores.length > 0 ? clamp(mean(scores)) : 0.5;
  const primary = dominantFactor(factors);
  const reasoning = `Initial assessment based on ${factors.length} factors. Primary factor: ${primary?.name ?? 'none'}`;

  return { score, reasoning, factors };
}

export function performSelfReflection(
  chunk: Chunk,
  query: string | null,
  initialScore: number,
  initialFactors: readonly AssessmentFactor[]
): StageResult {
  const factors: AssessmentFactor[] = [];

  const bias = checkForBias(initialFactors);
  if (bias > 0) {
    factors.push(factor(
      FactorNames.BiasCorrection,
      -bias,
      `Correcting for assessment bias: ${bias.toFixed(2)}`
    ));
  }

  const completeness = evaluateCompleteness(chunk.content);
  if (completeness < 0.7) {
    factors.push(factor(
      FactorNames.CompletenessAdjustment,
      (completeness - 0.7) * 0.5,
      `Adjusting for incomplete coverage: ${completeness.toFixed(2)}`
    ));
  }

  const alternative = evaluateAlternativePerspective(chunk.content, query);
  if (Math.abs(alternative - initialScore) > 0.2) {
    factors.push(factor(
      FactorNames.AlternativePerspective,
      (alternative - initialScore) * 0.3,
      `Alternative view suggests: ${alternative.toFixed(2)}`
    ));
  }

  const adjustment = factors.reduce((sum, f) => sum + f.contribution, 0);
  const score = clamp(initialScore + adjustment);
  const reasoning = `Self-reflection identified ${factors.length} adjustments. Score adjusted from ${initialScore.toFixed(2)} to ${score.toFixed(2)}`;

  return { score, reasoning, factors };
}

export function performCriticValidation(
  chunk: Chunk,
  previousScore: number,
  existingFactors: readonly AssessmentFactor[]
): StageResult {
  const factors: AssessmentFactor[] = [];

  const consistency = evaluateConsistency(existingFactors);
  if (consistency < 0.8) {
    factors.push(factor(
      FactorNames.ConsistencyIssue,
      (consistency - 1) * 0.3,
      `Inconsistency detected: ${consistency.toFixed(2)}`
    ));
  }

  const validation = validateAgainstPatterns(chunk.content);
  factors.push(factor(
    FactorNames.PatternValidation,
    (validation - 0.5) * 0.5,
    `Pattern matching validation: ${validation.toFixed(2)}`
  ));

  const edgeCase = checkEdgeCases(chunk.content);
  if (edgeCase !== 0) {
    factors.push(factor(
      FactorNames.EdgeCaseDetection,
      edgeCase,
      `Edge case adjustment: ${edgeCase.toFixed(2)}`
    ));
  }

  const adjustment = factors.reduce((sum, f) => sum + f.contribution, 0);
  const score = clamp(previousScore + adjustment);
  const reasoning = `Critic validation performed ${factors.length} checks. Final validation score: ${score.toFixed(2)}`;

  return { score, reasoning, factors };
}

export async function assessChunk(
  chunk: Chunk,
  query: string | null,
  context: AssessmentContext
): Promise<ChunkAssessment> {
  const reasoning: Partial<Record<AssessmentStage, string>> = {};

  const initial = await performInitialAssessment(chunk, query, context);
  let factors: AssessmentFactor[] = [...initial.factors];
  reasoning.initial = initial.reasoning;

  let reflectionScore: number | undefined;
  let criticScore: number | undefined;

  if (context.useSelfReflection) {
    const reflection = performSelfReflection(chunk, query, initial.score, initial.factors);
    reflectionScore = reflection.score;
    reasoning.reflection = reflection.reasoning;
    factors = mergeFactors(factors, reflection.factors);
  }

  if (context.useCriticValidation) {
    const critic = performCriticValidation(chunk, reflectionScore ?? initial.score, factors);
    criticScore = critic.score;
    reasoning.critic = critic.reasoning;
    factors = mergeFactors(factors, critic.factors);
  }

  const finalScore = calculateFinalScore(initial.score, reflectionScore, criticScore);
  const confidence = calculateConfidence(initial.score, reflectionScore, criticScore, factors.length);

  logger.debug(`Assessed chunk ${chunk.id}: final=${finalScore.toFixed(2)} confidence=${confidence.toFixed(2)}`);

  return {
    initialScore: initial.score,
    ...(reflectionScore !== undefined ? { reflectionScore } : {}),
    ...(criticScore !== undefined ? { criticScore } : {}),
    finalScore,
    confidence,
    factors,
    suggestions: generateSuggestions(finalScore, factors),
    reasoning
  };
}
