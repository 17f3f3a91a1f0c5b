/**
 * Score composition
 * Turns stage scores and factors into the final verdict values
 */

import { AssessmentFactor, ChunkAssessment } from './types';
import { clamp, mean, variance } from './heuristics';

export const FactorNames = {
  ContentRelevance: 'Content Relevance',
  InformationDensity: 'Information Density',
  StructuralImportance: 'Structural Importance',
  LlmAssessment: 'LLM Assessment',
  BiasCorrection: 'Bias Correction',
  CompletenessAdjustment: 'Completeness Adjustment',
  AlternativePerspective: 'Alternative Perspective',
  ConsistencyIssue: 'Consistency Issue',
  PatternValidation: 'Pattern Validation',
  EdgeCaseDetection: 'Edge Case Detection'
} as const;

export const Suggestions = {
  RefineBoundaries: 'Consider refining chunk boundaries to capture more complete context',
  LowDensity: 'Low information density - consider merging with adjacent chunks',
  EdgeCase: 'Edge case detected - review chunk extraction logic'
} as const;

const STAGE_WEIGHTS = { initial: 0.4, reflection: 0.3, critic: 0.3 } as const;

function findFactor(factors: readonly AssessmentFactor[], name: string): AssessmentFactor | undefined {
  return factors.find(f => f.name === name);
}

/**
 * First factor with the largest absolute contribution
 */
export function dominantFactor(factors: readonly AssessmentFactor[]): AssessmentFactor | undefined {
  return factors.reduce<AssessmentFactor | undefined>(
    (best, f) => (best === undefined || Math.abs(f.contribution) > Math.abs(best.contribution) ? f : best),
    undefined
  );
}

function weakestFactor(factors: readonly AssessmentFactor[]): AssessmentFactor | undefined {
  return factors.reduce<AssessmentFactor | undefined>(
    (worst, f) => (worst === undefined || f.contribution < worst.contribution ? f : worst),
    undefined
  );
}

function presentScores(initial: number, reflection?: number, critic?: number): number[] {
  const scores = [initial];
  if (reflection !== undefined) scores.push(reflection);
  if (critic !== undefined) scores.push(critic);
  return scores;
}

/**
 * Weighted mean of the stages that ran, renormalised over their weights
 */
export function calculateFinalScore(initial: number, reflection?: number, critic?: number): number {
  const weighted: Array<[number, number]> = [[initial, STAGE_WEIGHTS.initial]];
  if (reflection !== undefined) weighted.push([reflection, STAGE_WEIGHTS.reflection]);
  if (critic !== undefined) weighted.push([critic, STAGE_WEIGHTS.critic]);

  const totalWeight = weighted.reduce((sum, [, w]) => sum + w, 0);
  return clamp(weighted.reduce((sum, [score, w]) => sum + score * w / totalWeight, 0));
}

/**
 * Agreement between stages, factor diversity and score extremity
 */
export function calculateConfidence(
  initial: number,
  reflection: number | undefined,
  critic: number | undefined,
  factorCount: number
): number {
  const scores = presentScores(initial, reflection, critic);
  const consistency = Math.max(0, 1 - variance(scores) * 2);
  const factorDiversity = Math.min(1, factorCount / 10);
  const extremity = Math.abs(mean(scores) - 0.5) * 2;

  return clamp(consistency * 0.5 + factorDiversity * 0.3 + extremity * 0.2);
}

export function calculateQualityScore(assessment: Pick<ChunkAssessment, 'factors'>): number {
  let quality = 0.5;

  const density = findFactor(assessment.factors, FactorNames.InformationDensity);
  if (density) quality = Math.max(quality, density.contribution + 0.5);

  const completeness = findFactor(assessment.factors, FactorNames.CompletenessAdjustment);
  if (completeness) quality += completeness.contribution * 0.5;

  return clamp(quality);
}

export function calculateCombinedScore(relevance: number, quality: number, qualityWeight: number): number {
  return clamp(relevance * (1 - qualityWeight) + quality * qualityWeight);
}

export function generateSuggestions(finalScore: number, factors: readonly AssessmentFactor[]): string[] {
  const suggestions: string[] = [];

  if (finalScore < 0.5) suggestions.push(Suggestions.RefineBoundaries);

  const density = findFactor(factors, FactorNames.InformationDensity);
  if (density && density.contribution < 0.3) suggestions.push(Suggestions.LowDensity);

  const edgeCase = findFactor(factors, FactorNames.EdgeCaseDetection);
  if (edgeCase && edgeCase.contribution < -0.1) suggestions.push(Suggestions.EdgeCase);

  return suggestions;
}

export function generateReason(
  assessment: ChunkAssessment,
  passed: boolean,
  minRelevanceScore: number
): string {
  const reasons: string[] = [];

  if (passed) {
    reasons.push(`Relevance: ${assessment.finalScore.toFixed(2)}`);
    const top = dominantFactor(assessment.factors);
    if (top) reasons.push(`Key factor: ${top.name}`);
  } else {
    reasons.push(`Below threshold (${minRelevanceScore.toFixed(2)})`);
    const worst = weakestFactor(assessment.factors);
    if (worst) reasons.push(`Issue: ${worst.name}`);
  }

  if (assessment.confidence < 0.5) reasons.push('Low confidence assessment');

  return reasons.join(', ');
}
