/**
 * Model-free chunk quality analysis
 * Used before enrichment to decide which follow-up steps a chunk deserves
 */

import { ChunkMetadata } from './types';
import { MetadataKeys, getInteger, getString } from './metadata';
import { evaluateInformationDensity } from './heuristics';

export const MIN_SUMMARIZATION_LENGTH = 500;
export const MIN_KEYWORD_DENSITY = 0.3;

export type EnrichmentRecommendation =
  | 'summarize'
  | 'extract-keywords'
  | 'add-context'
  | 'use-table-prompt';

export interface ChunkQualityResult {
  overallScore: number;
  completenessScore: number;
  densityScore: number;
  structureScore: number;
  contentLength: number;
  recommendations: EnrichmentRecommendation[];
}

function evaluateCompleteness(content: string): number {
  const trimmed = content.trim();
  if (trimmed.length === 0) return 0;

  let score = 0;
  const first = trimmed[0];

  if ((first !== first.toLowerCase() && first === first.toUpperCase()) || first === '#' || first === '-') {
    score += 0.5;
  }

  if (/[.!?:;]$/.test(trimmed)) score += 0.5;

  return score;
}

function evaluateStructure(content: string): number {
  let score = 0.5;

  if (content.startsWith('#') || content.includes('\n#')) score += 0.15;
  if (content.includes('```')) score += 0.15;
  if (content.includes('|') && content.includes('\n')) score += 0.1;
  if (content.includes('\n- ') || content.includes('\n* ') || content.includes('\n1.')) score += 0.1;

  return Math.min(1, score);
}

function recommend(content: string, completeness: number, density: number): EnrichmentRecommendation[] {
  const recommendations: EnrichmentRecommendation[] = [];

  if (content.length >= MIN_SUMMARIZATION_LENGTH) recommendations.push('summarize');
  if (density >= MIN_KEYWORD_DENSITY) recommendations.push('extract-keywords');
  if (completeness < 0.5) recommendations.push('add-context');

  return recommendations;
}

export function analyzeChunkQuality(content: string, metadata?: ChunkMetadata): ChunkQualityResult {
  if (content.trim().length === 0) {
    return {
      overallScore: 0,
      completenessScore: 0,
      densityScore: 0,
      structureScore: 0,
      contentLength: 0,
      recommendations: []
    };
  }

  const completenessScore = evaluateCompleteness(content);
  const densityScore = evaluateInformationDensity(content);
  const baseStructure = evaluateStructure(content);
  let structureScore = baseStructure;
  const recommendations = recommend(content, completenessScore, densityScore);

  // Tables score on layout rather than prose
  if (getString(metadata, MetadataKeys.ContentType)?.toLowerCase() === 'table') {
    structureScore = Math.max(structureScore, 0.8);
    recommendations.push('use-table-prompt');
  }

  const chunkIndex = getInteger(metadata, MetadataKeys.ChunkIndex);
  if (chunkIndex !== undefined && chunkIndex < 3) {
    structureScore = Math.min(1, structureScore + 0.1);
  }

  // Metadata adjustments do not feed the overall score
  const overallScore = completenessScore * 0.3 + densityScore * 0.4 + baseStructure * 0.3;

  return {
    overallScore,
    completenessScore,
    densityScore,
    structureScore,
    contentLength: content.length,
    recommendations
  };
}

export function shouldSummarize(result: ChunkQualityResult): boolean {
  return result.recommendations.includes('summarize');
}

export function shouldExtractKeywords(result: ChunkQualityResult): boolean {
  return result.recommendations.includes('extract-keywords');
}
