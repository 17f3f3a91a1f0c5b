/**
 * Heuristic scorers
 * Deterministic, model-free signals used by every assessment stage
 */

import { AssessmentFactor, Chunk } from './types';
import { MetadataKeys, describeValue, getInteger, getTimestamp } from './metadata';

const DAY_MS = 24 * 60 * 60 * 1000;

const SOURCE_CREDIBILITY: Readonly<Record<string, number>> = {
  PDF: 0.8,
  DOCX: 0.7,
  WEB: 0.5,
  TXT: 0.4,
  TEXT: 0.4
};

export function clamp(value: number, min: number = 0, max: number = 1): number {
  return Math.max(min, Math.min(max, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population variance
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return mean(values.map(v => (v - avg) ** 2));
}

export function splitWords(content: string): string[] {
  return content.split(/\s+/).filter(word => word.length > 0);
}

export function hasQuery(query: string | null | undefined): query is string {
  return typeof query === 'string' && query.trim().length > 0;
}

function isUpperCase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function uniqueRatio(words: readonly string[]): number {
  const unique = new Set(words.map(w => w.toLowerCase()));
  return unique.size / words.length;
}

/**
 * Fraction of query terms found in the content (0.5 without a query)
 */
export function evaluateContentRelevance(content: string, query: string | null | undefined): number {
  if (!hasQuery(query)) return 0.5;

  const queryWords = splitWords(query.toLowerCase());
  const contentLower = content.toLowerCase();

  const matchCount = queryWords.filter(word => contentLower.includes(word)).length;
  return matchCount / queryWords.length;
}

/**
 * Lexical diversity with bonuses for numeric and technical tokens
 */
export function evaluateInformationDensity(content: string): number {
  const words = splitWords(content);
  if (words.length === 0) return 0;

  let density = uniqueRatio(words);

  if (words.some(w => /\d/.test(w))) density += 0.1;
  if (words.some(w => /[_.-]/.test(w))) density += 0.1;

  return Math.min(1, density);
}

export function evaluateStructuralImportance(chunk: Chunk): number {
  let score = 0.5;
  const content = chunk.content;
  const lower = content.toLowerCase();

  if (content.startsWith('#') || lower.includes('heading')) score += 0.2;
  if (content.includes('```') || lower.includes('code')) score += 0.15;
  if (lower.includes('table') || content.includes('|')) score += 0.15;

  const index = getInteger(chunk.metadata, MetadataKeys.Index);
  if (index !== undefined && index < 3) score += 0.1;

  return Math.min(1, score);
}

/**
 * Half credit each for a capitalised start and a terminal punctuation mark
 */
export function evaluateCompleteness(content: string): number {
  const trimmed = content.trim();
  if (trimmed.length === 0) return 0;

  const hasStart = isUpperCase(trimmed[0]);
  const hasEnd = /[.!?]$/.test(trimmed);

  return (hasStart ? 0.5 : 0) + (hasEnd ? 0.5 : 0);
}

export function evaluateFactualContent(content: string): number {
  let score = 0.5;

  if (/\d+/.test(content)) score += 0.2;
  if (content.includes('[') && content.includes(']')) score += 0.15;

  const capitalizedCount = content
    .split(' ')
    .filter(w => w.length > 2 && isUpperCase(w[0]))
    .length;
  if (capitalizedCount > 2) score += 0.15;

  return Math.min(1, score);
}

export function evaluateRecency(chunk: Chunk, now: Date = new Date()): number {
  const processedAt = getTimestamp(chunk.metadata, MetadataKeys.ProcessedAt);
  if (!processedAt) return 0.5;

  const ageDays = (now.getTime() - processedAt.getTime()) / DAY_MS;
  if (ageDays < 7) return 1.0;
  if (ageDays < 30) return 0.8;
  if (ageDays < 90) return 0.6;
  return 0.4;
}

export function evaluateSourceCredibility(chunk: Chunk): number {
  const fileType = describeValue(chunk.metadata?.[MetadataKeys.FileType]);
  if (fileType === undefined) return 0.5;

  return SOURCE_CREDIBILITY[fileType.toUpperCase()] ?? 0.5;
}

export function evaluateKeywordPresence(
  content: string,
  value: string | readonly string[] | undefined
): number {
  const contentLower = content.toLowerCase();

  if (typeof value === 'string') {
    return contentLower.includes(value.toLowerCase()) ? 1.0 : 0.0;
  }

  if (value === undefined) return 0.5;
  if (value.length === 0) return 0.5;

  const matches = value.filter(k => contentLower.includes(k.toLowerCase())).length;
  return matches / value.length;
}

/**
 * Share of total absolute contribution held by the single largest factor
 */
export function factorConcentration(factors: readonly AssessmentFactor[]): number {
  if (factors.length === 0) return 0;

  const magnitudes = factors.map(f => Math.abs(f.contribution));
  const total = magnitudes.reduce((sum, m) => sum + m, 0);
  if (total === 0) return 0;

  return Math.max(...magnitudes) / total;
}

/**
 * Penalty magnitude for an assessment dominated by one factor; 0 when balanced
 */
export function checkForBias(factors: readonly AssessmentFactor[]): number {
  const concentration = factorConcentration(factors);
  return concentration > 0.7 ? (concentration - 0.7) * 0.5 : 0;
}

export function evaluateAlternativePerspective(content: string, query: string | null | undefined): number {
  if (!hasQuery(query)) return 0.5;

  const directRelevance = evaluateContentRelevance(content, query);

  if (directRelevance > 0.8) return directRelevance;
  if (directRelevance < 0.2) return 0.3;

  return directRelevance;
}

export function evaluateConsistency(factors: readonly AssessmentFactor[]): number {
  if (factors.length < 2) return 1.0;

  return Math.max(0, 1 - variance(factors.map(f => f.contribution)) * 2);
}

export function validateAgainstPatterns(content: string): number {
  let score = 0.5;
  const length = content.length;

  if (length > 100 && length < 2000) score += 0.1;
  if (content.includes('. ') || content.includes('.\n')) score += 0.1;
  if (length < 50) score -= 0.2;

  if (length > 0) {
    const newlines = content.split('\n').length - 1;
    if (newlines / length > 0.05) score -= 0.1;
  }

  return clamp(score);
}

/**
 * Net penalty for very short, mostly numeric or highly repetitive content
 */
export function checkEdgeCases(content: string): number {
  let adjustment = 0;

  if (content.length < 50) adjustment -= 0.3;

  const words = splitWords(content);
  if (words.length > 0) {
    const numberWords = words.filter(w => /^[\d.,]+$/.test(w)).length;
    if (numberWords / words.length > 0.8) adjustment -= 0.2;

    if (words.length > 10 && uniqueRatio(words) < 0.3) adjustment -= 0.2;
  }

  return adjustment;
}
