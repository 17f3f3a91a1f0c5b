/**
 * Main entry point for the chunk filter CLI
 * Reads chunks from a JSON file, filters them against a query and prints the verdicts
 */

import * as fs from 'fs';
import * as path from 'path';
import { Chunk, ChunkFilteringOptions, FilteredChunk } from './types';
import { ChunkFilteringService } from './chunkFiltering';
import { createCompletionService, loadConfig } from './config';
import { toChunkMetadata } from './metadata';
import { PreconditionError } from './errors';
import { logger } from './logger';

export const USAGE = `
Chunk Quality Filter

Usage:
  chunk-filter <chunks.json> [options]

Arguments:
  <chunks.json>             JSON array of { id, content, metadata? } objects (required)

Options:
  --query <text>            Query to assess relevance against (optional)
  --min-score <number>      Minimum combined score to keep a chunk
  --max-chunks <number>     Keep at most this many chunks
  --quality-weight <number> Weight of quality against relevance (0-1)
  --batch-size <number>     Chunks assessed concurrently per batch
  --preserve-order          Return chunks in document order
  --no-reflection           Skip the self-reflection stage
  --no-critic               Skip the critic validation stage
  --output <path>           Save results as JSON (optional)
  --help, -h                Show this help message

Environment Variables:
  CHUNK_FILTER_PROVIDER     groq (default) or http
  GROQ_API_KEY              Groq API key (groq provider)
  LLM_BASE_URL              OpenAI-compatible endpoint (http provider)
`;

export type CliCommand =
  | { kind: 'help' }
  | {
    kind: 'run';
    inputPath: string;
    query: string | null;
    outputPath?: string;
    options: ChunkFilteringOptions;
  };

function parseNumberFlag(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new PreconditionError(`${flag} expects a number, got "${value ?? ''}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments; `defaults` come from the environment config
 */
export function parseArgs(args: readonly string[], defaults: ChunkFilteringOptions = {}): CliCommand {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }

  const inputPath = args[0];
  const options: ChunkFilteringOptions = { ...defaults };
  let query: string | null = null;
  let outputPath: string | undefined;

  for (let i = 1; i < args.length; i++) {
    const key = args[i];

    switch (key) {
      case '--query':
        query = args[++i] ?? null;
        break;
      case '--min-score':
        options.minRelevanceScore = parseNumberFlag(key, args[++i]);
        break;
      case '--max-chunks':
        options.maxChunks = parseNumberFlag(key, args[++i]);
        break;
      case '--quality-weight':
        options.qualityWeight = parseNumberFlag(key, args[++i]);
        break;
      case '--batch-size':
        options.batchSize = parseNumberFlag(key, args[++i]);
        break;
      case '--output':
        outputPath = args[++i];
        break;
      case '--preserve-order':
        options.preserveOrder = true;
        break;
      case '--no-reflection':
        options.useSelfReflection = false;
        break;
      case '--no-critic':
        options.useCriticValidation = false;
        break;
      default:
        throw new PreconditionError(`Unknown option: ${key}`);
    }
  }

  return { kind: 'run', inputPath, query, outputPath, options };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed JSON into chunks
 */
export function parseChunks(raw: unknown): Chunk[] {
  if (!Array.isArray(raw)) {
    throw new PreconditionError('Chunk file must contain a JSON array');
  }

  return raw.map((item: unknown, position) => {
    if (!isRecord(item) || typeof item.content !== 'string') {
      throw new PreconditionError(`Chunk at position ${position} has no string content`);
    }

    const id = typeof item.id === 'string' || typeof item.id === 'number'
      ? String(item.id)
      : String(position);

    return isRecord(item.metadata)
      ? { id, content: item.content, metadata: toChunkMetadata(item.metadata) }
      : { id, content: item.content };
  });
}

export function loadChunks(filePath: string): Chunk[] {
  if (!fs.existsSync(filePath)) {
    throw new PreconditionError(`File not found: ${filePath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseChunks(parsed);
}

/**
 * Save filtering results to a JSON file
 */
export function saveFilterResults(results: readonly FilteredChunk[], outputPath: string): void {
  logger.info(`Saving filter results to: ${outputPath}`);

  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(outputPath, JSON.stringify(results, null, 2), 'utf-8');

  logger.success(`Results saved to: ${outputPath}`);
}

export function formatResultLine(result: FilteredChunk): string {
  return `${result.chunk.id}\t${result.combinedScore.toFixed(2)}\t${result.reason}`;
}

/**
 * Run the CLI; failures set a non-zero exit code.
 * Provider settings are only required once there is a run to perform.
 */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  try {
    const command = parseArgs(args);

    if (command.kind === 'help') {
      console.log(USAGE);
      return;
    }

    const config = loadConfig(env);
    const options: ChunkFilteringOptions = { ...config.filtering, ...command.options };

    logger.section('Chunk Filtering');
    logger.info(`Input: ${path.basename(command.inputPath)}`);
    logger.info(`Provider: ${config.provider}`);

    const chunks = loadChunks(command.inputPath);
    const service = new ChunkFilteringService(createCompletionService(config));

    const startTime = Date.now();
    const results = await service.filter(chunks, command.query, options);
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);

    logger.separator('=');
    results.forEach(result => console.log(formatResultLine(result)));
    logger.separator('=');
    logger.success(`${results.length}/${chunks.length} chunks passed in ${duration}s`);

    if (command.outputPath) {
      saveFilterResults(results, command.outputPath);
    }
  } catch (error) {
    logger.error('Chunk filtering failed', error);
    process.exitCode = 1;
  } finally {
    logger.close();
  }
}
