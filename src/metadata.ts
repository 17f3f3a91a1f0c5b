/**
 * Chunk metadata helpers
 * Builders and typed accessors over the tagged metadata values
 */

import { ChunkMetadata, MetadataValue } from './types';

export const MetadataKeys = {
  Index: 'index',
  ProcessedAt: 'processed_at',
  FileType: 'file_type',
  ContentType: 'content_type',
  ChunkIndex: 'chunk_index'
} as const;

const TIMESTAMP_KEYS: ReadonlySet<string> = new Set([MetadataKeys.ProcessedAt]);

export function integer(value: number): MetadataValue {
  return { kind: 'integer', value: Math.trunc(value) };
}

export function text(value: string): MetadataValue {
  return { kind: 'string', value };
}

export function timestamp(value: Date): MetadataValue {
  return { kind: 'timestamp', value };
}

export function other(value: unknown): MetadataValue {
  return { kind: 'other', value };
}

/**
 * Convert a loosely typed record (e.g. parsed JSON) into chunk metadata.
 * Strings under well-known timestamp keys become timestamps when they parse.
 */
export function toChunkMetadata(record: Readonly<Record<string, unknown>>): ChunkMetadata {
  const metadata: Record<string, MetadataValue> = {};

  for (const [key, value] of Object.entries(record)) {
    metadata[key] = toMetadataValue(key, value);
  }

  return metadata;
}

function toMetadataValue(key: string, value: unknown): MetadataValue {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return integer(value);
  }

  if (value instanceof Date) {
    return timestamp(value);
  }

  if (typeof value === 'string') {
    if (TIMESTAMP_KEYS.has(key)) {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) {
        return timestamp(parsed);
      }
    }
    return text(value);
  }

  return other(value);
}

export function getInteger(metadata: ChunkMetadata | undefined, key: string): number | undefined {
  const entry = metadata?.[key];
  return entry?.kind === 'integer' ? entry.value : undefined;
}

export function getString(metadata: ChunkMetadata | undefined, key: string): string | undefined {
  const entry = metadata?.[key];
  return entry?.kind === 'string' ? entry.value : undefined;
}

export function getTimestamp(metadata: ChunkMetadata | undefined, key: string): Date | undefined {
  const entry = metadata?.[key];
  return entry?.kind === 'timestamp' ? entry.value : undefined;
}

/**
 * Document position of a chunk: an integer `index`, or a string that
 * holds one. Used for order preservation.
 */
export function getIndex(metadata: ChunkMetadata | undefined): number | undefined {
  const entry = metadata?.[MetadataKeys.Index];
  if (!entry) return undefined;

  if (entry.kind === 'integer') return entry.value;

  if (entry.kind === 'string' && /^\s*[+-]?\d+\s*$/.test(entry.value)) {
    return parseInt(entry.value, 10);
  }

  return undefined;
}

/**
 * Render any metadata value as text, for lookups that only care about the label.
 */
export function describeValue(entry: MetadataValue | undefined): string | undefined {
  if (!entry) return undefined;

  switch (entry.kind) {
    case 'integer':
      return String(entry.value);
    case 'string':
      return entry.value;
    case 'timestamp':
      return entry.value.toISOString();
    case 'other':
      return entry.value === null || entry.value === undefined ? undefined : String(entry.value);
  }
}
