/**
 * Unit tests for chunk metadata helpers
 */

import {
  describeValue,
  getIndex,
  getInteger,
  getString,
  getTimestamp,
  integer,
  other,
  text,
  toChunkMetadata
} from '../src/metadata';

describe('Metadata Module', () => {
  describe('Conversion from plain records', () => {
    const metadata = toChunkMetadata({
      index: 2,
      processed_at: '2024-01-01T00:00:00Z',
      file_type: 'pdf',
      score: 0.5,
      created: '2024-01-01T00:00:00Z',
      tags: ['a', 'b']
    });

    it('should tag integers', () => {
      expect(metadata.index).toEqual({ kind: 'integer', value: 2 });
    });

    it('should parse timestamps under well-known keys only', () => {
      expect(getTimestamp(metadata, 'processed_at')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(getString(metadata, 'created')).toBe('2024-01-01T00:00:00Z');
    });

    it('should keep strings and wrap everything else', () => {
      expect(getString(metadata, 'file_type')).toBe('pdf');
      expect(metadata.score).toEqual({ kind: 'other', value: 0.5 });
      expect(metadata.tags).toEqual({ kind: 'other', value: ['a', 'b'] });
    });

    it('should keep an unparseable timestamp as a string', () => {
      const converted = toChunkMetadata({ processed_at: 'last week' });
      expect(getString(converted, 'processed_at')).toBe('last week');
      expect(getTimestamp(converted, 'processed_at')).toBeUndefined();
    });
  });

  describe('Typed accessors', () => {
    it('should return undefined for a different kind', () => {
      const metadata = { index: text('3') };
      expect(getInteger(metadata, 'index')).toBeUndefined();
      expect(getInteger(undefined, 'index')).toBeUndefined();
    });

    it('should read the index from integers and numeric strings', () => {
      expect(getIndex({ index: integer(4) })).toBe(4);
      expect(getIndex({ index: text(' 7 ') })).toBe(7);
      expect(getIndex({ index: text('seven') })).toBeUndefined();
      expect(getIndex({})).toBeUndefined();
      expect(getIndex(undefined)).toBeUndefined();
    });

    it('should describe values as text', () => {
      expect(describeValue(integer(9))).toBe('9');
      expect(describeValue(other(null))).toBeUndefined();
      expect(describeValue(other(true))).toBe('true');
      expect(describeValue(undefined)).toBeUndefined();
    });
  });
});
