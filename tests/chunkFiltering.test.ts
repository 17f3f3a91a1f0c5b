/**
 * Tests for the batch chunk filtering service
 */

import { ChunkFilteringService, resolveFilteringOptions } from '../src/chunkFiltering';
import { CancelledError, PreconditionError } from '../src/errors';
import { criterion } from '../src/criteria';
import { integer, text } from '../src/metadata';
import { Chunk, CompletionOptions, CriterionType, TextCompletionService } from '../src/types';
import { createStubCompletionService, createTestChunk } from './test-helpers';

const now = () => new Date('2024-06-30T00:00:00Z');

function sampleChunks(): Chunk[] {
  return [
    createTestChunk('ml', 'Machine learning is a subset of AI.'),
    createTestChunk('weather', 'The weather is sunny.'),
    createTestChunk('short', 'Short.'),
    createTestChunk(
      'long',
      'Machine learning models learn patterns from data. Training uses labelled examples and a loss function to adjust parameters.'
    )
  ];
}

describe('Chunk Filtering Module', () => {
  describe('Option resolution', () => {
    it('should apply the defaults', () => {
      expect(resolveFilteringOptions()).toEqual({
        minRelevanceScore: 0.6,
        preserveOrder: false,
        qualityWeight: 0.3,
        useSelfReflection: true,
        useCriticValidation: true,
        batchSize: 5,
        criteria: []
      });
    });

    it.each([
      [{ batchSize: 0 }],
      [{ batchSize: 2.5 }],
      [{ qualityWeight: 1.5 }],
      [{ qualityWeight: -0.1 }],
      [{ maxChunks: -1 }],
      [{ minRelevanceScore: Number.NaN }]
    ])('should reject %j', options => {
      expect(() => resolveFilteringOptions(options)).toThrow(PreconditionError);
    });
  });

  describe('Filtering', () => {
    it('should reject an irrelevant chunk', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.1'), now);

      const results = await service.filter(
        [createTestChunk('t1', 'The weather is sunny.')],
        'machine learning',
        { minRelevanceScore: 0.7 }
      );

      expect(results).toEqual([]);
    });

    it('should accept a relevant chunk with scores and a reason', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.9'), now);

      const results = await service.filter(
        [createTestChunk('t1', 'Machine learning is a subset of AI.')],
        'machine learning',
        { minRelevanceScore: 0.5 }
      );

      expect(results).toHaveLength(1);
      const [result] = results;
      expect(result.passed).toBe(true);
      expect(result.relevanceScore).toBeCloseTo(0.73, 10);
      expect(result.qualityScore).toBe(1);
      expect(result.combinedScore).toBeCloseTo(0.811, 10);
      expect(result.reason).toBe('Relevance: 0.73, Key factor: Content Relevance');
    });

    it('should return an empty list without calling the provider', async () => {
      const completionService = createStubCompletionService('0.9');
      const service = new ChunkFilteringService(completionService, now);

      await expect(service.filter([], 'machine learning')).resolves.toEqual([]);
      expect(completionService.complete).not.toHaveBeenCalled();
    });

    it.each([
      ['a scoring provider', createStubCompletionService('0.6'), 1],
      ['an always failing provider with a heavy criterion', createStubCompletionService(new Error('API Error')), 3]
    ])('should keep every score within [0, 1] with %s', async (_label, completionService, weight) => {
      const service = new ChunkFilteringService(completionService, now);
      const criteria = [criterion(CriterionType.KeywordPresence, { value: 'learning', weight })];

      const results = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0, criteria });

      expect(results).toHaveLength(4);
      for (const result of results) {
        const { assessment } = result;
        const scores = [
          result.relevanceScore,
          result.qualityScore,
          result.combinedScore,
          assessment.initialScore,
          assessment.reflectionScore,
          assessment.criticScore,
          assessment.finalScore,
          assessment.confidence
        ];
        for (const score of scores) {
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      }
    });

    it('should pass a subset when the threshold rises', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);

      const lenient = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0.3 });
      const strict = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0.6 });

      const lenientIds = lenient.map(r => r.chunk.id);
      expect(strict.length).toBeLessThanOrEqual(lenient.length);
      for (const result of strict) {
        expect(lenientIds).toContain(result.chunk.id);
        expect(result.combinedScore).toBeGreaterThanOrEqual(0.6);
      }
    });

    it('should cap results to the highest combined scores', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);

      const all = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0 });
      const capped = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0, maxChunks: 2 });

      const expected = [...all].sort((a, b) => b.combinedScore - a.combinedScore).slice(0, 2);
      expect(capped.map(r => r.chunk.id)).toEqual(expected.map(r => r.chunk.id));
    });

    it('should return nothing for a cap of zero', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);
      await expect(service.filter(sampleChunks(), null, { minRelevanceScore: 0, maxChunks: 0 })).resolves.toEqual([]);
    });

    it('should keep input order for chunks indexed in that order', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);
      const chunks = [
        createTestChunk('1', 'First section of the guide.', { index: integer(0) }),
        createTestChunk('2', 'Second section of the guide.', { index: integer(1) }),
        createTestChunk('3', 'Third section of the guide.', { index: integer(2) })
      ];

      const results = await service.filter(chunks, null, { minRelevanceScore: 0, preserveOrder: true });

      expect(results.every(r => r.passed)).toBe(true);
      expect(results.map(r => r.chunk.id)).toEqual(['1', '2', '3']);
    });

    it('should restore document order by index, unindexed last', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);
      const chunks = [
        createTestChunk('c', 'Third section of the guide.', { index: integer(2) }),
        createTestChunk('none', 'Appendix without position.'),
        createTestChunk('a', 'First section of the guide.', { index: integer(0) }),
        createTestChunk('b', 'Second section of the guide.', { index: text('1') })
      ];

      const results = await service.filter(chunks, null, { minRelevanceScore: 0, preserveOrder: true });

      expect(results.map(r => r.chunk.id)).toEqual(['a', 'b', 'c', 'none']);
    });

    it('should skip disabled stages', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.6'), now);

      const results = await service.filter(sampleChunks(), 'machine learning', {
        minRelevanceScore: 0,
        useSelfReflection: false,
        useCriticValidation: false
      });

      for (const result of results) {
        expect(result.assessment.reflectionScore).toBeUndefined();
        expect(result.assessment.criticScore).toBeUndefined();
        expect(result.relevanceScore).toBeCloseTo(result.assessment.initialScore, 10);
      }
    });

    it('should degrade to heuristics when the provider fails', async () => {
      const service = new ChunkFilteringService(createStubCompletionService(new Error('API Error')), now);

      const results = await service.filter(sampleChunks(), 'machine learning', { minRelevanceScore: 0 });

      expect(results).toHaveLength(4);
      const ml = results.find(r => r.chunk.id === 'ml');
      expect(ml?.assessment.factors.find(f => f.name === 'LLM Assessment')?.explanation)
        .toBe('Heuristic relevance (model error): 1.00');
    });

    it('should never run more completions at once than the batch size', async () => {
      let inFlight = 0;
      let peak = 0;
      const completionService: TextCompletionService = {
        complete: jest.fn<Promise<string>, [string, CompletionOptions?, AbortSignal?]>(async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await new Promise(resolve => setImmediate(resolve));
          inFlight--;
          return '0.5';
        }),
        async *completeStream() {
          yield '0.5';
        }
      };
      const service = new ChunkFilteringService(completionService, now);
      const chunks = Array.from({ length: 7 }, (_, i) => createTestChunk(`c${i}`, `Chunk number ${i}.`));

      await service.filter(chunks, 'chunk', { batchSize: 3 });

      expect(peak).toBe(3);
      expect(completionService.complete).toHaveBeenCalledTimes(7);
    });

    it('should reject chunks without string content', async () => {
      const service = new ChunkFilteringService(createStubCompletionService(), now);
      const malformed = JSON.parse('{"id": "x", "content": 42}');

      await expect(service.filter([malformed], null)).rejects.toThrow(PreconditionError);
    });
  });

  describe('Cancellation', () => {
    it('should not start when already cancelled', async () => {
      const completionService = createStubCompletionService('0.5');
      const service = new ChunkFilteringService(completionService, now);
      const controller = new AbortController();
      controller.abort();

      await expect(service.filter(sampleChunks(), 'machine learning', {}, controller.signal))
        .rejects.toThrow(CancelledError);
      expect(completionService.complete).not.toHaveBeenCalled();
    });

    it('should stop at the next batch boundary', async () => {
      const controller = new AbortController();
      const completionService = createStubCompletionService('0.5');
      completionService.complete.mockImplementation(async () => {
        controller.abort();
        return '0.5';
      });
      const service = new ChunkFilteringService(completionService, now);

      const run = service.filter(sampleChunks(), 'machine learning', { batchSize: 1 }, controller.signal);

      await expect(run).rejects.toMatchObject({ code: 'CANCELLED', context: { processed: 1, total: 4 } });
      expect(completionService.complete).toHaveBeenCalledTimes(1);
    });
    it('should let calls already dispatched in a batch finish', async () => {
      const controller = new AbortController();
      const completionService = createStubCompletionService('0.9');
      completionService.complete.mockImplementation(async () => {
        controller.abort();
        return '0.9';
      });
      const service = new ChunkFilteringService(completionService, now);

      const results = await service.filter(
        sampleChunks(),
        'machine learning',
        { minRelevanceScore: 0, batchSize: 4 },
        controller.signal
      );

      expect(results).toHaveLength(4);
      expect(completionService.complete.mock.calls.map(call => call[2])).toEqual([undefined, undefined, undefined, undefined]);
      const ml = results.find(r => r.chunk.id === 'ml');
      expect(ml?.assessment.factors.find(f => f.name === 'LLM Assessment')?.explanation)
        .toBe('LLM relevance assessment: 0.90');
    });
  });

  describe('Single assessment', () => {
    it('should assess one chunk', async () => {
      const service = new ChunkFilteringService(createStubCompletionService('0.9'), now);

      const assessment = await service.assess(
        createTestChunk('t1', 'Machine learning is a subset of AI.'),
        'machine learning'
      );

      expect(assessment.finalScore).toBeCloseTo(0.73, 10);
    });

    it('should refuse a cancelled signal', async () => {
      const service = new ChunkFilteringService(createStubCompletionService(), now);
      const controller = new AbortController();
      controller.abort();

      await expect(service.assess(createTestChunk('t1', 'Text.'), null, {}, controller.signal))
        .rejects.toThrow(CancelledError);
    });
  });
});
