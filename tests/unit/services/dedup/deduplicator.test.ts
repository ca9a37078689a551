import { describe, it, expect } from 'vitest';
import {
  deduplicate,
  deduplicateByDocument,
} from '../../../../src/services/dedup/deduplicator.js';
import type { EmbeddingProvider } from '../../../../src/services/embedding/ollama.js';
import { KeywordEmbedder, moneyRecord } from '../helpers.js';

const LONG = 'The minimum EU grant request is EUR 500,000.';
const SHORT = 'EUR 500,000 is the minimum request.';

describe('deduplicateByDocument', () => {
  it('collapses two mentions of one amount to the longer sentence', async () => {
    const first = moneyRecord({ originalSentence: LONG });
    const second = moneyRecord({ originalSentence: SHORT });

    const result = await deduplicateByDocument([first, second], {
      embedder: new KeywordEmbedder(['minimum']),
    });

    expect(result.records).toEqual([first]);
    expect(result.duplicatesRemoved).toBe(1);
    expect(result.unembedded).toEqual([]);
  });

  it('puts the representative where the earliest member stood', async () => {
    const short = moneyRecord({ originalSentence: SHORT });
    const other = moneyRecord({ value: 100000, originalSentence: 'Co-financing is EUR 100,000.' });
    const long = moneyRecord({ originalSentence: LONG });

    const result = await deduplicateByDocument([short, other, long], {
      embedder: new KeywordEmbedder(['minimum']),
    });

    expect(result.records).toEqual([long, other]);
  });

  it('keeps the earliest record when sentences are equally long', async () => {
    const a = moneyRecord({ originalSentence: 'Minimum request: EUR 500,000 (A).' });
    const b = moneyRecord({ originalSentence: 'Minimum request: EUR 500,000 (B).' });

    const result = await deduplicateByDocument([a, b], {
      embedder: new KeywordEmbedder(['minimum']),
    });
    expect(result.records).toEqual([a]);
  });

  it('never merges different values', async () => {
    const a = moneyRecord({ value: 500000, originalSentence: LONG });
    const b = moneyRecord({ value: 600000, originalSentence: LONG });

    const result = await deduplicateByDocument([a, b], {
      embedder: new KeywordEmbedder(['minimum']),
    });
    expect(result.records).toEqual([a, b]);
  });

  it('never merges across documents', async () => {
    const a = moneyRecord({ documentId: 'doc-1', originalSentence: LONG });
    const b = moneyRecord({ documentId: 'doc-2', originalSentence: LONG });

    const result = await deduplicateByDocument([a, b], {
      embedder: new KeywordEmbedder(['minimum']),
    });
    expect(result.records).toEqual([a, b]);
  });

  it('compares currencies without case or surrounding spaces', async () => {
    const a = moneyRecord({ currency: 'EUR', originalSentence: SHORT });
    const b = moneyRecord({ currency: ' eur ', originalSentence: LONG });

    const result = await deduplicateByDocument([a, b], {
      embedder: new KeywordEmbedder(['minimum']),
    });
    expect(result.records).toEqual([b]);
  });

  it('keeps mentions whose sentences are about different things', async () => {
    const a = moneyRecord({ originalSentence: 'The minimum request is EUR 500,000.' });
    const b = moneyRecord({ originalSentence: 'The maximum co-financing is EUR 500,000.' });

    const result = await deduplicateByDocument([a, b], {
      embedder: new KeywordEmbedder(['minimum', 'maximum']),
    });
    expect(result.records).toEqual([a, b]);
    expect(result.duplicatesRemoved).toBe(0);
  });

  it('passes a record through when its sentence cannot be embedded', async () => {
    const a = moneyRecord({ originalSentence: LONG });
    const broken = moneyRecord({ originalSentence: 'broken minimum EUR 500,000' });
    const b = moneyRecord({ originalSentence: SHORT });

    const result = await deduplicateByDocument([a, broken, b], {
      embedder: new KeywordEmbedder(['minimum'], ['broken']),
    });

    expect(result.records).toEqual([a, broken]);
    expect(result.unembedded).toEqual([broken.id]);
  });

  it('passes a record through when its vector has another length', async () => {
    const a = moneyRecord({ originalSentence: LONG });
    const b = moneyRecord({ originalSentence: SHORT });
    const embedder: EmbeddingProvider = {
      embed: async (text) => (text === SHORT ? new Float32Array([1, 0, 0]) : new Float32Array([1, 0])),
    };

    const result = await deduplicateByDocument([a, b], { embedder });

    expect(result.records).toEqual([a, b]);
    expect(result.unembedded).toEqual([b.id]);
  });

  it('rethrows errors other than embedding failures', async () => {
    const failing: EmbeddingProvider = {
      embed: () => Promise.reject(new TypeError('bug')),
    };
    await expect(
      deduplicateByDocument([moneyRecord(), moneyRecord()], { embedder: failing })
    ).rejects.toThrow(TypeError);
  });

  it('embeds each distinct sentence once and skips singletons', async () => {
    const embedder = new KeywordEmbedder(['minimum']);
    await deduplicateByDocument(
      [
        moneyRecord({ originalSentence: LONG }),
        moneyRecord({ originalSentence: LONG }),
        moneyRecord({ originalSentence: SHORT }),
        moneyRecord({ value: 1, originalSentence: 'Alone with EUR 1.' }),
      ],
      { embedder }
    );
    expect(embedder.calls).toEqual([LONG, SHORT]);
  });

  it('merges nothing at threshold 0', async () => {
    const records = [moneyRecord({ originalSentence: LONG }), moneyRecord({ originalSentence: LONG })];
    const result = await deduplicateByDocument(records, {
      embedder: new KeywordEmbedder(['minimum']),
      threshold: 0,
    });
    expect(result.records).toEqual(records);
  });

  it('rejects a negative threshold', async () => {
    await expect(
      deduplicateByDocument([], { embedder: new KeywordEmbedder([]), threshold: -0.1 })
    ).rejects.toThrow(RangeError);
  });

  it('returns an empty list for no records', async () => {
    const result = await deduplicateByDocument([], { embedder: new KeywordEmbedder([]) });
    expect(result).toEqual({ records: [], duplicatesRemoved: 0, unembedded: [] });
  });
});

describe('deduplicate', () => {
  it('is idempotent', async () => {
    const embedder = new KeywordEmbedder(['minimum', 'maximum', 'budget']);
    const records = [
      moneyRecord({ originalSentence: SHORT }),
      moneyRecord({ originalSentence: 'The maximum grant is EUR 500,000.' }),
      moneyRecord({ value: 2000000, originalSentence: 'The total budget is EUR 2,000,000.' }),
      moneyRecord({ originalSentence: LONG }),
      moneyRecord({ value: 2000000, originalSentence: 'Budget: EUR 2,000,000.' }),
      moneyRecord({ documentId: 'doc-2', originalSentence: LONG }),
    ];

    const once = await deduplicate(records, { embedder });
    const twice = await deduplicate(once, { embedder });

    expect(once.map((r) => r.originalSentence)).toEqual([
      LONG,
      'The maximum grant is EUR 500,000.',
      'The total budget is EUR 2,000,000.',
      LONG,
    ]);
    expect(twice).toEqual(once);
  });
});
