import { describe, it, expect, afterEach } from 'vitest';
import { EmbeddingService } from './embedding-service.js';
import { cosineSimilarity } from './cosine-similarity.js';

describe('EmbeddingService', () => {
  afterEach(() => {
    EmbeddingService.resetInstance();
  });

  it('getInstance() returns the same instance until reset', () => {
    const first = EmbeddingService.getInstance();
    expect(EmbeddingService.getInstance()).toBe(first);

    EmbeddingService.resetInstance();
    expect(EmbeddingService.getInstance()).not.toBe(first);
  });

  it('createFresh() returns a new instance each time', () => {
    expect(EmbeddingService.createFresh()).not.toBe(EmbeddingService.createFresh());
  });

  it('embeds to the configured number of dimensions', async () => {
    const service = EmbeddingService.createFresh({ dimensions: 64 });

    const result = await service.embed('pending orders');

    expect(result.embedding).toHaveLength(64);
    expect(service.getStatus()).toEqual({ dimensions: 64, corpusDocuments: 0, vocabularySize: 0 });
  });

  it('embedBatch preserves input order', async () => {
    const service = EmbeddingService.createFresh();

    const batch = await service.embedBatch(['sales report', 'order status']);
    const single = await service.embed('order status');

    expect(batch[1].embedding).toEqual(single.embedding);
  });

  it('setCorpus replaces the corpus used for term weights', async () => {
    const service = EmbeddingService.createFresh();
    const unweighted = await service.embed('orders today');

    service.setCorpus(['orders this week', 'orders last week', 'sales today']);
    const weighted = await service.embed('orders today');
    expect(service.getStatus()).toMatchObject({ corpusDocuments: 3 });
    expect(cosineSimilarity(weighted.embedding, unweighted.embedding)).toBeLessThan(1 - 1e-6);

    service.setCorpus(['refund request']);
    expect(service.getStatus()).toMatchObject({ corpusDocuments: 1, vocabularySize: 2 });
  });
});
