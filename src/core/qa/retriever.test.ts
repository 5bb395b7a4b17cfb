import { describe, it, expect, vi } from 'vitest';
import { TranscriptRetriever, cosineSimilarity } from './retriever.js';
import { DigestError } from '../errors.js';
import type { TranscriptChunk } from '../../types/index.js';

const vectors: Record<string, number[]> = {
  apples: [1, 0],
  bananas: [0, 1],
  fruit: [1, 1],
  'apple?': [1, 0.1],
};

function createEmbedder() {
  return { embed: vi.fn(async (texts: string[]) => texts.map((text) => vectors[text] ?? [0, 0])) };
}

const chunks: TranscriptChunk[] = [
  { id: 'v-0', text: 'apples', start: 0, duration: 5 },
  { id: 'v-1', text: 'bananas', start: 5, duration: 5 },
  { id: 'v-2', text: 'fruit', start: 10, duration: 5 },
];

describe('cosineSimilarity', () => {
  it('scores identical, orthogonal and zero vectors', () => {
    expect(cosineSimilarity([2, 0], [1, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('TranscriptRetriever', () => {
  it('returns the top chunks by similarity, best first', async () => {
    const embedder = createEmbedder();
    const retriever = new TranscriptRetriever(embedder);
    await retriever.index(chunks);

    const hits = await retriever.search('apple?', 2);

    expect(hits.map((hit) => hit.chunk.id)).toEqual(['v-0', 'v-2']);
    expect(hits[0].score).toBeCloseTo(1 / Math.sqrt(1.01));
    expect(embedder.embed).toHaveBeenLastCalledWith(['apple?']);
    expect(retriever.size).toBe(3);
  });

  it('returns every chunk when asked for more than it holds', async () => {
    const retriever = new TranscriptRetriever(createEmbedder());
    await retriever.index(chunks);

    const hits = await retriever.search('apple?', 10);

    expect(hits.map((hit) => hit.chunk.id)).toEqual(['v-0', 'v-2', 'v-1']);
  });

  it('refuses to search before anything is indexed', async () => {
    const retriever = new TranscriptRetriever(createEmbedder());

    await expect(retriever.search('apple?', 3)).rejects.toThrow('Retriever has no indexed chunks');
  });

  it('rejects an embedding count that does not match the chunks', async () => {
    const retriever = new TranscriptRetriever({ embed: async () => [[1, 0]] });

    await expect(retriever.index(chunks)).rejects.toBeInstanceOf(DigestError);
  });
});
