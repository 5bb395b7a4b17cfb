import { DigestError } from '../errors.js';
import type { Embedder, TranscriptChunk } from '../../types/index.js';

export interface ScoredChunk {
  score: number;
  chunk: TranscriptChunk;
}

/**
 * Brute-force top-k over provider embeddings.
 */
export class TranscriptRetriever {
  private embedder: Embedder;
  private chunks: TranscriptChunk[] = [];
  private vectors: number[][] = [];

  constructor(embedder: Embedder) {
    this.embedder = embedder;
  }

  get size(): number {
    return this.chunks.length;
  }

  async index(chunks: TranscriptChunk[]): Promise<void> {
    const vectors = await this.embedder.embed(chunks.map((chunk) => chunk.text));
    if (vectors.length !== chunks.length) {
      throw new DigestError(`Got ${vectors.length} embeddings for ${chunks.length} chunks`);
    }
    this.chunks = chunks;
    this.vectors = vectors;
  }

  async search(query: string, limit: number): Promise<ScoredChunk[]> {
    if (this.chunks.length === 0) {
      throw new DigestError('Retriever has no indexed chunks');
    }

    const [queryVector] = await this.embedder.embed([query]);
    if (!queryVector) {
      throw new DigestError('No embedding returned for the query');
    }
    return this.chunks
      .map((chunk, i) => ({ score: cosineSimilarity(queryVector, this.vectors[i]), chunk }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit));
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
