import { GoogleGenAI } from '@google/genai';
import { ChainInvocationError } from '../errors.js';
import type { Embedder, TextGenerator } from '../../types/index.js';

export interface GeminiClientConfig {
  projectId: string;
  location: string;
  model?: string;
  embeddingModel?: string;
  embeddingBatchSize?: number;
}

// Vertex also caps the total tokens of one embedContent request
export const DEFAULT_EMBEDDING_BATCH_SIZE = 20;

export class GeminiClient implements TextGenerator, Embedder {
  private client: GoogleGenAI;
  private modelName: string;
  private embeddingModelName: string;
  private embeddingBatchSize: number;

  constructor(config: GeminiClientConfig) {
    this.client = new GoogleGenAI({
      vertexai: true,
      project: config.projectId,
      location: config.location,
    });
    this.modelName = config.model || 'gemini-2.5-flash';
    this.embeddingModelName = config.embeddingModel || 'text-embedding-005';
    this.embeddingBatchSize = config.embeddingBatchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
  }

  /**
   * One generateContent call. Each document becomes its own text part ahead of
   * the prompt. Failures are not retried.
   */
  async generate(prompt: string, documents: string[] = []): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.modelName,
        contents: [...documents.map((doc) => ({ text: doc })), { text: prompt }],
      });
      text = response.text;
    } catch (error) {
      throw this.wrapError('generate', error);
    }

    if (!text) {
      throw new ChainInvocationError('generate', 'No text content in Gemini response');
    }
    return text.trim();
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    // batches go out one after another
    for (let i = 0; i < texts.length; i += this.embeddingBatchSize) {
      const batch = texts.slice(i, i + this.embeddingBatchSize);
      let embeddings: Array<{ values?: number[] }> | undefined;
      try {
        const response = await this.client.models.embedContent({
          model: this.embeddingModelName,
          contents: batch,
        });
        embeddings = response.embeddings;
      } catch (error) {
        throw this.wrapError('embed', error);
      }

      if (!embeddings || embeddings.length !== batch.length) {
        throw new ChainInvocationError(
          'embed',
          `Expected ${batch.length} embeddings, got ${embeddings?.length ?? 0}`
        );
      }
      embeddings.forEach((embedding, j) => {
        if (!embedding.values || embedding.values.length === 0) {
          throw new ChainInvocationError('embed', `Embedding without values at index ${i + j}`);
        }
        vectors.push(embedding.values);
      });
    }

    return vectors;
  }

  private wrapError(stage: 'generate' | 'embed', error: unknown): ChainInvocationError {
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ChainInvocationError(stage, getErrorDetail(cause), { cause });
  }
}

export function getErrorDetail(error: Error): string {
  const parts: string[] = [error.message];

  const cause = error.cause;
  if (cause instanceof Error) {
    parts.push(`[cause: ${cause.message}]`);
    const deepCause = cause.cause;
    if (deepCause instanceof Error) {
      parts.push(`[root: ${deepCause.message}]`);
    }
  } else if (cause) {
    parts.push(`[cause: ${String(cause)}]`);
  }

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') {
    parts.push(`[code: ${code}]`);
  }

  return parts.join(' ');
}
