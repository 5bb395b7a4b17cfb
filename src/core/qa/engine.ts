import { ChainInvocationError, DigestError } from '../errors.js';
import { createAnswerPrompt, getErrorDetail } from '../gemini/index.js';
import { divideIntoChunks } from '../transcript/index.js';
import { formatTimestamp, preferredLanguages } from '../youtube/index.js';
import { TranscriptRetriever } from './retriever.js';
import type {
  AnswerBackend,
  Embedder,
  QaAnswer,
  TextGenerator,
  TranscriptSource,
} from '../../types/index.js';

export interface TranscriptQaDeps {
  transcripts: TranscriptSource;
  generator: TextGenerator;
  embedder: Embedder;
}

export interface TranscriptQaOptions {
  locale: string;
  maxLength?: number;
  overlapLength?: number;
  onDebug?: (message: string) => void;
}

/**
 * Retrieval-augmented answers over one video's transcript.
 */
export class TranscriptQa implements AnswerBackend {
  private deps: TranscriptQaDeps;
  private retriever: TranscriptRetriever;
  private locale: string;
  private maxLength: number;
  private overlapLength: number;
  private onDebug?: (message: string) => void;

  constructor(deps: TranscriptQaDeps, options: TranscriptQaOptions) {
    this.deps = deps;
    this.retriever = new TranscriptRetriever(deps.embedder);
    this.locale = options.locale;
    this.maxLength = options.maxLength ?? 300;
    this.overlapLength = options.overlapLength ?? 1;
    this.onDebug = options.onDebug;
  }

  async prepare(videoId: string): Promise<number> {
    const fragments = await this.deps.transcripts.getTranscript(videoId, preferredLanguages(this.locale));
    const chunks = divideIntoChunks(fragments, {
      maxLength: this.maxLength,
      overlapLength: this.overlapLength,
      idPrefix: videoId,
    });
    await this.retriever.index(chunks);
    this.onDebug?.(`indexed ${chunks.length} chunks from ${fragments.length} fragments`);
    return chunks.length;
  }

  async ask(query: string, sourceCount: number): Promise<QaAnswer> {
    const hits = await this.retriever.search(query, sourceCount);
    const sources = hits.map(({ score, chunk }) => ({
      score,
      chunkId: chunk.id,
      timeLabel: formatTimestamp(chunk.start),
      text: chunk.text,
    }));
    this.onDebug?.(`retrieved ${sources.map((s) => s.chunkId).join(', ')}`);

    let answer: string;
    try {
      answer = await this.deps.generator.generate(
        createAnswerPrompt(query, this.locale),
        sources.map((s) => `[${s.timeLabel}] ${s.text}`)
      );
    } catch (error) {
      if (error instanceof ChainInvocationError) throw error.relabel('answer');
      if (error instanceof DigestError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ChainInvocationError('answer', getErrorDetail(cause), { cause });
    }

    return { answer, sources };
  }
}
