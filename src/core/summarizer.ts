import { MapReduceChain, Pacer, sleep, type Sleep } from './chain/index.js';
import { createMapPrompt, createReducePrompt } from './gemini/index.js';
import { bucketByTime, bucketWidth, divideIntoChunks, DEFAULT_SPLIT_NUM } from './transcript/index.js';
import { buildWatchUrl, preferredLanguages } from './youtube/index.js';
import type {
  SummaryRecord,
  SummaryWriter,
  TextGenerator,
  TimeBucket,
  TranscriptChunk,
  TranscriptSource,
  VideoMetadataSource,
} from '../types/index.js';

export interface SummarizerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
}

export interface SummarizerDeps {
  transcripts: TranscriptSource;
  metadata: VideoMetadataSource;
  generator: TextGenerator;
  store: SummaryWriter;
}

export interface SummarizerOptions {
  locale: string;
  maxLength?: number;
  overlapLength?: number;
  splitNum?: number;
  bucketDelayMs?: number;
  sleep?: Sleep;
}

export interface PreparedVideo {
  videoId: string;
  url: string;
  title: string;
  chunks: TranscriptChunk[];
}

export class Summarizer {
  private deps: SummarizerDeps;
  private locale: string;
  private maxLength: number;
  private overlapLength: number;
  private splitNum: number;
  private bucketDelayMs: number;
  private sleep: Sleep;
  private callbacks: SummarizerCallbacks;

  constructor(deps: SummarizerDeps, options: SummarizerOptions, callbacks: SummarizerCallbacks = {}) {
    this.deps = deps;
    this.locale = options.locale;
    this.maxLength = options.maxLength ?? 1000;
    this.overlapLength = options.overlapLength ?? 5;
    this.splitNum = options.splitNum ?? DEFAULT_SPLIT_NUM;
    this.bucketDelayMs = options.bucketDelayMs ?? 3000;
    this.sleep = options.sleep ?? sleep;
    this.callbacks = callbacks;
  }

  private createChain(): MapReduceChain {
    return new MapReduceChain(this.deps.generator, {
      mapTemplate: createMapPrompt(),
      reduceTemplate: createReducePrompt(this.locale),
      onDebug: this.callbacks.onDebug,
    });
  }

  async prepare(videoId: string): Promise<PreparedVideo> {
    const { onProgress, onDebug } = this.callbacks;
    const url = buildWatchUrl(videoId);

    onProgress?.('Fetching video info...');
    const title = await this.deps.metadata.getVideoTitle(videoId);

    onProgress?.('Fetching transcript...');
    const fragments = await this.deps.transcripts.getTranscript(videoId, preferredLanguages(this.locale));
    const chunks = divideIntoChunks(fragments, {
      maxLength: this.maxLength,
      overlapLength: this.overlapLength,
      idPrefix: videoId,
    });
    onDebug?.(`${fragments.length} fragments -> ${chunks.length} chunks`);

    return { videoId, url, title, chunks };
  }

  async summarizeConcise(chunks: TranscriptChunk[]): Promise<string> {
    return this.createChain().run(chunks.map((chunk) => chunk.text));
  }

  /**
   * One chain run per bucket, strictly in order, pausing `bucketDelayMs`
   * before each bucket after the first.
   */
  async summarizeDetail(buckets: TimeBucket[]): Promise<string[]> {
    const chain = this.createChain();
    const pacer = new Pacer(this.bucketDelayMs, this.sleep);
    const detail: string[] = [];

    for (const bucket of buckets) {
      await pacer.next();
      this.callbacks.onProgress?.(
        `Summarizing segment ${detail.length + 1}/${buckets.length} (${bucket.chunks.length} chunks)`
      );
      detail.push(await chain.run(bucket.chunks.map((chunk) => chunk.text)));
    }

    return detail;
  }

  /**
   * Prepare, summarize and persist. The record is saved only after every
   * chain call has succeeded.
   */
  async run(videoId: string): Promise<SummaryRecord> {
    const { onProgress, onDebug } = this.callbacks;
    const { url, title, chunks } = await this.prepare(videoId);

    onProgress?.('Writing concise summary...');
    const concise = await this.summarizeConcise(chunks);

    const buckets = bucketByTime(chunks, this.splitNum);
    onDebug?.(
      `bucket width ${bucketWidth(chunks, this.splitNum)}s: ` +
        buckets.map((b) => `#${b.index}=${b.chunks.length}`).join(' ')
    );
    const detail = await this.summarizeDetail(buckets);

    const record: SummaryRecord = { url, title, detail, concise };
    await this.deps.store.save(videoId, record);
    onProgress?.(`Summary saved: ${videoId}`);

    return record;
  }
}
