import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Summarizer, type SummarizerDeps } from './summarizer.js';
import { SummaryStore } from './store/index.js';
import { ChainInvocationError } from './errors.js';
import type { SummaryRecord, TranscriptFragment } from '../types/index.js';

// ten one-fragment chunks (text length 2, maxLength 2), 10s apart
const fragments: TranscriptFragment[] = Array.from({ length: 10 }, (_, i) => ({
  text: `t${i}`,
  start: i * 10,
  duration: 10,
}));

function createDeps(events: string[], failAtCall?: number) {
  let calls = 0;
  let reduces = 0;
  const generate = vi.fn(async (prompt: string) => {
    calls++;
    events.push('generate');
    if (calls === failAtCall) {
      throw new ChainInvocationError('generate', '503 unavailable');
    }
    if (prompt.startsWith('Summarize the following content concisely')) {
      reduces++;
      return `reduce-${reduces}`;
    }
    return `map-${calls}`;
  });

  const deps = {
    transcripts: { getTranscript: vi.fn(async () => fragments) },
    metadata: { getVideoTitle: vi.fn(async () => 'Test title') },
    generator: { generate },
    store: { save: vi.fn(async () => {}) },
  } satisfies SummarizerDeps;
  return deps;
}

function createSleep(events: string[]) {
  return vi.fn(async (_ms: number) => {
    events.push('sleep');
  });
}

describe('Summarizer', () => {
  it('summarizes the whole transcript, then each time bucket, and saves the record', async () => {
    const events: string[] = [];
    const deps = createDeps(events);
    const sleep = createSleep(events);
    const summarizer = new Summarizer(deps, {
      locale: 'en',
      maxLength: 2,
      overlapLength: 0,
      sleep,
    });

    const record = await summarizer.run('vid123');

    const expected: SummaryRecord = {
      url: 'https://www.youtube.com/watch?v=vid123',
      title: 'Test title',
      detail: ['reduce-2', 'reduce-3', 'reduce-4', 'reduce-5', 'reduce-6'],
      concise: 'reduce-1',
    };
    expect(record).toEqual(expected);
    expect(deps.store.save).toHaveBeenCalledTimes(1);
    expect(deps.store.save).toHaveBeenCalledWith('vid123', expected);
    expect(deps.transcripts.getTranscript).toHaveBeenCalledWith('vid123', ['en', 'en-US']);
    expect(deps.metadata.getVideoTitle).toHaveBeenCalledWith('vid123');
    expect(deps.generator.generate).toHaveBeenCalledTimes(26);
  });

  it('pauses 3 seconds between buckets, never before the first', async () => {
    const events: string[] = [];
    const sleep = createSleep(events);
    const summarizer = new Summarizer(createDeps(events), {
      locale: 'en',
      maxLength: 2,
      overlapLength: 0,
      sleep,
    });

    await summarizer.run('vid123');

    const bucketCalls = ['generate', 'generate', 'generate'];
    expect(events).toEqual([
      ...Array<string>(11).fill('generate'),
      ...bucketCalls,
      'sleep',
      ...bucketCalls,
      'sleep',
      ...bucketCalls,
      'sleep',
      ...bucketCalls,
      'sleep',
      ...bucketCalls,
    ]);
    expect(sleep.mock.calls).toEqual([[3000], [3000], [3000], [3000]]);
  });

  it('reports progress and debug details through callbacks', async () => {
    const events: string[] = [];
    const onProgress = vi.fn();
    const onDebug = vi.fn();
    const summarizer = new Summarizer(
      createDeps(events),
      { locale: 'en', maxLength: 2, overlapLength: 0, sleep: createSleep(events) },
      { onProgress, onDebug }
    );

    await summarizer.run('vid123');

    expect(onProgress).toHaveBeenCalledWith('Summarizing segment 3/5 (2 chunks)');
    expect(onProgress).toHaveBeenLastCalledWith('Summary saved: vid123');
    expect(onDebug).toHaveBeenCalledWith('10 fragments -> 10 chunks');
    expect(onDebug).toHaveBeenCalledWith('bucket width 20s: #0=2 #1=2 #2=2 #3=2 #4=2');
  });

  it('returns no detail for no buckets', async () => {
    const events: string[] = [];
    const sleep = createSleep(events);
    const summarizer = new Summarizer(createDeps(events), { locale: 'en', sleep });

    await expect(summarizer.summarizeDetail([])).resolves.toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  describe('when a chain call fails', () => {
    let storeDir: string;

    beforeEach(async () => {
      storeDir = await mkdtemp(join(tmpdir(), 'video-digest-summarizer-'));
    });

    afterEach(async () => {
      await rm(storeDir, { recursive: true, force: true });
    });

    it('leaves no record behind when bucket 3 of 5 fails', async () => {
      const events: string[] = [];
      // 11 concise calls + 3 per bucket: the first map call of bucket 3 is call 18
      const deps = { ...createDeps(events, 18), store: new SummaryStore(storeDir) };
      const summarizer = new Summarizer(deps, {
        locale: 'en',
        maxLength: 2,
        overlapLength: 0,
        sleep: createSleep(events),
      });

      await expect(summarizer.run('vid123')).rejects.toThrow('map call failed: 503 unavailable');
      await expect(deps.store.find('vid123')).resolves.toBeNull();
    });

    it('keeps the previous record untouched', async () => {
      const events: string[] = [];
      const store = new SummaryStore(storeDir);
      const previous: SummaryRecord = {
        url: 'https://www.youtube.com/watch?v=vid123',
        title: 'Old title',
        detail: ['old detail'],
        concise: 'old concise',
      };
      await store.save('vid123', previous);

      const summarizer = new Summarizer(
        { ...createDeps(events, 18), store },
        { locale: 'en', maxLength: 2, overlapLength: 0, sleep: createSleep(events) }
      );

      await expect(summarizer.run('vid123')).rejects.toBeInstanceOf(ChainInvocationError);
      await expect(store.load('vid123')).resolves.toEqual(previous);
    });
  });
});
