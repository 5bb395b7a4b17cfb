import { InvalidInputError } from '../errors.js';
import type { TimeBucket, TranscriptChunk } from '../../types/index.js';

export const DEFAULT_SPLIT_NUM = 5;

/**
 * Group chunks into `splitNum` equal-width time buckets by start time.
 *
 * The index is clamped with `min(index, splitNum)`, so a chunk starting exactly
 * on the last boundary lands in an extra bucket `splitNum`. Empty buckets are
 * dropped.
 */
export function bucketByTime(
  chunks: readonly TranscriptChunk[],
  splitNum: number = DEFAULT_SPLIT_NUM
): TimeBucket[] {
  if (chunks.length === 0) {
    throw new InvalidInputError('No chunks to bucket');
  }
  if (!Number.isInteger(splitNum) || splitNum <= 0) {
    throw new InvalidInputError(`splitNum must be a positive integer (got ${splitNum})`);
  }

  const width = bucketWidth(chunks, splitNum);
  const slots: TranscriptChunk[][] = Array.from({ length: splitNum + 1 }, () => []);
  for (const chunk of chunks) {
    const index = width > 0 ? Math.min(Math.max(0, Math.floor(chunk.start / width)), splitNum) : 0;
    slots[index].push(chunk);
  }

  return slots
    .map((bucketChunks, index) => ({ index, chunks: bucketChunks }))
    .filter((bucket) => bucket.chunks.length > 0);
}

/** Width in whole seconds; 0 when the transcript is shorter than `splitNum` seconds. */
export function bucketWidth(chunks: readonly TranscriptChunk[], splitNum: number): number {
  if (chunks.length === 0) return 0;
  const last = chunks[chunks.length - 1];
  return Math.floor((last.start + last.duration) / splitNum);
}
