import { InvalidInputError } from '../errors.js';
import type { TranscriptChunk, TranscriptFragment } from '../../types/index.js';

export const FRAGMENT_SEPARATOR = ' ';

export interface ChunkOptions {
  maxLength: number; // characters of joined text that close a chunk
  overlapLength: number; // fragments carried into the next chunk
  idPrefix: string;
}

/**
 * Divide transcript fragments into overlapping chunks.
 *
 * A chunk closes as soon as its joined text reaches `maxLength`. The next chunk
 * starts with the last `overlapLength` fragments of the closed one, capped so
 * that every chunk still takes at least one fragment of its own.
 */
export function divideIntoChunks(
  fragments: readonly TranscriptFragment[],
  options: ChunkOptions
): TranscriptChunk[] {
  const { maxLength, overlapLength, idPrefix } = options;

  if (fragments.length === 0) {
    throw new InvalidInputError('Transcript has no fragments');
  }
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new InvalidInputError(`maxLength must be a positive integer (got ${maxLength})`);
  }
  if (!Number.isInteger(overlapLength) || overlapLength < 0) {
    throw new InvalidInputError(`overlapLength must be a non-negative integer (got ${overlapLength})`);
  }
  if (overlapLength >= maxLength) {
    throw new InvalidInputError(
      `overlapLength (${overlapLength}) must be smaller than maxLength (${maxLength})`
    );
  }

  const chunks: TranscriptChunk[] = [];
  let buffer: TranscriptFragment[] = [];
  let textLength = 0;
  // fragments at the head of the buffer already emitted with the previous chunk
  let carried = 0;

  const flush = (): void => {
    chunks.push({
      id: `${idPrefix}-${chunks.length}`,
      text: buffer.map((f) => f.text).join(FRAGMENT_SEPARATOR),
      start: buffer[0].start,
      duration: buffer.reduce((sum, f) => sum + f.duration, 0),
    });
  };

  for (const fragment of fragments) {
    textLength += (buffer.length > 0 ? FRAGMENT_SEPARATOR.length : 0) + fragment.text.length;
    buffer.push(fragment);

    if (textLength < maxLength) continue;

    flush();
    carried = Math.min(overlapLength, buffer.length - 1);
    buffer = carried > 0 ? buffer.slice(-carried) : [];
    textLength = buffer.reduce(
      (sum, f, i) => sum + (i > 0 ? FRAGMENT_SEPARATOR.length : 0) + f.text.length,
      0
    );
  }

  if (buffer.length > carried) {
    flush();
  }

  return chunks;
}
