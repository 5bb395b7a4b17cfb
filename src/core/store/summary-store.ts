import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { InvalidInputError, NotFoundError } from '../errors.js';
import type { SummaryRecord, SummaryHintSource } from '../../types/index.js';

const RECORD_KEYS = ['url', 'title', 'detail', 'concise'] as const;

/**
 * One JSON file per video id, named after the id, under `storeDir`.
 */
export class SummaryStore implements SummaryHintSource {
  private storeDir: string;

  constructor(storeDir: string) {
    this.storeDir = storeDir;
  }

  pathFor(videoId: string): string {
    return join(this.storeDir, videoId);
  }

  async save(videoId: string, record: SummaryRecord): Promise<void> {
    await mkdir(this.storeDir, { recursive: true });
    // plain overwrite; JSON.stringify keeps non-ASCII text as-is
    await writeFile(this.pathFor(videoId), JSON.stringify(record), 'utf-8');
  }

  async load(videoId: string): Promise<SummaryRecord> {
    let content: string;
    try {
      content = await readFile(this.pathFor(videoId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(videoId);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new InvalidInputError(`Stored summary for ${videoId} is not valid JSON`, { cause: error });
    }

    if (!isSummaryRecord(parsed)) {
      throw new InvalidInputError(
        `Stored summary for ${videoId} must have the keys ${RECORD_KEYS.join(', ')}`
      );
    }
    return parsed;
  }

  async find(videoId: string): Promise<SummaryRecord | null> {
    try {
      return await this.load(videoId);
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  async findConcise(videoId: string): Promise<string | null> {
    const record = await this.find(videoId);
    return record ? record.concise : null;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isSummaryRecord(value: unknown): value is SummaryRecord {
  if (typeof value !== 'object' || value === null) return false;
  return RECORD_KEYS.every((key) => key in value);
}
