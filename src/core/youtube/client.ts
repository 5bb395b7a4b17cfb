import { google, youtube_v3 } from 'googleapis';
import { InvalidInputError, TranscriptUnavailableError } from '../errors.js';
import type { TranscriptFragment, TranscriptSource, VideoMetadataSource } from '../../types/index.js';

export interface TimedTextResponse {
  events?: Array<{
    tStartMs?: number;
    dDurationMs?: number;
    segs?: Array<{ utf8?: string }>;
  }>;
}

const TRACK_KINDS = ['', 'asr'] as const; // manual track first, then auto-generated

export class YouTubeClient implements TranscriptSource, VideoMetadataSource {
  private youtube: youtube_v3.Youtube;

  constructor(apiKey: string) {
    this.youtube = google.youtube({
      version: 'v3',
      auth: apiKey,
    });
  }

  async getVideoTitle(videoId: string): Promise<string> {
    const response = await this.youtube.videos.list({
      part: ['snippet'],
      id: [videoId],
    });

    const video = response.data.items?.[0];
    if (!video) {
      throw new InvalidInputError(`Video not found: ${videoId}`);
    }
    return video.snippet?.title || '';
  }

  /**
   * Fetch the transcript from the timedtext endpoint, trying each language in
   * order (manual captions before auto-generated ones).
   */
  async getTranscript(videoId: string, languages: string[]): Promise<TranscriptFragment[]> {
    for (const lang of languages) {
      for (const kind of TRACK_KINDS) {
        const data = await this.downloadTimedText(videoId, lang, kind);
        if (!data) continue;

        const fragments = parseTimedText(data);
        if (fragments.length > 0) return fragments;
      }
    }

    throw new TranscriptUnavailableError(videoId, languages);
  }

  private async downloadTimedText(
    videoId: string,
    lang: string,
    kind: (typeof TRACK_KINDS)[number]
  ): Promise<TimedTextResponse | null> {
    const params = new URLSearchParams({ v: videoId, lang, fmt: 'json3' });
    if (kind) params.set('kind', kind);
    const url = `https://www.youtube.com/api/timedtext?${params.toString()}`;

    let body: string;
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
      });
      if (!response.ok) {
        return null;
      }
      body = await response.text();
    } catch (error) {
      throw new TranscriptUnavailableError(videoId, [lang], { cause: error });
    }

    // missing tracks come back as 200 with an empty body
    if (!body.trim()) {
      return null;
    }

    try {
      return JSON.parse(body) as TimedTextResponse;
    } catch {
      return null;
    }
  }
}

/** Accepts a watch, short, embed or shorts URL, or a bare video id. */
export function parseVideoId(input: string): string {
  const patterns = [
    /youtu\.be\/([a-zA-Z0-9_-]+)/,
    /[?&]v=([a-zA-Z0-9_-]+)/,
    /youtube\.com\/embed\/([a-zA-Z0-9_-]+)/,
    /youtube\.com\/shorts\/([a-zA-Z0-9_-]+)/,
  ];

  for (const pattern of patterns) {
    const match = input.match(pattern);
    if (match) return match[1];
  }

  if (/^[a-zA-Z0-9_-]{6,}$/.test(input)) {
    return input;
  }

  throw new InvalidInputError(`Invalid video id or URL: ${input}`);
}

/**
 * Turn JSON3 caption events into fragments. Events without text (window
 * markers, line breaks) are skipped.
 */
export function parseTimedText(data: TimedTextResponse): TranscriptFragment[] {
  const fragments: TranscriptFragment[] = [];
  for (const event of data.events || []) {
    if (!event.segs) continue;

    const text = event.segs
      .map((seg) => seg.utf8 ?? '')
      .join('')
      .replace(/\s+/g, ' ')
      .trim();
    if (!text) continue;

    fragments.push({
      text,
      start: (event.tStartMs ?? 0) / 1000,
      duration: (event.dDurationMs ?? 0) / 1000,
    });
  }
  return fragments;
}

/** Transcript languages to try, target locale first. */
export function preferredLanguages(locale: string): string[] {
  return [...new Set([locale, 'en', 'en-US'])];
}

export function buildWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.floor(seconds);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }
  return `${minutes}:${secs.toString().padStart(2, '0')}`;
}
