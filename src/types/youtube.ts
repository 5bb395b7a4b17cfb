export interface TranscriptFragment {
  readonly text: string;
  readonly start: number; // seconds
  readonly duration: number; // seconds
}

export interface TranscriptChunk {
  id: string; // "<prefix>-<n>"
  text: string;
  start: number;
  duration: number;
}

export interface TimeBucket {
  index: number;
  chunks: TranscriptChunk[];
}

export interface TranscriptSource {
  getTranscript(videoId: string, languages: string[]): Promise<TranscriptFragment[]>;
}

export interface VideoMetadataSource {
  getVideoTitle(videoId: string): Promise<string>;
}
