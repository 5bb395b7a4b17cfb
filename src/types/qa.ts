export interface QaSource {
  score: number;
  chunkId: string;
  timeLabel: string; // "m:ss" or "h:mm:ss"
  text: string;
}

export interface QaAnswer {
  answer: string;
  sources: QaSource[];
}

export interface AnswerBackend {
  ask(query: string, sourceCount: number): Promise<QaAnswer>;
}

export interface SummaryHintSource {
  findConcise(videoId: string): Promise<string | null>;
}
