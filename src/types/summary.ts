export interface SummaryRecord {
  url: string;
  title: string;
  detail: string[];
  concise: string;
}

export interface SummaryWriter {
  save(videoId: string, record: SummaryRecord): Promise<void>;
}
