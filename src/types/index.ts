export * from './youtube.js';
export * from './gemini.js';
export * from './summary.js';
export * from './qa.js';

export interface AppConfig {
  youtubeApiKey: string;
  gemini: {
    projectId: string;
    location: string;
    model: string;
    embeddingModel: string;
  };
  summaryStoreDir: string;
  locale: string;
}
