export {
  Summarizer,
  type SummarizerCallbacks,
  type SummarizerDeps,
  type SummarizerOptions,
  type PreparedVideo,
} from './summarizer.js';
export * from './errors.js';
export { YouTubeClient, parseVideoId } from './youtube/index.js';
export { GeminiClient } from './gemini/index.js';
export { SummaryStore } from './store/index.js';
export { QaSession, TranscriptQa, type QaIo } from './qa/index.js';
export { MarkdownGenerator } from './output/index.js';
