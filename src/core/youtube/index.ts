export {
  YouTubeClient,
  parseVideoId,
  parseTimedText,
  buildWatchUrl,
  preferredLanguages,
  formatTimestamp,
  type TimedTextResponse,
} from './client.js';
