import { ConfigurationError } from '../../core/index.js';
import type { AppConfig } from '../../types/index.js';

/**
 * Build the explicit config every component receives. Missing required
 * variables are reported together.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const youtubeApiKey = env.YOUTUBE_API_KEY;
  const projectId = env.GOOGLE_CLOUD_PROJECT;

  const missing: string[] = [];
  if (!youtubeApiKey) missing.push('YOUTUBE_API_KEY');
  if (!projectId) missing.push('GOOGLE_CLOUD_PROJECT');
  if (!youtubeApiKey || !projectId) {
    throw new ConfigurationError(missing);
  }

  return {
    youtubeApiKey,
    gemini: {
      projectId,
      location: env.GOOGLE_CLOUD_LOCATION || 'us-central1',
      model: env.GEMINI_MODEL || 'gemini-2.5-flash',
      embeddingModel: env.GEMINI_EMBEDDING_MODEL || 'text-embedding-005',
    },
    summaryStoreDir: env.SUMMARY_STORE_DIR || './summaries',
    locale: env.SUMMARY_LOCALE || 'ja',
  };
}
