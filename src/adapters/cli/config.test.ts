import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from '../../core/index.js';

describe('loadConfig', () => {
  it('fills defaults around the required keys', () => {
    const config = loadConfig({ YOUTUBE_API_KEY: 'test-key', GOOGLE_CLOUD_PROJECT: 'test-project' });

    expect(config).toEqual({
      youtubeApiKey: 'test-key',
      gemini: {
        projectId: 'test-project',
        location: 'us-central1',
        model: 'gemini-2.5-flash',
        embeddingModel: 'text-embedding-005',
      },
      summaryStoreDir: './summaries',
      locale: 'ja',
    });
  });

  it('takes overrides from the environment', () => {
    const config = loadConfig({
      YOUTUBE_API_KEY: 'test-key',
      GOOGLE_CLOUD_PROJECT: 'test-project',
      GOOGLE_CLOUD_LOCATION: 'europe-west4',
      GEMINI_MODEL: 'test-model',
      SUMMARY_STORE_DIR: '/tmp/summaries',
      SUMMARY_LOCALE: 'en',
    });

    expect(config.gemini.location).toBe('europe-west4');
    expect(config.gemini.model).toBe('test-model');
    expect(config.summaryStoreDir).toBe('/tmp/summaries');
    expect(config.locale).toBe('en');
  });

  it('lists every missing required variable', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({ GOOGLE_CLOUD_PROJECT: 'test-project' })).toThrow(
      'Missing environment variables: YOUTUBE_API_KEY'
    );
    expect(() => loadConfig({})).toThrow('Missing environment variables: YOUTUBE_API_KEY, GOOGLE_CLOUD_PROJECT');
  });
});
