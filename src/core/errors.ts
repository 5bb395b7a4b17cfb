/**
 * Base class for every failure the digest pipeline raises on purpose.
 */
export class DigestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DigestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed transcript, chunking parameters or stored summary contents
 */
export class InvalidInputError extends DigestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidInputError';
  }
}

/**
 * No transcript track in any of the requested languages
 */
export class TranscriptUnavailableError extends DigestError {
  readonly videoId: string;
  readonly languages: string[];

  constructor(videoId: string, languages: string[], options?: { cause?: unknown }) {
    super(`No transcript available for ${videoId} (languages: ${languages.join(', ')})`, options);
    this.name = 'TranscriptUnavailableError';
    this.videoId = videoId;
    this.languages = languages;
  }
}

export type ChainStage = 'generate' | 'embed' | 'map' | 'reduce' | 'answer';

/**
 * The LLM or embedding provider failed; never retried
 */
export class ChainInvocationError extends DigestError {
  readonly stage: ChainStage;
  readonly detail: string;

  constructor(stage: ChainStage, message: string, options?: { cause?: unknown }) {
    super(`${stage} call failed: ${message}`, options);
    this.name = 'ChainInvocationError';
    this.stage = stage;
    this.detail = message;
  }

  /** Same failure, reported under the caller's stage; the original stays as `cause`. */
  relabel(stage: ChainStage): ChainInvocationError {
    if (stage === this.stage) return this;
    return new ChainInvocationError(stage, this.detail, { cause: this });
  }
}

/**
 * No stored summary for the video id
 */
export class NotFoundError extends DigestError {
  readonly videoId: string;

  constructor(videoId: string) {
    super(`Summary not found: ${videoId}`);
    this.name = 'NotFoundError';
    this.videoId = videoId;
  }
}

export class ConfigurationError extends DigestError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}
