export { QaSession, formatSource, type QaIo, type QaSessionOptions } from './session.js';
export { TranscriptQa, type TranscriptQaDeps, type TranscriptQaOptions } from './engine.js';
export { TranscriptRetriever, cosineSimilarity, type ScoredChunk } from './retriever.js';
