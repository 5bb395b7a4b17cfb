export { divideIntoChunks, FRAGMENT_SEPARATOR, type ChunkOptions } from './chunker.js';
export { bucketByTime, bucketWidth, DEFAULT_SPLIT_NUM } from './bucketer.js';
