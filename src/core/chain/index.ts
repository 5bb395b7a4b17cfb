export { MapReduceChain, MAP_OUTPUT_SEPARATOR, type MapReduceChainConfig } from './map-reduce.js';
export { Pacer, sleep, type Sleep } from './pacer.js';
