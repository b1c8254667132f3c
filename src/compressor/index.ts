export { Compressor } from './compressor.js';
export { compressJSON, groupRecords, summarizeGroup, windowSeconds, decodePayload } from './grouping.js';
export { aggregate, isAggregationMethod, AGGREGATION_METHODS } from './aggregate.js';
export { compressBatch } from './batch.js';
export { resolveConfig } from './config.js';
export { getCompressionRatio } from './ratio.js';
export { getPath, valueToFloat, valueToInt, valueToString } from './json-value.js';
export { DEFAULT_COMPRESSOR_CONFIG } from './types.js';
export type {
  AggregationMethod,
  AggregationResult,
  BatchOptions,
  CompressorConfig,
  Group,
  JsonObject,
  JsonValue,
  Payload
} from './types.js';
